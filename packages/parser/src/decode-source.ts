/**
 * Source bytes → text
 *
 * A byte order mark wins, then UTF-16 detected from the opening `<?`, then
 * the `encoding` pseudo-attribute of the XML declaration. Without any of
 * them the document is UTF-8.
 */

import { TextDecoder } from 'node:util';

import { FormatError } from '@invoice-bridge/shared';

const DECLARATION_ENCODING = /^<\?xml[^>]*?\sencoding\s*=\s*(["'])([A-Za-z][A-Za-z0-9._-]*)\1/;

/** Bytes read to find the declaration */
const DECLARATION_WINDOW = 256;

function startsWith(bytes: Uint8Array, prefix: readonly number[]): boolean {
  return prefix.every((byte, index) => bytes[index] === byte);
}

/**
 * Encoding label for a source document
 */
export function detectSourceEncoding(bytes: Uint8Array): string {
  if (startsWith(bytes, [0xef, 0xbb, 0xbf])) return 'utf-8';
  if (startsWith(bytes, [0xff, 0xfe])) return 'utf-16le';
  if (startsWith(bytes, [0xfe, 0xff])) return 'utf-16be';
  if (startsWith(bytes, [0x3c, 0x00, 0x3f, 0x00])) return 'utf-16le';
  if (startsWith(bytes, [0x00, 0x3c, 0x00, 0x3f])) return 'utf-16be';

  const head = String.fromCharCode(...bytes.subarray(0, DECLARATION_WINDOW));
  const match = DECLARATION_ENCODING.exec(head);
  return match?.[2]?.toLowerCase() ?? 'utf-8';
}

/**
 * Decode a source document with the encoding it declares.
 *
 * @throws FormatError when the declared encoding is unknown
 */
export function decodeSourceText(bytes: Uint8Array): string {
  const encoding = detectSourceEncoding(bytes);

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding);
  } catch (error) {
    throw new FormatError(`Unsupported encoding '${encoding}'`, { encoding }, { cause: error });
  }
  return decoder.decode(bytes);
}
