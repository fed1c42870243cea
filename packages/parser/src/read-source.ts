/**
 * Source document reader
 *
 * Checks well-formedness and the root element, nothing else. Attribute values
 * are kept as raw strings so numeric text reaches the normalizer untouched.
 * Character references are decoded; the parser only knows the predefined
 * entities.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { FormatError } from '@invoice-bridge/shared';
import type { SourceDocument, XmlNode } from './types.js';
import { isXmlNode } from './values.js';

export const SOURCE_ROOT_ELEMENT = 'SalesInvoicePrint';

/**
 * Element paths (below the root) that repeat and must always parse as arrays
 */
const REPEATING_PATHS = new Set([
  'Despatches.Despatch',
  'Despatches.Despatch.SalesOrders.SalesOrder',
  'Despatches.Despatch.SalesOrders.SalesOrder.Items.Item',
  'Despatches.Despatch.Charges.Charge',
  'VATDetails.VAT',
]);

/** Predefined entities the parser decodes itself */
const MARKUP_ENTITIES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  '"': '&quot;',
  "'": '&apos;',
};

const CHARACTER_REFERENCE = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->|&#(?:x([0-9a-fA-F]+)|([0-9]+));/g;

function isXmlCharacter(codePoint: number): boolean {
  return (
    codePoint === 0x9 ||
    codePoint === 0xa ||
    codePoint === 0xd ||
    (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
    (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
    (codePoint >= 0x10000 && codePoint <= 0x10ffff)
  );
}

/**
 * Replace `&#NNN;` and `&#xHH;` references with the characters they name.
 *
 * CDATA sections and comments are left untouched. A reference to a markup
 * character becomes the matching predefined entity, and one that names no
 * legal XML character is kept as written.
 */
export function decodeCharacterReferences(text: string): string {
  return text.replace(CHARACTER_REFERENCE, (match: string, hex: string | undefined, decimal: string | undefined) => {
    const digits = hex ?? decimal;
    if (digits === undefined) {
      return match;
    }
    const codePoint = Number.parseInt(digits, hex === undefined ? 10 : 16);
    if (!isXmlCharacter(codePoint)) {
      return match;
    }
    const character = String.fromCodePoint(codePoint);
    return MARKUP_ENTITIES[character] ?? character;
  });
}

/** Skips the declaration and any text between prolog and root */
const isElementKey = (key: string): boolean => !key.startsWith('?') && key !== '#text';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: false,
  isArray: (_name, jPath, _isLeafNode, isAttribute) => {
    if (isAttribute) {
      return false;
    }
    const separator = jPath.indexOf('.');
    return separator >= 0 && REPEATING_PATHS.has(jPath.slice(separator + 1));
  },
});

/**
 * Parse XML text and check that it is a SalesInvoicePrint document.
 *
 * @throws FormatError for empty input, malformed XML or an unexpected root
 */
export function readSourceDocument(xml: string): SourceDocument {
  const text = xml.replace(/^\uFEFF/, '');

  if (text.trim().length === 0) {
    throw new FormatError('Source document is empty');
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new FormatError(`Malformed XML: ${msg} (line ${line}, column ${col})`, { code, line, col });
  }

  const parsed: unknown = parser.parse(decodeCharacterReferences(text));
  const rootName = isXmlNode(parsed) ? Object.keys(parsed).find(isElementKey) : undefined;

  if (!isXmlNode(parsed) || rootName === undefined) {
    throw new FormatError('No root element found in XML');
  }

  if (rootName !== SOURCE_ROOT_ELEMENT) {
    throw new FormatError(
      `Unexpected root element '${rootName}'. Expected '${SOURCE_ROOT_ELEMENT}'.`,
      { rootName },
    );
  }

  const rootValue = parsed[rootName];
  const root: XmlNode = isXmlNode(rootValue) ? rootValue : {};

  return { rootName, root };
}
