/**
 * Document checksum.
 *
 * 32-bit FNV-1a over the UTF-8 bytes of the input. Stable across processes,
 * platforms and runtimes, unlike a runtime string hash.
 */

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** Checksums are reduced into [0, CHECKSUM_MODULUS) */
export const CHECKSUM_MODULUS = 100_000;

const encoder = new TextEncoder();

/**
 * 32-bit FNV-1a hash as an unsigned integer.
 */
export function fnv1a32(text: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of encoder.encode(text)) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

/**
 * Invoice checksum: fnv1a32(invoiceNumber + grossTotalText) mod 100000.
 *
 * `grossTotalText` is the gross total exactly as computed, scale included.
 */
export function invoiceChecksum(invoiceNumber: string, grossTotalText: string): string {
  return String(fnv1a32(invoiceNumber + grossTotalText) % CHECKSUM_MODULUS);
}
