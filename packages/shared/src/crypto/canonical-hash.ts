import { createHash } from 'node:crypto';

/**
 * Canonical JSON stringification for deterministic hashing.
 * - Sorts object keys alphabetically
 * - Removes undefined values
 * - Uses consistent formatting (no extra whitespace)
 */
export function canonicalStringify(obj: unknown): string {
  return JSON.stringify(obj, (_, value: unknown) => {
    if (value === undefined) {
      return undefined;
    }
    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      const sorted: Record<string, unknown> = {};
      const entries: Array<[string, unknown]> = Object.entries(value);
      entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      for (const [key, entry] of entries) {
        if (entry !== undefined) {
          sorted[key] = entry;
        }
      }
      return sorted;
    }
    return value;
  });
}

/**
 * Compute SHA-256 hash of canonically stringified config.
 * Returns hash in format: "sha256:<hex>"
 */
export function computeConfigHash(config: unknown): string {
  const canonical = canonicalStringify(config);
  const hash = createHash('sha256').update(canonical).digest('hex');
  return `sha256:${hash}`;
}
