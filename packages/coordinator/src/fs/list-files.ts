import { readdir } from 'node:fs/promises';
import { isNotFound } from './errno.js';

/**
 * Names of the regular files directly inside `directory`, sorted. A missing
 * directory has no files.
 */
export async function listFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}
