import fs from 'node:fs/promises';

/**
 * Conventional locale-data roots, most common first: glibc, then the BSDs.
 */
export const DEFAULT_LOCALE_PATHS: readonly string[] = ['/usr/lib/locale', '/usr/share/locale', '/usr/local/share/locale'];

/**
 * Return the first candidate that exists and is a directory, or null.
 */
export async function findLocaleRoot(candidates: readonly string[] = DEFAULT_LOCALE_PATHS): Promise<string | null> {
  for (const candidate of candidates) {
    try {
      const stat = await fs.stat(candidate);
      if (stat.isDirectory()) return candidate;
    } catch {
      // missing, try the next one
    }
  }
  return null;
}
