export { type ProbeOptions, type ProbeResult, DEFAULT_BLOCK_SIZE, probeLocaleFile } from './fingerprint.js';
export { LC_COLLATE_FILE, mangleLocaleName, resolveLocaleFile } from './resolver.js';
export { DEFAULT_LOCALE_PATHS, findLocaleRoot } from './search-root.js';

import { type ProbeOptions, type ProbeResult, probeLocaleFile } from './fingerprint.js';
import { resolveLocaleFile } from './resolver.js';

/**
 * Resolve a locale under the search root and fingerprint its LC_COLLATE file.
 */
export async function probeLocale(searchRoot: string, localeId: string, options?: ProbeOptions): Promise<ProbeResult> {
  const filePath = await resolveLocaleFile(searchRoot, localeId);
  return probeLocaleFile(filePath, options);
}
