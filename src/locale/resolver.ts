import fs from 'node:fs/promises';
import path from 'node:path';
import { LocaleNotFoundError } from '../errors.js';

export const LC_COLLATE_FILE = 'LC_COLLATE';

/**
 * Build the glibc-style directory name for a locale: the encoding suffix is
 * lower-cased and stripped of everything but letters and digits
 * (`de_DE.UTF-8` → `de_DE.utf8`).
 * Returns null when the locale has no suffix or mangling changes nothing.
 */
export function mangleLocaleName(localeId: string): string | null {
  const dot = localeId.indexOf('.');
  if (dot === -1) return null;

  const base = localeId.slice(0, dot);
  const suffix = localeId
    .slice(dot + 1)
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');
  const mangled = `${base}.${suffix}`;
  return mangled === localeId ? null : mangled;
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Find the LC_COLLATE file for a locale under the search root, trying the
 * literal name first and the mangled name second.
 */
export async function resolveLocaleFile(searchRoot: string, localeId: string): Promise<string> {
  const candidates = [path.join(searchRoot, localeId, LC_COLLATE_FILE)];
  const mangled = mangleLocaleName(localeId);
  if (mangled) {
    candidates.push(path.join(searchRoot, mangled, LC_COLLATE_FILE));
  }

  for (const candidate of candidates) {
    if (await isFile(candidate)) return candidate;
  }

  throw new LocaleNotFoundError(localeId, candidates);
}
