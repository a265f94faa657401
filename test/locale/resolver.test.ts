import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocaleNotFoundError } from '../../src/errors.js';
import { mangleLocaleName, resolveLocaleFile } from '../../src/locale/resolver.js';

describe('locale resolver', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'collwatch-resolver-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function createLocale(root: string, dirName: string, content = 'collation rules'): Promise<string> {
    const dir = path.join(root, dirName);
    await fs.mkdir(dir, { recursive: true });
    const file = path.join(dir, 'LC_COLLATE');
    await fs.writeFile(file, content);
    return file;
  }

  describe('mangleLocaleName', () => {
    it('lower-cases the encoding and drops punctuation', () => {
      expect(mangleLocaleName('de_DE.UTF-8')).toBe('de_DE.utf8');
      expect(mangleLocaleName('ja_JP.EUC-JP')).toBe('ja_JP.eucjp');
    });

    it('keeps the base name untouched', () => {
      expect(mangleLocaleName('Foo_BAR.ISO-8859-1')).toBe('Foo_BAR.iso88591');
    });

    it('drops every non-alphanumeric character of the suffix', () => {
      expect(mangleLocaleName('sr_RS.UTF-8@latin')).toBe('sr_RS.utf8latin');
    });

    it('returns null without an encoding suffix', () => {
      expect(mangleLocaleName('C')).toBeNull();
      expect(mangleLocaleName('en_US')).toBeNull();
    });

    it('returns null when the name is already mangled', () => {
      expect(mangleLocaleName('fr_FR.utf8')).toBeNull();
    });
  });

  describe('resolveLocaleFile', () => {
    it('finds the literal locale directory', async () => {
      const expected = await createLocale(tempDir, 'fr_FR.utf8');

      await expect(resolveLocaleFile(tempDir, 'fr_FR.utf8')).resolves.toBe(expected);
    });

    it('falls back to the mangled directory name', async () => {
      const expected = await createLocale(tempDir, 'de_DE.utf8');

      await expect(resolveLocaleFile(tempDir, 'de_DE.UTF-8')).resolves.toBe(expected);
    });

    it('prefers the literal name when both exist', async () => {
      const literal = await createLocale(tempDir, 'de_DE.UTF-8');
      await createLocale(tempDir, 'de_DE.utf8');

      await expect(resolveLocaleFile(tempDir, 'de_DE.UTF-8')).resolves.toBe(literal);
    });

    it('resolves the same locale under either on-disk convention', async () => {
      const glibcRoot = path.join(tempDir, 'glibc');
      const bsdRoot = path.join(tempDir, 'bsd');
      const glibcFile = await createLocale(glibcRoot, 'nl_NL.utf8');
      const bsdFile = await createLocale(bsdRoot, 'nl_NL.UTF-8');

      const fromGlibc = await resolveLocaleFile(glibcRoot, 'nl_NL.UTF-8');
      const fromBsd = await resolveLocaleFile(bsdRoot, 'nl_NL.UTF-8');

      expect(fromGlibc).toBe(glibcFile);
      expect(fromBsd).toBe(bsdFile);
      expect(path.relative(glibcRoot, fromGlibc)).toBe(path.join('nl_NL.utf8', 'LC_COLLATE'));
      expect(path.relative(bsdRoot, fromBsd)).toBe(path.join('nl_NL.UTF-8', 'LC_COLLATE'));
    });

    it('throws LocaleNotFoundError naming both candidates', async () => {
      const error = await resolveLocaleFile(tempDir, 'xx_XX.UTF-8').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LocaleNotFoundError);
      const notFound = error as LocaleNotFoundError;
      expect(notFound.code).toBe('ResolutionError');
      expect(notFound.locale).toBe('xx_XX.UTF-8');
      expect(notFound.candidates).toEqual([
        path.join(tempDir, 'xx_XX.UTF-8', 'LC_COLLATE'),
        path.join(tempDir, 'xx_XX.utf8', 'LC_COLLATE'),
      ]);
      expect(notFound.message).toContain('"xx_XX.UTF-8"');
    });

    it('tries a single candidate when there is no suffix', async () => {
      const error = await resolveLocaleFile(tempDir, 'en_US').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LocaleNotFoundError);
      expect((error as LocaleNotFoundError).candidates).toEqual([path.join(tempDir, 'en_US', 'LC_COLLATE')]);
    });

    it('ignores an LC_COLLATE entry that is a directory', async () => {
      await fs.mkdir(path.join(tempDir, 'fr_FR.utf8', 'LC_COLLATE'), { recursive: true });

      await expect(resolveLocaleFile(tempDir, 'fr_FR.utf8')).rejects.toBeInstanceOf(LocaleNotFoundError);
    });
  });
});
