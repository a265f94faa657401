import { describe, expect, it } from 'vitest';
import { CollwatchError, LocaleNotFoundError, ProbeError, UsageError, isCollwatchError } from '../src/errors.js';

describe('errors', () => {
  it('tags each error with its code and class name', () => {
    const usage = new UsageError('bad flag');
    const notFound = new LocaleNotFoundError('xx_XX', ['/a/xx_XX/LC_COLLATE']);

    expect(usage.code).toBe('UsageError');
    expect(usage.name).toBe('UsageError');
    expect(notFound.code).toBe('ResolutionError');
    expect(notFound.name).toBe('LocaleNotFoundError');
    expect(notFound.message).toBe('No LC_COLLATE file found for locale "xx_XX" (tried /a/xx_XX/LC_COLLATE)');
  });

  it('keeps the underlying cause of a probe failure', () => {
    const cause = new Error('EIO: i/o error, read');
    const error = new ProbeError('/a/LC_COLLATE', cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Failed to read /a/LC_COLLATE: EIO: i/o error, read');
    expect(error).toBeInstanceOf(CollwatchError);
  });

  it('recognizes its own errors', () => {
    expect(isCollwatchError(new UsageError('x'))).toBe(true);
    expect(isCollwatchError(new Error('x'))).toBe(false);
  });
});
