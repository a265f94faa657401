import fs from 'node:fs/promises';
import path from 'node:path';
import type { QualifiedName } from './db/schema.js';
import { UsageError } from './errors.js';
import { DEFAULT_LOCALE_PATHS, findLocaleRoot } from './locale/search-root.js';

export const LOCALE_PATH_ENV = 'COLLWATCH_LOCALE_PATH';

export interface CheckArgs {
  connection?: string;
}

export interface CheckFlags {
  now: boolean;
  'assume-good': boolean;
  'locale-path'?: string;
  table: string;
  schema: string;
  verbose: boolean;
}

export interface CheckConfig {
  connectionString: string;
  /** Execute the plan instead of only printing it */
  execute: boolean;
  assumeGood: boolean;
  /** Explicit locale root, when one was given */
  localePath: string | null;
  baselineTable: QualifiedName;
  verbose: boolean;
}

/**
 * Turn parsed CLI input into a validated configuration.
 * Priority for the locale root: explicit flag > COLLWATCH_LOCALE_PATH > discovery.
 */
export function resolveConfig(args: CheckArgs, flags: CheckFlags, env: NodeJS.ProcessEnv = process.env): CheckConfig {
  const connectionString = args.connection?.trim();
  if (!connectionString) {
    throw new UsageError('Missing required argument: connection string (e.g. "postgresql://localhost/mydb")');
  }

  const schema = flags.schema.trim();
  const table = flags.table.trim();
  if (schema.length === 0) throw new UsageError('--schema must not be empty');
  if (table.length === 0) throw new UsageError('--table must not be empty');

  const localePath = flags['locale-path'] ?? env[LOCALE_PATH_ENV];

  return {
    connectionString,
    execute: flags.now,
    assumeGood: flags['assume-good'],
    localePath: localePath ? path.resolve(localePath) : null,
    baselineTable: { schema, name: table },
    verbose: flags.verbose,
  };
}

/**
 * Pick the directory LC_COLLATE files are looked up in.
 */
export async function resolveLocaleRoot(
  localePath: string | null,
  candidates: readonly string[] = DEFAULT_LOCALE_PATHS
): Promise<string> {
  if (localePath) {
    const stat = await fs.stat(localePath).catch(() => null);
    if (!stat?.isDirectory()) {
      throw new UsageError(`Locale path "${localePath}" is not a directory`);
    }
    return localePath;
  }

  const found = await findLocaleRoot(candidates);
  if (!found) {
    throw new UsageError(`No locale directory found (tried ${candidates.join(', ')}). Use --locale-path to set one.`);
  }
  return found;
}
