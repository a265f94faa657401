import type pg from 'pg';
import { DatabaseError } from '../errors.js';

// ============================================================
// Interfaces for database operations
// ============================================================

/**
 * The part of a pg client the repositories and executor need.
 */
export type Queryable = Pick<pg.ClientBase, 'query'>;

export interface QualifiedName {
  schema: string;
  name: string;
}

/**
 * One persisted row of the baseline table, keyed by effective locale.
 */
export interface BaselineRecord {
  locale: string;
  path: string;
  /** Whole seconds since the epoch */
  modified: number;
  checksum: string;
}

// ============================================================
// Baseline table
// ============================================================

export const DEFAULT_BASELINE_SCHEMA = 'public';
export const DEFAULT_BASELINE_TABLE = 'lc_collate_checksums';

export const BASELINE_COLUMNS =
  'lc_collate text PRIMARY KEY, path text NOT NULL, modified timestamptz NOT NULL, checksum text NOT NULL';

// ============================================================
// Utility Functions
// ============================================================

/**
 * Double-quote an SQL identifier, doubling any embedded quotes.
 */
export function quoteIdent(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

export function quoteQualified(name: QualifiedName): string {
  return `${quoteIdent(name.schema)}.${quoteIdent(name.name)}`;
}

/**
 * Single-quote an SQL string literal, doubling any embedded quotes.
 * Only used for printed scripts; executed statements are parameterized.
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function formatQualified(name: QualifiedName): string {
  return `${name.schema}.${name.name}`;
}

/**
 * Run a query and return its rows. Server and driver failures surface as
 * `DatabaseError`.
 */
export async function queryRows<R extends pg.QueryResultRow>(
  db: Queryable,
  text: string,
  values: unknown[] = []
): Promise<R[]> {
  try {
    const result = await db.query<R>(text, values);
    return result.rows;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatabaseError(`Query failed: ${message}`, { cause: error });
  }
}
