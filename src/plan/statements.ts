import {
  BASELINE_COLUMNS,
  type BaselineRecord,
  type QualifiedName,
  quoteLiteral,
  quoteQualified,
} from '../db/schema.js';

export interface CommentStatement {
  kind: 'comment';
  text: string;
}

export interface CreateTableStatement {
  kind: 'create-table';
  table: QualifiedName;
}

export interface ReindexStatement {
  kind: 'reindex';
  index: QualifiedName;
}

export interface InsertBaselineStatement {
  kind: 'insert-baseline';
  table: QualifiedName;
  record: BaselineRecord;
}

export interface UpdateBaselineStatement {
  kind: 'update-baseline';
  table: QualifiedName;
  record: BaselineRecord;
}

export type PlanStatement =
  | CommentStatement
  | CreateTableStatement
  | ReindexStatement
  | InsertBaselineStatement
  | UpdateBaselineStatement;

export interface ParameterizedQuery {
  text: string;
  values: Array<string | number>;
}

/**
 * psql meta-command placed before every printed script, so a piped run stops
 * at the first failing statement.
 */
export const SAFETY_PRAGMA = '\\set ON_ERROR_STOP on';

// ============================================================
// Constructors
// ============================================================

export function comment(text: string): CommentStatement {
  return { kind: 'comment', text };
}

export function createTable(table: QualifiedName): CreateTableStatement {
  return { kind: 'create-table', table };
}

export function reindex(index: QualifiedName): ReindexStatement {
  return { kind: 'reindex', index };
}

export function insertBaseline(table: QualifiedName, record: BaselineRecord): InsertBaselineStatement {
  return { kind: 'insert-baseline', table, record };
}

export function updateBaseline(table: QualifiedName, record: BaselineRecord): UpdateBaselineStatement {
  return { kind: 'update-baseline', table, record };
}

// ============================================================
// Rendering
// ============================================================

function epochLiteral(seconds: number): string {
  return `to_timestamp(${Math.trunc(seconds)})`;
}

/**
 * Render a statement as literal SQL, ready to pipe into psql.
 */
export function renderStatement(stmt: PlanStatement): string {
  switch (stmt.kind) {
    case 'comment':
      return `-- ${stmt.text.replace(/[\r\n]+/g, ' ')}`;
    case 'create-table':
      return `CREATE TABLE ${quoteQualified(stmt.table)} (${BASELINE_COLUMNS});`;
    case 'reindex':
      return `REINDEX INDEX ${quoteQualified(stmt.index)};`;
    case 'insert-baseline': {
      const r = stmt.record;
      return (
        `INSERT INTO ${quoteQualified(stmt.table)} (lc_collate, path, modified, checksum) ` +
        `VALUES (${quoteLiteral(r.locale)}, ${quoteLiteral(r.path)}, ${epochLiteral(r.modified)}, ${quoteLiteral(r.checksum)});`
      );
    }
    case 'update-baseline': {
      const r = stmt.record;
      return (
        `UPDATE ${quoteQualified(stmt.table)} ` +
        `SET path = ${quoteLiteral(r.path)}, modified = ${epochLiteral(r.modified)}, checksum = ${quoteLiteral(r.checksum)} ` +
        `WHERE lc_collate = ${quoteLiteral(r.locale)};`
      );
    }
  }
}

/**
 * Parameterized form for execution. Comments have none.
 */
export function toQuery(stmt: PlanStatement): ParameterizedQuery | null {
  switch (stmt.kind) {
    case 'comment':
      return null;
    case 'create-table':
    case 'reindex':
      // identifiers cannot be bound, and the rendered text quotes them
      return { text: renderStatement(stmt), values: [] };
    case 'insert-baseline': {
      const r = stmt.record;
      return {
        text: `INSERT INTO ${quoteQualified(stmt.table)} (lc_collate, path, modified, checksum) VALUES ($1, $2, to_timestamp($3), $4)`,
        values: [r.locale, r.path, Math.trunc(r.modified), r.checksum],
      };
    }
    case 'update-baseline': {
      const r = stmt.record;
      return {
        text: `UPDATE ${quoteQualified(stmt.table)} SET path = $2, modified = to_timestamp($3), checksum = $4 WHERE lc_collate = $1`,
        values: [r.locale, r.path, Math.trunc(r.modified), r.checksum],
      };
    }
  }
}
