import { type BaselineRecord, type QualifiedName, type Queryable, queryRows, quoteQualified } from '../schema.js';

interface BaselineRow {
  lc_collate: string;
  path: string;
  modified: string | number;
  checksum: string;
}

/**
 * Repository for the baseline checksum table.
 * Read-only: new rows and updates travel as plan statements so they commit
 * together with the index rebuilds.
 */
export class BaselineRepository {
  constructor(
    private db: Queryable,
    public readonly table: QualifiedName
  ) {}

  async exists(): Promise<boolean> {
    const rows = await queryRows<{ present: boolean }>(
      this.db,
      `
      SELECT EXISTS (
        SELECT 1 FROM pg_catalog.pg_tables WHERE schemaname = $1 AND tablename = $2
      ) AS present
    `,
      [this.table.schema, this.table.name]
    );
    return rows[0]?.present === true;
  }

  /**
   * All baseline rows keyed by locale. The table must exist.
   */
  async getAll(): Promise<Map<string, BaselineRecord>> {
    const records = new Map<string, BaselineRecord>();

    const rows = await queryRows<BaselineRow>(
      this.db,
      `
      SELECT lc_collate, path, floor(extract(epoch FROM modified))::bigint AS modified, checksum
      FROM ${quoteQualified(this.table)}
    `
    );
    for (const row of rows) {
      records.set(row.lc_collate, {
        locale: row.lc_collate,
        path: row.path,
        // bigint arrives as a string
        modified: Number(row.modified),
        checksum: row.checksum,
      });
    }
    return records;
  }
}
