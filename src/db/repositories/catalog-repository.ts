import { DatabaseError } from '../../errors.js';
import { type QualifiedName, type Queryable, queryRows } from '../schema.js';

interface CollationRow {
  lc_collate: string;
}

interface DefaultCollationRow {
  datcollate: string;
}

interface IndexRow {
  schema_name: string;
  index_name: string;
}

/**
 * Read-only queries against the PostgreSQL system catalogs.
 *
 * Collations are identified by their literal `collcollate` value. The
 * database-default collation has no value of its own and comes back as the
 * empty string. ICU collations are left out: they carry no LC_COLLATE file.
 * Partitioned parent indexes (relkind 'I') are skipped; each partition's own
 * index is listed instead.
 */
export class CatalogRepository {
  constructor(private db: Queryable) {}

  /**
   * Distinct collations used by at least one index column.
   */
  async getReferencedCollations(): Promise<string[]> {
    const rows = await queryRows<CollationRow>(
      this.db,
      `
      SELECT DISTINCT COALESCE(c.collcollate, '') AS lc_collate
      FROM pg_catalog.pg_index i
      JOIN pg_catalog.pg_class cls ON cls.oid = i.indexrelid
      CROSS JOIN LATERAL unnest(i.indcollation::oid[]) AS ic(coll_oid)
      JOIN pg_catalog.pg_collation c ON c.oid = ic.coll_oid
      WHERE c.collprovider IN ('c', 'd')
        AND cls.relkind = 'i'
      ORDER BY 1
    `
    );
    return rows.map((row) => row.lc_collate);
  }

  /**
   * LC_COLLATE of the current database.
   */
  async getDefaultCollation(): Promise<string> {
    const rows = await queryRows<DefaultCollationRow>(
      this.db,
      `
      SELECT datcollate FROM pg_catalog.pg_database WHERE datname = current_database()
    `
    );
    const row = rows[0];
    if (!row) {
      throw new DatabaseError('Current database is missing from pg_database');
    }
    return row.datcollate;
  }

  /**
   * Indexes with at least one column whose collation is `collation`.
   */
  async getIndexesForCollation(collation: string): Promise<QualifiedName[]> {
    const rows = await queryRows<IndexRow>(
      this.db,
      `
      SELECT DISTINCT n.nspname AS schema_name, cls.relname AS index_name
      FROM pg_catalog.pg_index i
      JOIN pg_catalog.pg_class cls ON cls.oid = i.indexrelid
      JOIN pg_catalog.pg_namespace n ON n.oid = cls.relnamespace
      CROSS JOIN LATERAL unnest(i.indcollation::oid[]) AS ic(coll_oid)
      JOIN pg_catalog.pg_collation c ON c.oid = ic.coll_oid
      WHERE COALESCE(c.collcollate, '') = $1
        AND c.collprovider IN ('c', 'd')
        AND cls.relkind = 'i'
      ORDER BY n.nspname, cls.relname
    `,
      [collation]
    );
    return rows.map((row) => ({ schema: row.schema_name, name: row.index_name }));
  }
}
