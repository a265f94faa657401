import { BaselineRepository } from './repositories/baseline-repository.js';
import { CatalogRepository } from './repositories/catalog-repository.js';
import type { QualifiedName, Queryable } from './schema.js';

/**
 * Database access layer over one open connection, exposing the repositories
 * a collation check needs.
 */
export class CollationDatabase {
  // Repositories
  public readonly catalog: CatalogRepository;
  public readonly baseline: BaselineRepository;

  constructor(
    private conn: Queryable,
    baselineTable: QualifiedName
  ) {
    this.catalog = new CatalogRepository(this.conn);
    this.baseline = new BaselineRepository(this.conn, baselineTable);
  }

  getConnection(): Queryable {
    return this.conn;
  }
}
