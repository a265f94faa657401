import type { CollationDatabase } from '../db/database-facade.js';
import type { BaselineRecord } from '../db/schema.js';
import { type ProbeResult, probeLocale } from '../locale/index.js';
import { type RemediationPlan, planRemediation } from './planner.js';

export interface CollationCheckOptions {
  localeRoot: string;
  assumeGood: boolean;
  /** Replaces the filesystem prober, mostly for tests */
  probe?: (locale: string) => Promise<ProbeResult>;
  log?: (msg: string) => void;
}

/**
 * Gather catalog and baseline state from the database and plan the run.
 * Only reads; nothing is written until the plan is executed.
 */
export async function runCollationCheck(db: CollationDatabase, options: CollationCheckOptions): Promise<RemediationPlan> {
  const referencedCollations = await db.catalog.getReferencedCollations();
  const baselineTableExists = await db.baseline.exists();
  const baseline = baselineTableExists ? await db.baseline.getAll() : new Map<string, BaselineRecord>();

  return planRemediation({
    referencedCollations,
    resolveDefaultCollation: () => db.catalog.getDefaultCollation(),
    probe: options.probe ?? ((locale) => probeLocale(options.localeRoot, locale)),
    lookupBaseline: async (locale) => baseline.get(locale),
    lookupIndexes: (reference) => db.catalog.getIndexesForCollation(reference),
    assumeGoodOnFirstSeen: options.assumeGood,
    baselineTableExists,
    baselineTable: db.baseline.table,
    log: options.log,
  });
}
