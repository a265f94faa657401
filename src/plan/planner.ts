import { type BaselineRecord, type QualifiedName, quoteQualified } from '../db/schema.js';
import type { ProbeResult } from '../locale/fingerprint.js';
import {
  type PlanStatement,
  comment,
  createTable,
  insertBaseline,
  reindex,
  updateBaseline,
} from './statements.js';

/**
 * Collation value the catalog reports for "use the database default".
 */
export const DEFAULT_COLLATION = '';

/**
 * Locales with no on-disk collation data. Their ordering is bytewise and never changes.
 */
export const PSEUDO_LOCALES: ReadonlySet<string> = new Set(['C', 'POSIX']);

/**
 * - 'unseen': no baseline row yet
 * - 'changed': checksum differs from the baseline
 * - 'unchanged': checksum matches (path or mtime may still differ)
 */
export type LocaleStatus = 'unseen' | 'changed' | 'unchanged';

export type BaselineWrite = 'insert' | 'update';

export interface PlannedLocale {
  /** Locale whose LC_COLLATE file was probed */
  locale: string;
  /** Catalog collation values that resolved to this locale, in first-seen order */
  references: string[];
  probe: ProbeResult;
  previous: BaselineRecord | null;
  status: LocaleStatus;
  remediate: boolean;
  baselineWrite: BaselineWrite | null;
}

export interface RemediationPlan {
  statements: PlanStatement[];
  entries: PlannedLocale[];
  /** Human-readable notes, such as first-seen locales assumed to be good */
  notices: string[];
  /** Indexes scheduled for rebuild, in plan order */
  reindexed: QualifiedName[];
}

export interface PlanInput {
  /** Distinct collation values referenced by indexes, as the catalog reports them */
  referencedCollations: readonly string[];
  resolveDefaultCollation: () => Promise<string>;
  probe: (locale: string) => Promise<ProbeResult>;
  lookupBaseline: (locale: string) => Promise<BaselineRecord | undefined>;
  /** Indexes depending on a literal catalog collation value */
  lookupIndexes: (reference: string) => Promise<QualifiedName[]>;
  assumeGoodOnFirstSeen: boolean;
  baselineTableExists: boolean;
  baselineTable: QualifiedName;
  log?: (msg: string) => void;
}

interface PendingLocale {
  locale: string;
  references: string[];
}

export function isPseudoLocale(locale: string): boolean {
  return PSEUDO_LOCALES.has(locale);
}

/**
 * Map catalog collation values to the locales that have LC_COLLATE files,
 * merging references that land on the same locale.
 */
export async function collectEffectiveLocales(
  referencedCollations: readonly string[],
  resolveDefaultCollation: () => Promise<string>
): Promise<PendingLocale[]> {
  let defaultCollation: string | undefined;
  const byLocale = new Map<string, PendingLocale>();

  for (const reference of referencedCollations) {
    if (isPseudoLocale(reference)) continue;

    let locale = reference;
    if (reference === DEFAULT_COLLATION) {
      // fixed for the lifetime of the database, so one query per run
      if (defaultCollation === undefined) {
        defaultCollation = await resolveDefaultCollation();
      }
      locale = defaultCollation;
    }
    if (locale === '' || isPseudoLocale(locale)) continue;

    const pending = byLocale.get(locale);
    if (pending) {
      if (!pending.references.includes(reference)) pending.references.push(reference);
    } else {
      byLocale.set(locale, { locale, references: [reference] });
    }
  }

  return [...byLocale.values()];
}

function classify(probe: ProbeResult, previous: BaselineRecord | undefined): LocaleStatus {
  if (!previous) return 'unseen';
  return previous.checksum === probe.checksum ? 'unchanged' : 'changed';
}

function firstSeenNotice(locale: string): string {
  return `${locale}: first seen, assuming dependent indexes are consistent`;
}

function metadataDiffers(probe: ProbeResult, previous: BaselineRecord): boolean {
  return previous.path !== probe.path || previous.modified !== probe.modified;
}

/**
 * Build the remediation plan for one run.
 *
 * Every locale file is probed before anything is classified, and every
 * REINDEX precedes every baseline write, so an aborted run never records a
 * checksum for a locale whose indexes were not rebuilt. A locale file can
 * still change between probing and the moment the REINDEX statements run;
 * nothing here guards against that window.
 *
 * Any resolution or probe failure rejects the whole call: no partial plan.
 */
export async function planRemediation(input: PlanInput): Promise<RemediationPlan> {
  const log = input.log ?? (() => {});

  // 1. Effective locales
  const pending = await collectEffectiveLocales(input.referencedCollations, input.resolveDefaultCollation);

  // 2. Probe everything up front
  const probed: Array<PendingLocale & { probe: ProbeResult }> = [];
  for (const p of pending) {
    log(`Probing ${p.locale}`);
    probed.push({ ...p, probe: await input.probe(p.locale) });
  }

  // 3. Classify
  const entries: PlannedLocale[] = [];
  const notices: string[] = [];
  for (const p of probed) {
    const previous = await input.lookupBaseline(p.locale);
    const status = classify(p.probe, previous);

    let remediate = false;
    let baselineWrite: BaselineWrite | null = null;
    if (status === 'unseen') {
      baselineWrite = 'insert';
      if (input.assumeGoodOnFirstSeen) {
        notices.push(firstSeenNotice(p.locale));
      } else {
        remediate = true;
      }
    } else if (status === 'changed') {
      remediate = true;
      baselineWrite = 'update';
    } else if (previous && metadataDiffers(p.probe, previous)) {
      baselineWrite = 'update';
    }

    log(`${p.locale}: ${status}${remediate ? ', needs rebuild' : ''}`);
    entries.push({ ...p, previous: previous ?? null, status, remediate, baselineWrite });
  }

  // 4. Remediation, each index at most once
  const statements: PlanStatement[] = [];
  const reindexed: QualifiedName[] = [];
  const emitted = new Set<string>();
  for (const entry of entries) {
    if (entry.status === 'unseen' && !entry.remediate) {
      statements.push(comment(firstSeenNotice(entry.locale)));
      continue;
    }
    if (!entry.remediate) continue;

    const reason =
      entry.status === 'unseen'
        ? 'no recorded checksum'
        : `checksum changed from ${entry.previous?.checksum ?? '?'} to ${entry.probe.checksum}`;
    statements.push(comment(`${entry.locale}: ${reason}, rebuilding dependent indexes`));

    for (const reference of entry.references) {
      const indexes = await input.lookupIndexes(reference);
      for (const index of indexes) {
        const key = quoteQualified(index);
        if (emitted.has(key)) continue;
        emitted.add(key);
        reindexed.push(index);
        statements.push(reindex(index));
      }
    }
  }

  // 5. Baseline writes, strictly after all remediation
  const writes: PlanStatement[] = [];
  for (const entry of entries) {
    if (!entry.baselineWrite) continue;
    const record: BaselineRecord = {
      locale: entry.locale,
      path: entry.probe.path,
      modified: entry.probe.modified,
      checksum: entry.probe.checksum,
    };
    writes.push(
      entry.baselineWrite === 'insert'
        ? insertBaseline(input.baselineTable, record)
        : updateBaseline(input.baselineTable, record)
    );
  }
  if (writes.length > 0) {
    statements.push(comment('recording current collation checksums'), ...writes);
  }

  // 6. Baseline table goes first
  if (!input.baselineTableExists) {
    statements.unshift(createTable(input.baselineTable));
  }

  return { statements, entries, notices, reindexed };
}

/**
 * True when the plan does more than create the baseline table or touch metadata.
 */
export function needsRemediation(plan: RemediationPlan): boolean {
  return plan.reindexed.length > 0;
}
