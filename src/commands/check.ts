import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { type CheckConfig, LOCALE_PATH_ENV, resolveConfig, resolveLocaleRoot } from '../config.js';
import { withConnection } from '../db/connection.js';
import { CollationDatabase } from '../db/database-facade.js';
import { DEFAULT_BASELINE_SCHEMA, DEFAULT_BASELINE_TABLE, formatQualified } from '../db/schema.js';
import { isCollwatchError } from '../errors.js';
import { runCollationCheck } from '../plan/collation-check.js';
import { executePlan, formatPlan } from '../plan/emitter.js';
import { type RemediationPlan, needsRemediation } from '../plan/planner.js';

export default class Check extends Command {
  static override description =
    'Detect LC_COLLATE files that changed since the last recorded checksum and rebuild the indexes that depend on them';

  static override examples = [
    '<%= config.bin %> postgresql://localhost/app',
    '<%= config.bin %> postgresql://localhost/app | psql postgresql://localhost/app',
    '<%= config.bin %> postgresql://localhost/app --now',
    '<%= config.bin %> postgresql://localhost/app --assume-good --now',
    '<%= config.bin %> "host=db1 dbname=app" --locale-path /usr/share/locale --schema ops --table collation_sums',
  ];

  static override args = {
    connection: Args.string({
      description: 'libpq connection string or URI of the database to check',
    }),
  };

  static override flags = {
    now: Flags.boolean({
      description: 'Execute the statements in one transaction instead of only printing them',
      default: false,
    }),
    'assume-good': Flags.boolean({
      description: 'Treat first-seen locales as consistent: record their checksums without rebuilding',
      default: false,
    }),
    'locale-path': Flags.string({
      description: `Directory holding <locale>/LC_COLLATE files (env: ${LOCALE_PATH_ENV}; default: first existing system path)`,
    }),
    table: Flags.string({
      description: 'Baseline checksum table',
      default: DEFAULT_BASELINE_TABLE,
    }),
    schema: Flags.string({
      description: 'Schema of the baseline checksum table',
      default: DEFAULT_BASELINE_SCHEMA,
    }),
    verbose: Flags.boolean({
      description: 'Detailed progress on stderr',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    let config: CheckConfig;
    let localeRoot: string;
    try {
      const { args, flags } = await this.parse(Check);
      config = resolveConfig(args, flags);
      localeRoot = await resolveLocaleRoot(config.localePath);
    } catch (error) {
      this.fail(error);
    }

    const verboseLog = (msg: string) => {
      if (config.verbose) this.logToStderr(chalk.gray(`  ${msg}`));
    };
    verboseLog(`Locale root: ${localeRoot}`);
    verboseLog(`Baseline table: ${formatQualified(config.baselineTable)}`);

    try {
      await withConnection(config.connectionString, async (client) => {
        const db = new CollationDatabase(client, config.baselineTable);
        const plan = await runCollationCheck(db, {
          localeRoot,
          assumeGood: config.assumeGood,
          log: verboseLog,
        });

        for (const notice of plan.notices) {
          this.logToStderr(chalk.yellow(notice));
        }

        if (plan.statements.length === 0) {
          this.logToStderr(chalk.green('No collation changes detected. Nothing to do.'));
          return;
        }

        for (const line of formatPlan(plan)) {
          this.log(line);
        }

        if (config.execute) {
          const { executed } = await executePlan(plan, db.getConnection(), verboseLog);
          this.logToStderr(chalk.green(`Executed ${executed} statement(s).`));
        }
        this.logToStderr(chalk.white(summarize(plan)));
      });
    } catch (error) {
      this.fail(error);
    }
  }

  private fail(error: unknown): never {
    if (isCollwatchError(error)) {
      this.error(chalk.red(error.message), { exit: 1 });
    }
    const message = error instanceof Error ? error.message : String(error);
    this.error(chalk.red(`Unexpected error: ${message}`), { exit: 1 });
  }
}

export function summarize(plan: RemediationPlan): string {
  const count = (status: string) => plan.entries.filter((e) => e.status === status).length;
  const rebuild = needsRemediation(plan) ? `${plan.reindexed.length} index(es) to rebuild` : 'no indexes to rebuild';
  return (
    `Locales: ${plan.entries.length} checked, ${count('changed')} changed, ${count('unseen')} unseen, ` +
    `${count('unchanged')} unchanged; ${rebuild}`
  );
}
