import type { Queryable } from '../db/schema.js';
import { DatabaseError } from '../errors.js';
import type { RemediationPlan } from './planner.js';
import { SAFETY_PRAGMA, renderStatement, toQuery } from './statements.js';

/**
 * The plan as a psql script, one line per statement.
 */
export function formatPlan(plan: RemediationPlan): string[] {
  return [SAFETY_PRAGMA, ...plan.statements.map(renderStatement)];
}

export interface ExecuteResult {
  executed: number;
}

/**
 * Run every statement of the plan in a single transaction. Either all index
 * rebuilds and baseline writes commit together, or none do.
 */
export async function executePlan(
  plan: RemediationPlan,
  db: Queryable,
  log: (msg: string) => void = () => {}
): Promise<ExecuteResult> {
  let executed = 0;
  await db.query('BEGIN');
  try {
    for (const stmt of plan.statements) {
      const query = toQuery(stmt);
      if (!query) continue;
      log(renderStatement(stmt));
      await db.query(query.text, query.values);
      executed++;
    }
    await db.query('COMMIT');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    try {
      await db.query('ROLLBACK');
    } catch (rollbackError) {
      const reason = rollbackError instanceof Error ? rollbackError.message : String(rollbackError);
      log(`ROLLBACK failed: ${reason}`);
      throw new DatabaseError(`Plan execution failed, rollback also failed: ${message}`, { cause: error });
    }
    throw new DatabaseError(`Plan execution failed, transaction rolled back: ${message}`, { cause: error });
  }
  return { executed };
}
