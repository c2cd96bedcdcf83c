import { Pool } from "pg";
import { config } from "../config";
import { logger } from "../logger";

let pool: Pool | null = null;

export function getDb(): Pool {
  if (!pool) {
    pool = new Pool({
      host: config.db.host,
      port: config.db.port,
      user: config.db.user,
      password: config.db.password,
      database: config.db.database
    });
  }
  return pool;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

const MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS decision_records (
     decision_id TEXT PRIMARY KEY,
     run_id TEXT NOT NULL,
     tenant_id TEXT NOT NULL DEFAULT 'default',
     trace_id TEXT,
     span_id TEXT,
     timestamp TIMESTAMPTZ NOT NULL,
     actor JSONB,
     actor_id TEXT,
     outcome TEXT NOT NULL,
     outcome_reason TEXT,
     subject_entities JSONB NOT NULL DEFAULT '[]',
     evidence JSONB NOT NULL DEFAULT '[]',
     policies JSONB NOT NULL DEFAULT '[]',
     approvals JSONB NOT NULL DEFAULT '[]',
     actions JSONB NOT NULL DEFAULT '[]',
     precedent_refs JSONB NOT NULL DEFAULT '[]',
     metadata JSONB NOT NULL DEFAULT '{}',
     created_at TIMESTAMPTZ DEFAULT NOW(),
     updated_at TIMESTAMPTZ DEFAULT NOW()
   )`,
  "CREATE INDEX IF NOT EXISTS idx_decisions_run_id ON decision_records(run_id)",
  "CREATE INDEX IF NOT EXISTS idx_decisions_timestamp ON decision_records(timestamp)",
  "CREATE INDEX IF NOT EXISTS idx_decisions_outcome ON decision_records(outcome)",
  "CREATE INDEX IF NOT EXISTS idx_decisions_tenant ON decision_records(tenant_id)",
  "CREATE INDEX IF NOT EXISTS idx_decisions_policies ON decision_records USING GIN(policies)",
  "CREATE INDEX IF NOT EXISTS idx_decisions_actions ON decision_records USING GIN(actions)"
];

export async function migrate(): Promise<void> {
  if (config.useInMemoryStore) {
    logger.warn({ traceId: "system" }, "In-memory store enabled; skipping migrations");
    return;
  }
  const db = getDb();
  for (const statement of MIGRATIONS) {
    await db.query(statement);
  }
  logger.info({ traceId: "system" }, "Decision storage ready");
}
