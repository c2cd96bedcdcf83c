import {
  matchPrecedents,
  parseDecisionRecord,
  toWire,
  type DecisionRecord,
  type Precedent,
  type PrecedentQuery
} from "@decision-ledger/sdk";
import type { Pool } from "pg";
import { config } from "../config";
import { getDb } from "../db";
import type { DecisionListFilters, DecisionStore, DecisionUpsertResult } from "./types";

type DecisionRow = {
  decision_id: string;
  run_id: string;
  trace_id: string | null;
  span_id: string | null;
  timestamp: Date | string;
  actor: unknown;
  outcome: string;
  outcome_reason: string | null;
  subject_entities: unknown;
  evidence: unknown;
  policies: unknown;
  approvals: unknown;
  actions: unknown;
  precedent_refs: unknown;
  metadata: unknown;
};

const RECORD_COLUMNS = `decision_id, run_id, trace_id, span_id, timestamp, actor, outcome, outcome_reason,
  subject_entities, evidence, policies, approvals, actions, precedent_refs, metadata`;

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

function mapRow(row: DecisionRow): DecisionRecord {
  return parseDecisionRecord({ ...row, timestamp: toIso(row.timestamp) });
}

/** The decision id is already stored under another tenant. */
export class DecisionConflictError extends Error {
  readonly statusCode = 409;

  constructor(readonly decisionId: string) {
    super(`Decision ${decisionId} already exists`);
    this.name = "DecisionConflictError";
  }
}

export class PostgresDecisionStore implements DecisionStore {
  constructor(
    private readonly pool: Pool = getDb(),
    private readonly tenantId: string = config.tenantId
  ) {}

  async upsertDecision(record: DecisionRecord): Promise<DecisionUpsertResult> {
    const wire = toWire(record);
    const result = await this.pool.query<{ inserted: boolean }>(
      `INSERT INTO decision_records
       (decision_id, run_id, tenant_id, trace_id, span_id, timestamp, actor, actor_id, outcome, outcome_reason,
        subject_entities, evidence, policies, approvals, actions, precedent_refs, metadata)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$16,$17)
       ON CONFLICT (decision_id) DO UPDATE SET
         evidence = EXCLUDED.evidence,
         policies = EXCLUDED.policies,
         approvals = EXCLUDED.approvals,
         actions = EXCLUDED.actions,
         outcome = EXCLUDED.outcome,
         outcome_reason = EXCLUDED.outcome_reason,
         updated_at = NOW()
       WHERE decision_records.tenant_id = EXCLUDED.tenant_id
       RETURNING (xmax = 0) AS inserted`,
      [
        wire.decision_id,
        wire.run_id,
        this.tenantId,
        wire.trace_id,
        wire.span_id,
        wire.timestamp,
        wire.actor ? JSON.stringify(wire.actor) : null,
        wire.actor?.id ?? null,
        wire.outcome,
        wire.outcome_reason,
        JSON.stringify(wire.subject_entities),
        JSON.stringify(wire.evidence),
        JSON.stringify(wire.policies),
        JSON.stringify(wire.approvals),
        JSON.stringify(wire.actions),
        JSON.stringify(wire.precedent_refs),
        JSON.stringify(wire.metadata)
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new DecisionConflictError(record.decisionId);
    }
    return { decisionId: record.decisionId, status: row.inserted ? "created" : "updated" };
  }

  async getDecision(decisionId: string): Promise<DecisionRecord | null> {
    const result = await this.pool.query<DecisionRow>(
      `SELECT ${RECORD_COLUMNS} FROM decision_records WHERE decision_id = $1 AND tenant_id = $2`,
      [decisionId, this.tenantId]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async listDecisions(filters: DecisionListFilters): Promise<DecisionRecord[]> {
    const result = await this.pool.query<DecisionRow>(
      `SELECT ${RECORD_COLUMNS}
       FROM decision_records
       WHERE tenant_id = $1
         AND ($2::text IS NULL OR run_id = $2)
         AND ($3::text IS NULL OR outcome = $3)
       ORDER BY timestamp DESC, decision_id ASC
       LIMIT $4 OFFSET $5`,
      [this.tenantId, filters.runId ?? null, filters.outcome ?? null, filters.limit, filters.offset]
    );
    return result.rows.map(mapRow);
  }

  async searchPrecedents(query: PrecedentQuery): Promise<Precedent[]> {
    const result = await this.pool.query<DecisionRow>(
      `SELECT ${RECORD_COLUMNS}
       FROM decision_records
       WHERE tenant_id = $1
         AND ($2::text IS NULL OR policies @> jsonb_build_array(jsonb_build_object('policy_id', $2::text)))
         AND ($3::text IS NULL OR actions @> jsonb_build_array(jsonb_build_object('tool', $3::text)))
         AND ($4::text IS NULL OR outcome = $4)
       ORDER BY timestamp DESC, decision_id ASC
       LIMIT $5`,
      [this.tenantId, query.policyId ?? null, query.tool ?? null, query.outcome ?? null, query.limit ?? 10]
    );
    return matchPrecedents(result.rows.map(mapRow), query);
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }
}
