import { matchPrecedents, type DecisionRecord, type Precedent, type PrecedentQuery } from "@decision-ledger/sdk";
import { config } from "../config";
import { PostgresDecisionStore } from "./store.pg";
import type { DecisionListFilters, DecisionStore, DecisionUpsertResult } from "./types";

function sortNewestFirst(a: DecisionRecord, b: DecisionRecord): number {
  const timeDiff = Date.parse(b.timestamp) - Date.parse(a.timestamp);
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.decisionId.localeCompare(b.decisionId);
}

export class InMemoryDecisionStore implements DecisionStore {
  private readonly records = new Map<string, DecisionRecord>();

  async upsertDecision(record: DecisionRecord): Promise<DecisionUpsertResult> {
    const existing = this.records.get(record.decisionId);
    if (!existing) {
      this.records.set(record.decisionId, structuredClone(record));
      return { decisionId: record.decisionId, status: "created" };
    }
    this.records.set(record.decisionId, {
      ...existing,
      evidence: structuredClone(record.evidence),
      policies: structuredClone(record.policies),
      approvals: structuredClone(record.approvals),
      actions: structuredClone(record.actions),
      outcome: record.outcome,
      outcomeReason: record.outcomeReason
    });
    return { decisionId: record.decisionId, status: "updated" };
  }

  async getDecision(decisionId: string): Promise<DecisionRecord | null> {
    const record = this.records.get(decisionId);
    return record ? structuredClone(record) : null;
  }

  async listDecisions(filters: DecisionListFilters): Promise<DecisionRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => (filters.runId ? record.runId === filters.runId : true))
      .filter((record) => (filters.outcome ? record.outcome === filters.outcome : true))
      .sort(sortNewestFirst)
      .slice(filters.offset, filters.offset + filters.limit)
      .map((record) => structuredClone(record));
  }

  async searchPrecedents(query: PrecedentQuery): Promise<Precedent[]> {
    return matchPrecedents(Array.from(this.records.values()), query);
  }

  async ping(): Promise<void> {}
}

export function createDecisionStore(): DecisionStore {
  if (config.useInMemoryStore) {
    return new InMemoryDecisionStore();
  }
  return new PostgresDecisionStore();
}
