import type { DecisionRecord, Precedent, PrecedentQuery } from "@decision-ledger/sdk";
import type { DecisionListFilters, DecisionStore, DecisionUpsertResult } from "../src/decisions/types";

export function wireDecision(overrides: Record<string, unknown> = {}) {
  return {
    decision_id: "decision-1",
    run_id: "run-1",
    timestamp: "2024-05-01T10:00:00.000Z",
    actor: { type: "agent", id: "support-agent" },
    evidence: [
      {
        evidence_id: "ev-1",
        source: "get_account",
        retrieved_at: "2024-05-01T10:00:01.000Z",
        snapshot: { tier: "gold" },
        snapshot_hash: "abc123",
        tool_name: "get_account"
      }
    ],
    policies: [{ policy_id: "credit-limit", version: "2.1", result: "pass" }],
    actions: [
      {
        action_id: "act-1",
        tool: "billing.create_credit",
        committed_at: "2024-05-01T10:00:02.000Z",
        params: { amount: 50 }
      }
    ],
    outcome: "committed",
    ...overrides
  };
}

export class FailingDecisionStore implements DecisionStore {
  async upsertDecision(_record: DecisionRecord): Promise<DecisionUpsertResult> {
    throw new Error("connection refused");
  }

  async getDecision(_decisionId: string): Promise<DecisionRecord | null> {
    throw new Error("connection refused");
  }

  async listDecisions(): Promise<DecisionRecord[]> {
    throw new Error("connection refused");
  }

  async searchPrecedents(): Promise<Precedent[]> {
    throw new Error("connection refused");
  }

  async ping(): Promise<void> {
    throw new Error("connection refused");
  }
}

/** Fails the first `failures` writes, then stores normally. */
export class FlakyDecisionStore implements DecisionStore {
  private remainingFailures: number;

  constructor(
    private readonly inner: DecisionStore,
    failures = 1
  ) {
    this.remainingFailures = failures;
  }

  async upsertDecision(record: DecisionRecord): Promise<DecisionUpsertResult> {
    if (this.remainingFailures > 0) {
      this.remainingFailures -= 1;
      throw new Error("connection refused");
    }
    return this.inner.upsertDecision(record);
  }

  getDecision(decisionId: string): Promise<DecisionRecord | null> {
    return this.inner.getDecision(decisionId);
  }

  listDecisions(filters: DecisionListFilters): Promise<DecisionRecord[]> {
    return this.inner.listDecisions(filters);
  }

  searchPrecedents(query: PrecedentQuery): Promise<Precedent[]> {
    return this.inner.searchPrecedents(query);
  }

  ping(): Promise<void> {
    return this.inner.ping();
  }
}
