import type { DecisionRecord, Outcome } from "../model/types";

export type PrecedentQuery = {
  policyId?: string;
  tool?: string;
  outcome?: Outcome;
  limit?: number;
};

export type Precedent = {
  decisionId: string;
  runId: string;
  timestamp: string;
  outcome: Outcome;
  matchingPolicies: string[];
  matchingTools: string[];
};

function newestFirst(a: DecisionRecord, b: DecisionRecord): number {
  const timeDiff = new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime();
  if (timeDiff !== 0) {
    return timeDiff;
  }
  return a.decisionId.localeCompare(b.decisionId);
}

export function matchesPrecedent(record: DecisionRecord, query: PrecedentQuery): boolean {
  if (query.outcome && record.outcome !== query.outcome) {
    return false;
  }
  if (query.policyId && !record.policies.some((policy) => policy.policyId === query.policyId)) {
    return false;
  }
  if (query.tool && !record.actions.some((action) => action.tool === query.tool)) {
    return false;
  }
  return true;
}

/** Past decisions that used the same policy or tool, newest first. For comparison only. */
export function matchPrecedents(records: DecisionRecord[], query: PrecedentQuery = {}): Precedent[] {
  const limit = query.limit ?? 10;
  return records
    .filter((record) => matchesPrecedent(record, query))
    .slice()
    .sort(newestFirst)
    .slice(0, limit)
    .map((record) => ({
      decisionId: record.decisionId,
      runId: record.runId,
      timestamp: record.timestamp,
      outcome: record.outcome,
      matchingPolicies: record.policies.map((policy) => policy.policyId),
      matchingTools: record.actions.map((action) => action.tool)
    }));
}
