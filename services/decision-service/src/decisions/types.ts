import type { DecisionRecord, Outcome, Precedent, PrecedentQuery } from "@decision-ledger/sdk";

export type UpsertStatus = "created" | "updated";

export type DecisionUpsertResult = {
  decisionId: string;
  status: UpsertStatus;
};

export type DecisionListFilters = {
  runId?: string;
  outcome?: Outcome;
  limit: number;
  offset: number;
};

export type DecisionStore = {
  /** Later writes replace evidence, policies, approvals, actions and the outcome only. */
  upsertDecision(record: DecisionRecord): Promise<DecisionUpsertResult>;
  getDecision(decisionId: string): Promise<DecisionRecord | null>;
  listDecisions(filters: DecisionListFilters): Promise<DecisionRecord[]>;
  searchPrecedents(query: PrecedentQuery): Promise<Precedent[]>;
  ping(): Promise<void>;
};
