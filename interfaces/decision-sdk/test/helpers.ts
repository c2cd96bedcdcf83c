import type { DecisionRecord, DecisionSink } from "../src";

export function makeRecord(overrides: Partial<DecisionRecord> = {}): DecisionRecord {
  return {
    decisionId: "decision-1",
    runId: "run-1",
    traceId: null,
    spanId: null,
    timestamp: "2024-05-01T10:00:00.000Z",
    actor: { type: "agent", id: "support-agent", name: null },
    subjectEntities: [],
    evidence: [],
    policies: [],
    approvals: [],
    actions: [],
    outcome: "committed",
    outcomeReason: null,
    precedentRefs: [],
    metadata: {},
    ...overrides
  };
}

export class MemorySink implements DecisionSink {
  readonly delivered: string[] = [];
  readonly failing = new Set<string>();
  closed = false;

  async deliver(record: DecisionRecord): Promise<void> {
    if (this.failing.has(record.decisionId)) {
      throw new Error("store offline");
    }
    this.delivered.push(record.decisionId);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
