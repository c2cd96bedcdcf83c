import { expect, test } from "vitest";
import { ZodError } from "zod";
import { fromWire, parseDecisionRecord, serializeDecisionRecord, toWire } from "../src";
import { makeRecord } from "./helpers";

test("minimal payloads are filled with defaults", () => {
  const record = parseDecisionRecord({
    decision_id: "decision-9",
    run_id: "run-9",
    timestamp: "2024-05-01T10:00:00+02:00",
    outcome: "pending"
  });

  expect(record).toEqual({
    decisionId: "decision-9",
    runId: "run-9",
    traceId: null,
    spanId: null,
    timestamp: "2024-05-01T10:00:00+02:00",
    actor: null,
    subjectEntities: [],
    evidence: [],
    policies: [],
    approvals: [],
    actions: [],
    outcome: "pending",
    outcomeReason: null,
    precedentRefs: [],
    metadata: {}
  });
});

test("unknown outcomes and malformed timestamps are rejected", () => {
  expect(() =>
    parseDecisionRecord({ decision_id: "d", run_id: "r", timestamp: "2024-05-01T10:00:00Z", outcome: "maybe" })
  ).toThrow(ZodError);
  expect(() =>
    parseDecisionRecord({ decision_id: "d", run_id: "r", timestamp: "yesterday", outcome: "committed" })
  ).toThrow(ZodError);
});

test("nested entries convert between camelCase and snake_case", () => {
  const record = makeRecord({
    outcomeReason: "needs review",
    actions: [
      {
        actionId: "act-1",
        tool: "crm.update_contact",
        operation: "update",
        targetEntity: { namespace: "crm", type: "contact", id: "7", aliases: ["c-7"] },
        committedAt: "2024-05-01T10:00:02.000Z",
        params: { email: "new@example.com" },
        result: { ok: true },
        success: true
      }
    ]
  });

  const wire = toWire(record);
  expect(wire.actions[0]).toEqual({
    action_id: "act-1",
    tool: "crm.update_contact",
    operation: "update",
    target_entity: { namespace: "crm", type: "contact", id: "7", aliases: ["c-7"] },
    committed_at: "2024-05-01T10:00:02.000Z",
    params: { email: "new@example.com" },
    result: { ok: true },
    success: true
  });
  expect(fromWire(wire)).toEqual(record);
  expect(parseDecisionRecord(JSON.parse(serializeDecisionRecord(record)))).toEqual(record);
});
