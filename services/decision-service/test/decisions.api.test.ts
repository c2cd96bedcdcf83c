import { afterEach, expect, test } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../src/app";
import { InMemoryDecisionStore } from "../src/decisions/store";
import type { DecisionStore } from "../src/decisions/types";
import { FailingDecisionStore, FlakyDecisionStore, wireDecision } from "./helpers";

let app: FastifyInstance | null = null;

async function startApp(store: DecisionStore = new InMemoryDecisionStore()): Promise<FastifyInstance> {
  app = await buildApp({ store });
  return app;
}

afterEach(async () => {
  await app?.close();
  app = null;
});

test("posting a decision stores it and later posts update it", async () => {
  const server = await startApp();

  const created = await server.inject({ method: "POST", url: "/v1/decisions", payload: wireDecision() });
  expect(created.statusCode).toBe(200);
  expect(created.json()).toEqual({ decision_id: "decision-1", status: "created" });

  const updated = await server.inject({
    method: "POST",
    url: "/v1/decisions",
    payload: wireDecision({ run_id: "run-other", outcome: "denied", outcome_reason: "reversed by reviewer" })
  });
  expect(updated.json()).toEqual({ decision_id: "decision-1", status: "updated" });

  const fetched = await server.inject({ method: "GET", url: "/v1/decisions/decision-1" });
  expect(fetched.statusCode).toBe(200);
  const record = fetched.json();
  expect(record.run_id).toBe("run-1");
  expect(record.outcome).toBe("denied");
  expect(record.outcome_reason).toBe("reversed by reviewer");
  expect(record.actor).toEqual({ type: "agent", id: "support-agent", name: null });
  expect(record.actions[0].success).toBe(true);
});

test("malformed records are rejected with 422", async () => {
  const server = await startApp();

  const response = await server.inject({
    method: "POST",
    url: "/v1/decisions",
    headers: { "x-trace-id": "trace-test" },
    payload: { run_id: "run-1", outcome: "maybe" }
  });

  expect(response.statusCode).toBe(422);
  expect(response.json().message).toBe("Invalid decision record");
  expect(response.json().traceId).toBe("trace-test");
  expect(response.headers["x-trace-id"]).toBe("trace-test");
});

test("unknown decisions return 404", async () => {
  const server = await startApp();

  const record = await server.inject({
    method: "GET",
    url: "/v1/decisions/missing",
    headers: { "x-trace-id": "trace-test" }
  });
  expect(record.statusCode).toBe(404);
  expect(record.json()).toEqual({ message: "Decision not found", traceId: "trace-test" });

  const explanation = await server.inject({ method: "GET", url: "/v1/decisions/missing/explain" });
  expect(explanation.statusCode).toBe(404);
});

test("explain returns the chains and a markdown rendering", async () => {
  const server = await startApp();
  await server.inject({ method: "POST", url: "/v1/decisions", payload: wireDecision() });

  const response = await server.inject({ method: "GET", url: "/v1/decisions/decision-1/explain" });
  expect(response.statusCode).toBe(200);
  const explanation = response.json();
  expect(explanation.summary).toBe(
    "Gathered 1 pieces of evidence. Evaluated 1 policies (1 passed). Executed 1/1 actions. Outcome: committed."
  );
  expect(explanation.evidence_chain[0]).toEqual({
    step: 1,
    type: "observation",
    source: "get_account",
    tool: "get_account",
    retrieved_at: "2024-05-01T10:00:01.000Z",
    snapshot_hash: "abc123",
    summary: "Read from get_account"
  });
  expect(explanation.action_chain[0].summary).toBe("Executed billing.create_credit");

  const markdown = await server.inject({ method: "GET", url: "/v1/decisions/decision-1/explain?format=md" });
  expect(markdown.statusCode).toBe(200);
  expect(markdown.headers["content-type"]).toContain("text/markdown");
  expect(markdown.body.split("\n")[0]).toBe("# Decision Explanation: decision-1");
});

test("listing filters, orders newest first and paginates", async () => {
  const server = await startApp();
  await server.inject({
    method: "POST",
    url: "/v1/decisions",
    payload: wireDecision({ decision_id: "decision-a", timestamp: "2024-05-01T09:00:00.000Z" })
  });
  await server.inject({
    method: "POST",
    url: "/v1/decisions",
    payload: wireDecision({ decision_id: "decision-b", timestamp: "2024-05-01T11:00:00.000Z", outcome: "denied" })
  });
  await server.inject({
    method: "POST",
    url: "/v1/decisions",
    payload: wireDecision({ decision_id: "decision-c", run_id: "run-2", timestamp: "2024-05-01T10:00:00.000Z" })
  });

  const all = await server.inject({ method: "GET", url: "/v1/decisions" });
  expect(all.json().count).toBe(3);
  expect(all.json().decisions.map((row: { decision_id: string }) => row.decision_id)).toEqual([
    "decision-b",
    "decision-c",
    "decision-a"
  ]);
  expect(all.json().decisions[0]).toEqual({
    decision_id: "decision-b",
    run_id: "run-1",
    timestamp: "2024-05-01T11:00:00.000Z",
    outcome: "denied",
    actor_id: "support-agent"
  });

  const page = await server.inject({ method: "GET", url: "/v1/decisions?run_id=run-1&limit=1&offset=1" });
  expect(page.json().decisions.map((row: { decision_id: string }) => row.decision_id)).toEqual(["decision-a"]);

  const denied = await server.inject({ method: "GET", url: "/v1/decisions?outcome=denied" });
  expect(denied.json().count).toBe(1);

  const tooMany = await server.inject({ method: "GET", url: "/v1/decisions?limit=101" });
  expect(tooMany.statusCode).toBe(422);
});

test("precedent search matches on policy and tool", async () => {
  const server = await startApp();
  await server.inject({ method: "POST", url: "/v1/decisions", payload: wireDecision() });
  await server.inject({
    method: "POST",
    url: "/v1/decisions",
    payload: wireDecision({ decision_id: "decision-2", policies: [], timestamp: "2024-05-02T10:00:00.000Z" })
  });

  const byPolicy = await server.inject({
    method: "POST",
    url: "/v1/precedents/search",
    payload: { policy_id: "credit-limit" }
  });
  expect(byPolicy.statusCode).toBe(200);
  expect(byPolicy.json()).toEqual({
    precedents: [
      {
        decision_id: "decision-1",
        run_id: "run-1",
        timestamp: "2024-05-01T10:00:00.000Z",
        outcome: "committed",
        matching_policies: ["credit-limit"],
        matching_tools: ["billing.create_credit"]
      }
    ],
    count: 1
  });

  const byTool = await server.inject({
    method: "POST",
    url: "/v1/precedents/search",
    payload: { tool: "billing.create_credit", limit: 1 }
  });
  expect(byTool.json().precedents.map((row: { decision_id: string }) => row.decision_id)).toEqual(["decision-2"]);

  const tooMany = await server.inject({ method: "POST", url: "/v1/precedents/search", payload: { limit: 51 } });
  expect(tooMany.statusCode).toBe(422);
});

test("storage failures surface as 500 with the trace id", async () => {
  const server = await startApp(new FailingDecisionStore());

  const write = await server.inject({
    method: "POST",
    url: "/v1/decisions",
    headers: { "x-trace-id": "trace-test" },
    payload: wireDecision()
  });
  expect(write.statusCode).toBe(500);
  expect(write.json()).toEqual({ message: "Decision storage unavailable", traceId: "trace-test" });

  const ready = await server.inject({ method: "GET", url: "/ready" });
  expect(ready.statusCode).toBe(500);

  const health = await server.inject({ method: "GET", url: "/health" });
  expect(health.json()).toEqual({ status: "ok" });
});

test("unparseable JSON bodies are rejected with 422", async () => {
  const server = await startApp();

  const response = await server.inject({
    method: "POST",
    url: "/v1/decisions",
    headers: { "content-type": "application/json", "x-trace-id": "trace-test" },
    payload: "{not json"
  });

  expect(response.statusCode).toBe(422);
  expect(response.json()).toEqual({ message: "Malformed request body", traceId: "trace-test" });
});

test("a failed write is reported and not stored anywhere else", async () => {
  const server = await startApp(new FlakyDecisionStore(new InMemoryDecisionStore()));

  const failed = await server.inject({ method: "POST", url: "/v1/decisions", payload: wireDecision() });
  expect(failed.statusCode).toBe(500);

  const missing = await server.inject({ method: "GET", url: "/v1/decisions/decision-1" });
  expect(missing.statusCode).toBe(404);

  const retried = await server.inject({ method: "POST", url: "/v1/decisions", payload: wireDecision() });
  expect(retried.json()).toEqual({ decision_id: "decision-1", status: "created" });

  const fetched = await server.inject({ method: "GET", url: "/v1/decisions/decision-1" });
  expect(fetched.statusCode).toBe(200);
});

test("a generated trace id is the same in the header and the body", async () => {
  const server = await startApp();

  const response = await server.inject({ method: "GET", url: "/v1/decisions/missing" });

  expect(response.headers["x-trace-id"]).toMatch(/^[0-9a-f-]{36}$/);
  expect(response.json().traceId).toBe(response.headers["x-trace-id"]);
});
