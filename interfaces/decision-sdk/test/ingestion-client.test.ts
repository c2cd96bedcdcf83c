import { expect, test } from "vitest";
import { IngestError, IngestionClient } from "../src";
import { MemorySink, makeRecord } from "./helpers";

test("delivered records are not queued", async () => {
  const sink = new MemorySink();
  const client = new IngestionClient({ sink });

  await expect(client.ingest(makeRecord())).resolves.toBe(true);
  expect(sink.delivered).toEqual(["decision-1"]);
  expect(client.failedCount).toBe(0);
});

test("failed deliveries are queued and reported as false", async () => {
  const sink = new MemorySink();
  sink.failing.add("decision-1");
  const client = new IngestionClient({ sink });

  await expect(client.ingest(makeRecord())).resolves.toBe(false);
  expect(client.pendingDecisionIds()).toEqual(["decision-1"]);
});

test("raiseOnError surfaces the failure after queueing the record", async () => {
  const sink = new MemorySink();
  sink.failing.add("decision-1");
  const client = new IngestionClient({ sink, raiseOnError: true });

  const failure = client.ingest(makeRecord());
  await expect(failure).rejects.toBeInstanceOf(IngestError);
  await expect(failure).rejects.toThrow("Failed to ingest decision: store offline");
  expect(client.failedCount).toBe(1);
});

test("a full queue drops the oldest record", async () => {
  const sink = new MemorySink();
  ["decision-1", "decision-2", "decision-3"].forEach((id) => sink.failing.add(id));
  const client = new IngestionClient({ sink, maxFailedQueue: 2 });

  await client.ingest(makeRecord({ decisionId: "decision-1" }));
  await client.ingest(makeRecord({ decisionId: "decision-2" }));
  await client.ingest(makeRecord({ decisionId: "decision-3" }));

  expect(client.pendingDecisionIds()).toEqual(["decision-2", "decision-3"]);
});

test("retryFailed delivers oldest first and keeps what still fails", async () => {
  const sink = new MemorySink();
  ["decision-1", "decision-2", "decision-3"].forEach((id) => sink.failing.add(id));
  const client = new IngestionClient({ sink });

  await client.ingest(makeRecord({ decisionId: "decision-1" }));
  await client.ingest(makeRecord({ decisionId: "decision-2" }));
  await client.ingest(makeRecord({ decisionId: "decision-3" }));

  sink.failing.delete("decision-1");
  sink.failing.delete("decision-3");

  await expect(client.retryFailed()).resolves.toBe(2);
  expect(sink.delivered).toEqual(["decision-1", "decision-3"]);
  expect(client.pendingDecisionIds()).toEqual(["decision-2"]);
});

test("retrying an empty queue does nothing", async () => {
  const sink = new MemorySink();
  const client = new IngestionClient({ sink });

  await expect(client.retryFailed()).resolves.toBe(0);
  expect(sink.delivered).toEqual([]);
});

test("close closes the sink", async () => {
  const sink = new MemorySink();
  const client = new IngestionClient({ sink });

  await client.close();
  expect(sink.closed).toBe(true);
});
