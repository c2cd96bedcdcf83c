import { IngestError, SinkConnectionError, errorMessage } from "../errors";
import { toWire } from "../model/wire";
import type { DecisionRecord } from "../model/types";

/** Where finalized records go. Stores behind a sink must upsert on decision id. */
export type DecisionSink = {
  deliver: (record: DecisionRecord) => Promise<void>;
  close?: () => Promise<void>;
};

export type HttpDecisionSinkOptions = {
  serverUrl: string;
  apiKey?: string | null;
  tenantId?: string;
  timeoutMs?: number;
  traceId?: string;
};

export class HttpDecisionSink implements DecisionSink {
  private readonly endpoint: string;

  constructor(private readonly options: HttpDecisionSinkOptions) {
    this.endpoint = `${options.serverUrl.replace(/\/+$/, "")}/v1/decisions`;
  }

  async deliver(record: DecisionRecord): Promise<void> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
    }
    if (this.options.tenantId) {
      headers["x-tenant-id"] = this.options.tenantId;
    }
    if (record.traceId) {
      headers["x-trace-id"] = record.traceId;
    }

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify(toWire(record)),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 30_000)
      });
    } catch (error) {
      throw new SinkConnectionError(`Failed to connect to ${this.endpoint}: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new IngestError(`HTTP ${response.status}: ${body}`, record.decisionId);
    }
  }
}

export type DecisionUpsertTarget = {
  upsertDecision: (record: DecisionRecord) => Promise<unknown>;
};

/** Local mode: writes straight into a store instead of going over HTTP. */
export class StoreDecisionSink implements DecisionSink {
  constructor(private readonly store: DecisionUpsertTarget) {}

  async deliver(record: DecisionRecord): Promise<void> {
    await this.store.upsertDecision(record);
  }
}
