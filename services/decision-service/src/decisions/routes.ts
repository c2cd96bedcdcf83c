import type { FastifyError, FastifyInstance } from "fastify";
import { z } from "zod";
import {
  buildExplanation,
  buildExplanationMarkdown,
  decisionRecordWireSchema,
  errorMessage,
  fromWire,
  outcomeSchema,
  serializeExplanation,
  toWire,
  type Precedent
} from "@decision-ledger/sdk";
import { requestLogger } from "../trace/trace";
import type { DecisionStore } from "./types";

const decisionParamsSchema = z.object({
  id: z.string().min(1)
});

const explainQuerySchema = z.object({
  format: z.enum(["json", "md"]).default("json")
});

const listQuerySchema = z.object({
  run_id: z.string().min(1).optional(),
  outcome: outcomeSchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0)
});

const precedentSearchSchema = z.object({
  policy_id: z.string().min(1).optional(),
  tool: z.string().min(1).optional(),
  outcome: outcomeSchema.optional(),
  limit: z.coerce.number().int().min(1).max(50).default(10)
});

function serializePrecedent(precedent: Precedent) {
  return {
    decision_id: precedent.decisionId,
    run_id: precedent.runId,
    timestamp: precedent.timestamp,
    outcome: precedent.outcome,
    matching_policies: precedent.matchingPolicies,
    matching_tools: precedent.matchingTools
  };
}

const MALFORMED_BODY_CODES: ReadonlySet<string> = new Set(["FST_ERR_CTP_EMPTY_JSON_BODY", "FST_ERR_CTP_INVALID_JSON_BODY"]);

// Fastify's JSON parser rethrows JSON.parse's SyntaxError with a 400.
function isBodyParseError(error: FastifyError): boolean {
  return error instanceof SyntaxError || MALFORMED_BODY_CODES.has(error.code);
}

export type DecisionRoutesOptions = {
  store: DecisionStore;
};

export async function registerRoutes(app: FastifyInstance, options: DecisionRoutesOptions): Promise<void> {
  const { store } = options;

  app.setErrorHandler((error, request, reply) => {
    const { traceId } = request;
    if (isBodyParseError(error)) {
      reply.code(422).send({ message: "Malformed request body", traceId });
      return;
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.code(error.statusCode).send({ message: error.message, traceId });
      return;
    }
    requestLogger(request).error({ error: errorMessage(error) }, "Decision request failed");
    reply.code(500).send({ message: "Decision storage unavailable", traceId });
  });

  app.post("/v1/decisions", async (request, reply) => {
    const { traceId } = request;
    const parsed = decisionRecordWireSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(422);
      return { message: "Invalid decision record", issues: parsed.error.issues, traceId };
    }
    const result = await store.upsertDecision(fromWire(parsed.data));
    requestLogger(request).info({ decisionId: result.decisionId, status: result.status }, "Stored decision record");
    return { decision_id: result.decisionId, status: result.status };
  });

  app.get("/v1/decisions/:id", async (request, reply) => {
    const { traceId } = request;
    const { id } = decisionParamsSchema.parse(request.params);
    const record = await store.getDecision(id);
    if (!record) {
      reply.code(404);
      return { message: "Decision not found", traceId };
    }
    return toWire(record);
  });

  app.get("/v1/decisions/:id/explain", async (request, reply) => {
    const { traceId } = request;
    const { id } = decisionParamsSchema.parse(request.params);
    const query = explainQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(422);
      return { message: "Invalid query", issues: query.error.issues, traceId };
    }
    const record = await store.getDecision(id);
    if (!record) {
      reply.code(404);
      return { message: "Decision not found", traceId };
    }
    const explanation = buildExplanation(record);
    if (query.data.format === "md") {
      reply.header("content-type", "text/markdown; charset=utf-8");
      return buildExplanationMarkdown(explanation);
    }
    return serializeExplanation(explanation);
  });

  app.get("/v1/decisions", async (request, reply) => {
    const { traceId } = request;
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(422);
      return { message: "Invalid query", issues: query.error.issues, traceId };
    }
    const records = await store.listDecisions({
      runId: query.data.run_id,
      outcome: query.data.outcome,
      limit: query.data.limit,
      offset: query.data.offset
    });
    const decisions = records.map((record) => ({
      decision_id: record.decisionId,
      run_id: record.runId,
      timestamp: record.timestamp,
      outcome: record.outcome,
      actor_id: record.actor?.id ?? null
    }));
    return { decisions, count: decisions.length };
  });

  app.post("/v1/precedents/search", async (request, reply) => {
    const { traceId } = request;
    const body = precedentSearchSchema.safeParse(request.body ?? {});
    if (!body.success) {
      reply.code(422);
      return { message: "Invalid precedent query", issues: body.error.issues, traceId };
    }
    const precedents = await store.searchPrecedents({
      policyId: body.data.policy_id,
      tool: body.data.tool,
      outcome: body.data.outcome,
      limit: body.data.limit
    });
    return { precedents: precedents.map(serializePrecedent), count: precedents.length };
  });
}
