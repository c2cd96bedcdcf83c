import type { FastifyInstance, FastifyRequest } from "fastify";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { logger } from "../logger";

export const TRACE_HEADER = "x-trace-id";

const MAX_TRACE_ID_LENGTH = 128;

declare module "fastify" {
  interface FastifyRequest {
    traceId: string;
  }
}

/** Keeps the trace id an SDK sink sent along with the record, or mints one. */
export function resolveTraceId(header: string | string[] | undefined): string {
  const candidate = (Array.isArray(header) ? header[0] : header)?.trim();
  if (candidate && candidate.length <= MAX_TRACE_ID_LENGTH) {
    return candidate;
  }
  return uuidv4();
}

/** Resolves the trace id once per request and echoes it on every response. */
export function registerTracing(app: FastifyInstance): void {
  app.decorateRequest("traceId", "");
  app.addHook("onRequest", (request, reply, done) => {
    request.traceId = resolveTraceId(request.headers[TRACE_HEADER]);
    reply.header(TRACE_HEADER, request.traceId);
    done();
  });
}

export function requestLogger(request: FastifyRequest, base: Logger = logger): Logger {
  return base.child({ traceId: request.traceId, method: request.method, url: request.url });
}
