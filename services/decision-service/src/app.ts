import Fastify, { type FastifyInstance } from "fastify";
import { registerRoutes } from "./decisions/routes";
import { createDecisionStore } from "./decisions/store";
import type { DecisionStore } from "./decisions/types";
import { registerHealthRoutes } from "./health";
import { registerTracing } from "./trace/trace";

export async function buildApp(options: { store?: DecisionStore } = {}): Promise<FastifyInstance> {
  const store = options.store ?? createDecisionStore();
  const app = Fastify({ logger: false });

  registerTracing(app);
  await registerRoutes(app, { store });
  await registerHealthRoutes(app, store);
  return app;
}
