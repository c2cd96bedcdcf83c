import type { FastifyInstance } from "fastify";
import type { DecisionStore } from "./decisions/types";

export async function registerHealthRoutes(app: FastifyInstance, store: DecisionStore): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async () => {
    await store.ping();
    return { status: "ready" };
  });
}
