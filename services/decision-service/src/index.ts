import { config } from "./config";
import { buildApp } from "./app";
import { closeDb, migrate } from "./db";
import { logger } from "./logger";
import { startTelemetry, stopTelemetry } from "./telemetry";

async function start(): Promise<void> {
  await startTelemetry();
  await migrate();
  const app = await buildApp();

  async function shutdown(): Promise<void> {
    logger.info({ traceId: "system" }, "Shutting down decision service");
    await app.close();
    await closeDb();
    await stopTelemetry();
  }

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info({ port: config.port, traceId: "system" }, "Decision service listening");
}

start().catch((error) => {
  logger.error({ error, traceId: "system" }, "Failed to start decision service");
  process.exit(1);
});
