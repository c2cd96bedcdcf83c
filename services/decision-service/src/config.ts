import dotenv from "dotenv";
import { parseBoolean, parseNumber } from "@decision-ledger/sdk";

dotenv.config();

export const config = {
  port: parseNumber(process.env.PORT, 8080),
  serviceName: process.env.SERVICE_NAME ?? "decision-service",
  tenantId: process.env.TENANT_ID ?? "default",
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: process.env.USE_INMEMORY_STORE === "true",
  telemetryEnabled: parseBoolean(process.env.TELEMETRY_ENABLED, false),
  db: {
    host: process.env.DB_HOST ?? "localhost",
    port: parseNumber(process.env.DB_PORT, 5432),
    user: process.env.DB_USER ?? "decisions",
    password: process.env.DB_PASSWORD ?? "decisions",
    database: process.env.DB_NAME ?? "decisions"
  }
};
