import pino, { type Logger } from "pino";

export const logger = pino({
  name: "decision-sdk",
  level: process.env.LOG_LEVEL ?? "info"
});

export function withRunId(parent: Logger, runId: string): Logger {
  return parent.child({ runId });
}
