import dotenv from "dotenv";

dotenv.config();

type Env = Record<string, string | undefined>;

export function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export type RecorderConfig = {
  serverUrl: string;
  apiKey: string | null;
  tenantId: string;
  writeTools: string[];
  readTools: string[];
  timeoutMs: number;
  raiseOnError: boolean;
  maxFailedQueue: number;
};

export function loadRecorderConfig(env: Env = process.env): RecorderConfig {
  return {
    serverUrl: env.DECISION_SERVER_URL ?? "http://localhost:8080",
    apiKey: env.DECISION_API_KEY ?? null,
    tenantId: env.DECISION_TENANT_ID ?? "default",
    writeTools: parseList(env.DECISION_WRITE_TOOLS),
    readTools: parseList(env.DECISION_READ_TOOLS),
    timeoutMs: parseNumber(env.DECISION_TIMEOUT_MS, 30_000),
    raiseOnError: parseBoolean(env.DECISION_RAISE_ON_ERROR, false),
    maxFailedQueue: parseNumber(env.DECISION_MAX_FAILED_QUEUE, 1000)
  };
}
