export * from "./model/types";
export * from "./model/wire";
export * from "./model/factories";
export * from "./identity/hash";
export * from "./identity/sources";
export * from "./classifier/classifier";
export * from "./accumulator/events";
export * from "./accumulator/run-accumulator";
export * from "./accumulator/registry";
export * from "./adapters/normalize";
export * from "./client/sinks";
export * from "./client/ingestion-client";
export * from "./explain/explain";
export * from "./precedents/match";
export * from "./recorder";
export * from "./errors";
export { loadRecorderConfig, parseBoolean, parseList, parseNumber } from "./config";
export type { RecorderConfig } from "./config";
