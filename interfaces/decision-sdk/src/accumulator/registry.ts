import type { DecisionRecord } from "../model/types";
import { RunAccumulator, type FinalizeOptions, type RunAccumulatorOptions } from "./run-accumulator";

export type RunDefaults = Omit<RunAccumulatorOptions, "runId">;

/**
 * Run id → accumulator. Entries are single-writer, so the map only needs
 * insertion, lookup and removal to be consistent.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunAccumulator>();

  constructor(private readonly defaults: RunDefaults = {}) {}

  getOrCreate(runId: string, options: RunDefaults = {}): RunAccumulator {
    const existing = this.runs.get(runId);
    if (existing) {
      return existing;
    }
    const accumulator = new RunAccumulator({ ...this.defaults, ...options, runId });
    this.runs.set(runId, accumulator);
    return accumulator;
  }

  get(runId: string): RunAccumulator | undefined {
    return this.runs.get(runId);
  }

  has(runId: string): boolean {
    return this.runs.has(runId);
  }

  get size(): number {
    return this.runs.size;
  }

  runIds(): string[] {
    return Array.from(this.runs.keys());
  }

  /** Finalizes and forgets the run. Unknown runs yield `null`. */
  finalize(runId: string, options?: FinalizeOptions): Readonly<DecisionRecord> | null {
    const accumulator = this.runs.get(runId);
    if (!accumulator) {
      return null;
    }
    const record = accumulator.finalize(options);
    this.runs.delete(runId);
    return record;
  }

  discard(runId: string): boolean {
    return this.runs.delete(runId);
  }
}
