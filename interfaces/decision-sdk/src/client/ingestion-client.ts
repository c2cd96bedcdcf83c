import { IngestError, errorMessage } from "../errors";
import { logger } from "../logger";
import type { DecisionRecord } from "../model/types";
import type { DecisionSink } from "./sinks";

export type IngestionClientOptions = {
  sink: DecisionSink;
  maxFailedQueue?: number;
  raiseOnError?: boolean;
};

/**
 * Hands finalized records to a sink. Failed deliveries wait in a bounded
 * FIFO queue until `retryFailed` is called; nothing is retried on a timer.
 */
export class IngestionClient {
  private readonly sink: DecisionSink;
  private readonly maxFailedQueue: number;
  private readonly raiseOnError: boolean;
  private failed: DecisionRecord[] = [];

  constructor(options: IngestionClientOptions) {
    this.sink = options.sink;
    this.maxFailedQueue = Math.max(1, options.maxFailedQueue ?? 1000);
    this.raiseOnError = options.raiseOnError ?? false;
  }

  get failedCount(): number {
    return this.failed.length;
  }

  pendingDecisionIds(): string[] {
    return this.failed.map((record) => record.decisionId);
  }

  private enqueueFailed(record: DecisionRecord): void {
    if (this.failed.length >= this.maxFailedQueue) {
      const dropped = this.failed.shift();
      logger.warn(
        { decisionId: dropped?.decisionId, maxFailedQueue: this.maxFailedQueue },
        "Failed-ingest queue full; dropping oldest decision"
      );
    }
    this.failed.push(record);
  }

  async ingest(record: DecisionRecord): Promise<boolean> {
    try {
      await this.sink.deliver(record);
      logger.debug({ decisionId: record.decisionId }, "Ingested decision");
      return true;
    } catch (error) {
      logger.error({ decisionId: record.decisionId, error: errorMessage(error) }, "Failed to ingest decision");
      this.enqueueFailed(record);
      if (this.raiseOnError) {
        throw new IngestError(`Failed to ingest decision: ${errorMessage(error)}`, record.decisionId, {
          cause: error
        });
      }
      return false;
    }
  }

  /** Attempts every queued record once, oldest first. Returns how many went through. */
  async retryFailed(): Promise<number> {
    if (!this.failed.length) {
      return 0;
    }
    const queued = this.failed;
    this.failed = [];
    const stillFailed: DecisionRecord[] = [];
    let succeeded = 0;

    for (const record of queued) {
      try {
        await this.sink.deliver(record);
        succeeded += 1;
        logger.info({ decisionId: record.decisionId }, "Retry succeeded for decision");
      } catch (error) {
        logger.warn({ decisionId: record.decisionId, error: errorMessage(error) }, "Retry failed for decision");
        stillFailed.push(record);
      }
    }

    // Records that failed during this pass go back ahead of anything queued meanwhile.
    this.failed = [...stillFailed, ...this.failed].slice(-this.maxFailedQueue);
    return succeeded;
  }

  async close(): Promise<void> {
    if (this.sink.close) {
      await this.sink.close();
    }
  }
}
