import { RunRegistry } from "./accumulator/registry";
import type { FinalizeOptions, RunAccumulator, RunAccumulatorOptions } from "./accumulator/run-accumulator";
import { IngestionClient } from "./client/ingestion-client";
import { HttpDecisionSink, type DecisionSink } from "./client/sinks";
import { loadRecorderConfig, type RecorderConfig } from "./config";
import { generateId, nowIso, randomIdentity, type IdentitySource } from "./identity/sources";
import { logger } from "./logger";
import {
  createAction,
  createActor,
  createApproval,
  createEvidence,
  createPolicyEval,
  sealDecisionRecord,
  toJsonSafe,
  wrapPayload
} from "./model/factories";
import type {
  Action,
  ActorType,
  Approval,
  DecisionRecord,
  Evidence,
  JsonObject,
  Outcome,
  PolicyEval,
  PolicyResult
} from "./model/types";

export type DecisionRecorderOptions = {
  config?: Partial<RecorderConfig>;
  sink?: DecisionSink;
  client?: IngestionClient;
  identity?: IdentitySource;
};

/**
 * Entry point for hosts: owns the run registry and the ingestion client.
 * Finished runs are finalized and delivered; delivery failures stay queued.
 */
export class DecisionRecorder {
  readonly config: RecorderConfig;
  readonly client: IngestionClient;
  readonly runs: RunRegistry;
  private readonly identity: IdentitySource;

  constructor(options: DecisionRecorderOptions = {}) {
    this.config = { ...loadRecorderConfig(), ...options.config };
    this.identity = options.identity ?? randomIdentity;
    this.client =
      options.client ??
      new IngestionClient({
        sink:
          options.sink ??
          new HttpDecisionSink({
            serverUrl: this.config.serverUrl,
            apiKey: this.config.apiKey,
            tenantId: this.config.tenantId,
            timeoutMs: this.config.timeoutMs
          }),
        maxFailedQueue: this.config.maxFailedQueue,
        raiseOnError: this.config.raiseOnError
      });
    this.runs = new RunRegistry({
      toolLists: { writeTools: this.config.writeTools, readTools: this.config.readTools },
      identity: this.identity
    });
  }

  run(runId: string, options: Omit<RunAccumulatorOptions, "runId"> = {}): RunAccumulator {
    return this.runs.getOrCreate(runId, options);
  }

  async finishRun(runId: string, options?: FinalizeOptions): Promise<Readonly<DecisionRecord> | null> {
    const record = this.runs.finalize(runId, options);
    if (!record) {
      logger.debug({ runId }, "Run produced no decision record");
      return null;
    }
    await this.client.ingest(record);
    return record;
  }

  startDecision(runId: string, options: { actorId?: string; actorType?: ActorType } = {}): DecisionBuilder {
    return new DecisionBuilder(
      this.client,
      runId,
      options.actorId ?? null,
      options.actorType ?? "agent",
      this.identity
    );
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

/** Manual, chainable construction of a record for code that is not wired through an adapter. */
export class DecisionBuilder {
  private readonly evidence: Evidence[] = [];
  private readonly actions: Action[] = [];
  private readonly policies: PolicyEval[] = [];
  private readonly approvals: Approval[] = [];
  private readonly metadata: JsonObject = {};
  private readonly startedAt: string;

  constructor(
    private readonly client: IngestionClient,
    readonly runId: string,
    private readonly actorId: string | null,
    private readonly actorType: ActorType,
    private readonly identity: IdentitySource = randomIdentity
  ) {
    this.startedAt = nowIso(identity);
  }

  addEvidence(toolName: string, toolArgs: JsonObject, result: unknown, source?: string): this {
    this.evidence.push(
      createEvidence({
        source: source ?? toolName,
        toolName,
        toolArgs,
        snapshot: wrapPayload(result)
      }, this.identity)
    );
    return this;
  }

  addAction(toolName: string, toolArgs: JsonObject, result: unknown, success = true): this {
    this.actions.push(
      createAction({ tool: toolName, params: toolArgs, result: wrapPayload(result), success }, this.identity)
    );
    return this;
  }

  addPolicy(policyId: string, version: string, result: PolicyResult, message?: string): this {
    this.policies.push(createPolicyEval({ policyId, version, result, message }));
    return this;
  }

  addApproval(approverId: string, granted: boolean, reason?: string): this {
    this.approvals.push(
      createApproval({ approver: createActor("human", approverId), granted, reason }, this.identity)
    );
    return this;
  }

  setMetadata(key: string, value: unknown): this {
    this.metadata[key] = toJsonSafe(value);
    return this;
  }

  async commit(outcome: Outcome = "committed", reason?: string): Promise<Readonly<DecisionRecord>> {
    const record = sealDecisionRecord({
      decisionId: generateId(this.identity),
      runId: this.runId,
      traceId: null,
      spanId: null,
      timestamp: this.startedAt,
      actor: this.actorId ? createActor(this.actorType, this.actorId) : null,
      subjectEntities: [],
      evidence: this.evidence,
      policies: this.policies,
      approvals: this.approvals,
      actions: this.actions,
      outcome,
      outcomeReason: reason ?? null,
      precedentRefs: [],
      metadata: this.metadata
    });
    await this.client.ingest(record);
    return record;
  }
}
