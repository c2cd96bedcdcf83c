import { isSpanContextValid, trace } from "@opentelemetry/api";
import type { Logger } from "pino";
import { classifyTool, type ToolLists } from "../classifier/classifier";
import { errorMessage } from "../errors";
import { generateId, nowIso, randomIdentity, type IdentitySource } from "../identity/sources";
import { generateHash } from "../identity/hash";
import { logger, withRunId } from "../logger";
import {
  createAction,
  createActor,
  createApproval,
  createEvidence,
  createPolicyEval,
  sealDecisionRecord,
  wrapPayload,
  type ActionInput,
  type EvidenceInput
} from "../model/factories";
import type {
  Action,
  Actor,
  Approval,
  DecisionRecord,
  EntityRef,
  Evidence,
  JsonObject,
  Outcome,
  PolicyEval,
  PolicyResult
} from "../model/types";
import type { NormalizedEvent } from "./events";

export type RunState = "active" | "interrupted" | "finalized";

export type TerminalSignal = "completed" | "error" | "tool_error" | "user_cancel" | "timeout";

const DENYING_SIGNALS: ReadonlySet<TerminalSignal> = new Set(["error", "tool_error", "user_cancel", "timeout"]);

export type FinalizeOptions = {
  signal?: TerminalSignal;
  outcome?: Outcome;
  reason?: string | null;
};

export type RunAccumulatorOptions = {
  runId: string;
  actor?: Actor | null;
  toolLists?: ToolLists;
  traceId?: string | null;
  spanId?: string | null;
  startedAt?: string;
  subjectEntities?: EntityRef[];
  metadata?: JsonObject;
  identity?: IdentitySource;
};

export type PendingToolCall = {
  toolName: string;
  args: JsonObject;
};

export type PolicyVerdict = boolean | { passed: boolean; message?: string | null };

export type PolicyCheck = {
  policyId: string;
  version?: string;
  evaluate: (call: PendingToolCall) => PolicyVerdict;
};

export type PolicyGateResult = {
  allow: boolean;
  policyId: string | null;
  reason: string | null;
};

type OutcomeDecision = {
  outcome: Outcome;
  reason: string | null;
};

function activeSpanIds(): { traceId: string | null; spanId: string | null } {
  const context = trace.getActiveSpan()?.spanContext();
  if (!context || !isSpanContextValid(context)) {
    return { traceId: null, spanId: null };
  }
  return { traceId: context.traceId, spanId: context.spanId };
}

function stringifyResumeValue(value: unknown): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Mutable per-run state that turns a stream of tool notifications, policy
 * checks and interrupt/resume cycles into exactly one DecisionRecord.
 *
 * A single control flow owns each accumulator. Nothing here blocks: an
 * interrupt only flips state, the host framework does the actual pausing.
 */
export class RunAccumulator {
  readonly runId: string;
  readonly startedAt: string;

  private readonly evidence: Evidence[] = [];
  private readonly actions: Action[] = [];
  private readonly policies: PolicyEval[] = [];
  private readonly approvals: Approval[] = [];
  private readonly seenIds = new Set<string>();
  private readonly toolLists: ToolLists;
  private readonly actor: Actor | null;
  private readonly traceId: string | null;
  private readonly spanId: string | null;
  private readonly subjectEntities: EntityRef[];
  private readonly metadata: JsonObject;
  private readonly identity: IdentitySource;
  private readonly log: Logger;

  private currentState: RunState = "active";
  private pendingInterrupt = false;
  private success = true;
  private outcomeReason: string | null = null;
  private finalized: Readonly<DecisionRecord> | null = null;

  constructor(options: RunAccumulatorOptions) {
    const spanIds = activeSpanIds();
    this.runId = options.runId;
    this.identity = options.identity ?? randomIdentity;
    this.startedAt = options.startedAt ?? nowIso(this.identity);
    this.actor = options.actor ?? null;
    this.toolLists = options.toolLists ?? {};
    this.traceId = options.traceId ?? spanIds.traceId;
    this.spanId = options.spanId ?? spanIds.spanId;
    this.subjectEntities = (options.subjectEntities ?? []).map((ref) => ({ ...ref, aliases: [...ref.aliases] }));
    this.metadata = wrapPayload(options.metadata) ?? {};
    this.log = withRunId(logger, options.runId);
  }

  get state(): RunState {
    return this.currentState;
  }

  get isInterrupted(): boolean {
    return this.pendingInterrupt;
  }

  get counts(): { evidence: number; actions: number; policies: number; approvals: number } {
    return {
      evidence: this.evidence.length,
      actions: this.actions.length,
      policies: this.policies.length,
      approvals: this.approvals.length
    };
  }

  private acceptsWrites(operation: string): boolean {
    if (this.currentState === "finalized") {
      this.log.debug({ operation }, "Ignoring update to finalized run");
      return false;
    }
    return true;
  }

  private claimId(id: string): boolean {
    if (this.seenIds.has(id)) {
      return false;
    }
    this.seenIds.add(id);
    return true;
  }

  private markFailed(reason: string): void {
    this.success = false;
    this.outcomeReason = reason;
  }

  recordNotification(event: NormalizedEvent): boolean {
    if (!this.acceptsWrites("notification") || !this.claimId(event.id)) {
      return false;
    }
    const kind = event.kind ?? classifyTool(event.toolName, this.toolLists).kind;
    const at = event.timestamp ?? nowIso(this.identity);

    if (kind === "write") {
      this.actions.push(
        createAction({
          actionId: event.id,
          tool: event.toolName,
          committedAt: at,
          params: event.args,
          result: wrapPayload(event.output),
          success: event.error === null
        },
        this.identity)
      );
      if (event.error !== null) {
        this.markFailed(`tool ${event.toolName} failed: ${event.error}`);
      }
      return true;
    }

    const snapshot = wrapPayload(event.output) ?? (event.error !== null ? { error: event.error } : null);
    this.evidence.push(
      createEvidence({
        evidenceId: event.id,
        source: event.toolName,
        retrievedAt: at,
        toolName: event.toolName,
        toolArgs: event.args,
        snapshot
      }, this.identity)
    );
    return true;
  }

  recordEvidence(input: EvidenceInput): boolean {
    if (!this.acceptsWrites("evidence")) {
      return false;
    }
    if (input.evidenceId !== undefined && !this.claimId(input.evidenceId)) {
      return false;
    }
    this.evidence.push(createEvidence(input, this.identity));
    return true;
  }

  recordAction(input: ActionInput): boolean {
    if (!this.acceptsWrites("action")) {
      return false;
    }
    if (input.actionId !== undefined && !this.claimId(input.actionId)) {
      return false;
    }
    const action = createAction(input, this.identity);
    this.actions.push(action);
    if (!action.success) {
      this.markFailed(`tool ${action.tool} failed`);
    }
    return true;
  }

  recordPolicy(
    policyId: string,
    version: string,
    result: PolicyResult,
    message?: string | null,
    inputsHash?: string | null
  ): PolicyEval | null {
    if (!this.acceptsWrites("policy")) {
      return null;
    }
    const policy = createPolicyEval({ policyId, version, result, message, inputsHash });
    this.policies.push(policy);
    return policy;
  }

  /**
   * Runs externally supplied policy callbacks against a pending tool call.
   * A failing check stops evaluation; a throwing check is recorded as `warn`
   * and the remaining checks still run.
   */
  evaluatePolicies(checks: PolicyCheck[], call: PendingToolCall): PolicyGateResult {
    const inputsHash = generateHash({ toolName: call.toolName, args: call.args });
    for (const check of checks) {
      const version = check.version ?? "1.0";
      let verdict: PolicyVerdict;
      try {
        verdict = check.evaluate(call);
      } catch (error) {
        const message = errorMessage(error);
        this.log.warn({ policyId: check.policyId, error: message }, "Policy check raised; recorded as warn");
        this.recordPolicy(check.policyId, version, "warn", message, inputsHash);
        continue;
      }
      const passed = typeof verdict === "boolean" ? verdict : verdict.passed;
      const message = typeof verdict === "boolean" ? null : (verdict.message ?? null);
      this.recordPolicy(check.policyId, version, passed ? "pass" : "fail", message, inputsHash);
      if (!passed) {
        this.log.info({ policyId: check.policyId, toolName: call.toolName }, "Policy blocked tool call");
        return { allow: false, policyId: check.policyId, reason: message ?? "Policy check failed" };
      }
    }
    return { allow: true, policyId: null, reason: null };
  }

  onInterrupt(payload: unknown): boolean {
    if (!this.acceptsWrites("interrupt")) {
      return false;
    }
    this.pendingInterrupt = true;
    this.evidence.push(createEvidence({ source: "interrupt", snapshot: wrapPayload(payload) }, this.identity));
    this.currentState = "interrupted";
    this.log.debug("Interrupt recorded");
    return true;
  }

  onResume(approverId: string, resumeValue?: unknown): boolean {
    if (!this.acceptsWrites("resume") || !this.pendingInterrupt) {
      return false;
    }
    this.approvals.push(
      createApproval({
        approver: createActor("human", approverId),
        granted: true,
        reason: stringifyResumeValue(resumeValue)
      }, this.identity)
    );
    this.pendingInterrupt = false;
    this.currentState = "active";
    this.log.debug({ approverId }, "Resume approved");
    return true;
  }

  private decideOutcome(options: FinalizeOptions): OutcomeDecision {
    if ((options.signal && DENYING_SIGNALS.has(options.signal)) || options.outcome === "denied") {
      return { outcome: "denied", reason: options.reason ?? this.outcomeReason ?? options.signal ?? null };
    }
    const blocking = this.policies.find((policy) => policy.result === "fail");
    if (blocking) {
      return { outcome: "denied", reason: blocking.message ?? `policy ${blocking.policyId} failed` };
    }
    if (!this.success) {
      return { outcome: "denied", reason: this.outcomeReason };
    }
    return { outcome: options.outcome ?? "committed", reason: options.reason ?? null };
  }

  /**
   * Produces the run's DecisionRecord once. Later calls return the same
   * record. Runs that never recorded an action produce `null`.
   */
  finalize(options: FinalizeOptions = {}): Readonly<DecisionRecord> | null {
    if (this.currentState === "finalized") {
      return this.finalized;
    }

    if (!this.actions.length) {
      this.currentState = "finalized";
      this.log.debug("No actions recorded; skipping decision record");
      return null;
    }

    const { outcome, reason } = this.decideOutcome(options);
    const record = sealDecisionRecord({
      decisionId: generateId(this.identity),
      runId: this.runId,
      traceId: this.traceId,
      spanId: this.spanId,
      timestamp: this.startedAt,
      actor: this.actor,
      subjectEntities: this.subjectEntities,
      evidence: this.evidence,
      policies: this.policies,
      approvals: this.approvals,
      actions: this.actions,
      outcome,
      outcomeReason: reason,
      precedentRefs: [],
      metadata: this.metadata
    });
    this.finalized = record;
    this.currentState = "finalized";
    this.log.info({ decisionId: record.decisionId, outcome }, "Decision record finalized");
    return record;
  }
}
