import { z } from "zod";
import type {
  Action,
  Actor,
  Approval,
  DecisionRecord,
  EntityRef,
  Evidence,
  PolicyEval
} from "./types";

const timestampSchema = z.string().datetime({ offset: true });
const jsonObjectSchema = z.record(z.unknown());

export const actorTypeSchema = z.enum(["agent", "human", "system"]);
export const outcomeSchema = z.enum(["committed", "denied", "escalated", "pending"]);
export const policyResultSchema = z.enum(["pass", "fail", "warn", "skip"]);

export const entityRefWireSchema = z.object({
  namespace: z.string(),
  type: z.string(),
  id: z.string(),
  aliases: z.array(z.string()).default([])
});

export const actorWireSchema = z.object({
  type: actorTypeSchema,
  id: z.string().min(1),
  name: z.string().nullable().default(null)
});

export const evidenceWireSchema = z.object({
  evidence_id: z.string().min(1),
  source: z.string(),
  retrieved_at: timestampSchema,
  entity_ref: entityRefWireSchema.nullable().default(null),
  snapshot: jsonObjectSchema.nullable().default(null),
  snapshot_hash: z.string().nullable().default(null),
  tool_name: z.string().nullable().default(null),
  tool_args: jsonObjectSchema.nullable().default(null)
});

export const policyEvalWireSchema = z.object({
  policy_id: z.string().min(1),
  version: z.string(),
  result: policyResultSchema,
  inputs_hash: z.string().nullable().default(null),
  message: z.string().nullable().default(null)
});

export const approvalWireSchema = z.object({
  approval_id: z.string().min(1),
  approver: actorWireSchema,
  granted: z.boolean(),
  granted_at: timestampSchema,
  reason: z.string().nullable().default(null)
});

export const actionWireSchema = z.object({
  action_id: z.string().min(1),
  tool: z.string().min(1),
  operation: z.string().nullable().default(null),
  target_entity: entityRefWireSchema.nullable().default(null),
  committed_at: timestampSchema,
  params: jsonObjectSchema.nullable().default(null),
  result: jsonObjectSchema.nullable().default(null),
  success: z.boolean().default(true)
});

export const decisionRecordWireSchema = z.object({
  decision_id: z.string().min(1),
  run_id: z.string().min(1),
  trace_id: z.string().nullable().default(null),
  span_id: z.string().nullable().default(null),
  timestamp: timestampSchema,
  actor: actorWireSchema.nullable().default(null),
  subject_entities: z.array(entityRefWireSchema).default([]),
  evidence: z.array(evidenceWireSchema).default([]),
  policies: z.array(policyEvalWireSchema).default([]),
  approvals: z.array(approvalWireSchema).default([]),
  actions: z.array(actionWireSchema).default([]),
  outcome: outcomeSchema,
  outcome_reason: z.string().nullable().default(null),
  precedent_refs: z.array(z.string()).default([]),
  metadata: jsonObjectSchema.default({})
});

export type EntityRefWire = z.infer<typeof entityRefWireSchema>;
export type ActorWire = z.infer<typeof actorWireSchema>;
export type EvidenceWire = z.infer<typeof evidenceWireSchema>;
export type PolicyEvalWire = z.infer<typeof policyEvalWireSchema>;
export type ApprovalWire = z.infer<typeof approvalWireSchema>;
export type ActionWire = z.infer<typeof actionWireSchema>;
export type DecisionRecordWire = z.infer<typeof decisionRecordWireSchema>;

function entityRefToWire(ref: EntityRef): EntityRefWire {
  return { namespace: ref.namespace, type: ref.type, id: ref.id, aliases: [...ref.aliases] };
}

function entityRefFromWire(ref: EntityRefWire): EntityRef {
  return { namespace: ref.namespace, type: ref.type, id: ref.id, aliases: [...ref.aliases] };
}

function actorToWire(actor: Actor): ActorWire {
  return { type: actor.type, id: actor.id, name: actor.name };
}

function actorFromWire(actor: ActorWire): Actor {
  return { type: actor.type, id: actor.id, name: actor.name };
}

function evidenceToWire(evidence: Evidence): EvidenceWire {
  return {
    evidence_id: evidence.evidenceId,
    source: evidence.source,
    retrieved_at: evidence.retrievedAt,
    entity_ref: evidence.entityRef ? entityRefToWire(evidence.entityRef) : null,
    snapshot: evidence.snapshot,
    snapshot_hash: evidence.snapshotHash,
    tool_name: evidence.toolName,
    tool_args: evidence.toolArgs
  };
}

function evidenceFromWire(evidence: EvidenceWire): Evidence {
  return {
    evidenceId: evidence.evidence_id,
    source: evidence.source,
    retrievedAt: evidence.retrieved_at,
    entityRef: evidence.entity_ref ? entityRefFromWire(evidence.entity_ref) : null,
    snapshot: evidence.snapshot,
    snapshotHash: evidence.snapshot_hash,
    toolName: evidence.tool_name,
    toolArgs: evidence.tool_args
  };
}

function policyToWire(policy: PolicyEval): PolicyEvalWire {
  return {
    policy_id: policy.policyId,
    version: policy.version,
    result: policy.result,
    inputs_hash: policy.inputsHash,
    message: policy.message
  };
}

function policyFromWire(policy: PolicyEvalWire): PolicyEval {
  return {
    policyId: policy.policy_id,
    version: policy.version,
    result: policy.result,
    inputsHash: policy.inputs_hash,
    message: policy.message
  };
}

function approvalToWire(approval: Approval): ApprovalWire {
  return {
    approval_id: approval.approvalId,
    approver: actorToWire(approval.approver),
    granted: approval.granted,
    granted_at: approval.grantedAt,
    reason: approval.reason
  };
}

function approvalFromWire(approval: ApprovalWire): Approval {
  return {
    approvalId: approval.approval_id,
    approver: actorFromWire(approval.approver),
    granted: approval.granted,
    grantedAt: approval.granted_at,
    reason: approval.reason
  };
}

function actionToWire(action: Action): ActionWire {
  return {
    action_id: action.actionId,
    tool: action.tool,
    operation: action.operation,
    target_entity: action.targetEntity ? entityRefToWire(action.targetEntity) : null,
    committed_at: action.committedAt,
    params: action.params,
    result: action.result,
    success: action.success
  };
}

function actionFromWire(action: ActionWire): Action {
  return {
    actionId: action.action_id,
    tool: action.tool,
    operation: action.operation,
    targetEntity: action.target_entity ? entityRefFromWire(action.target_entity) : null,
    committedAt: action.committed_at,
    params: action.params,
    result: action.result,
    success: action.success
  };
}

export function toWire(record: DecisionRecord): DecisionRecordWire {
  return {
    decision_id: record.decisionId,
    run_id: record.runId,
    trace_id: record.traceId,
    span_id: record.spanId,
    timestamp: record.timestamp,
    actor: record.actor ? actorToWire(record.actor) : null,
    subject_entities: record.subjectEntities.map(entityRefToWire),
    evidence: record.evidence.map(evidenceToWire),
    policies: record.policies.map(policyToWire),
    approvals: record.approvals.map(approvalToWire),
    actions: record.actions.map(actionToWire),
    outcome: record.outcome,
    outcome_reason: record.outcomeReason,
    precedent_refs: [...record.precedentRefs],
    metadata: record.metadata
  };
}

export function fromWire(wire: DecisionRecordWire): DecisionRecord {
  return {
    decisionId: wire.decision_id,
    runId: wire.run_id,
    traceId: wire.trace_id,
    spanId: wire.span_id,
    timestamp: wire.timestamp,
    actor: wire.actor ? actorFromWire(wire.actor) : null,
    subjectEntities: wire.subject_entities.map(entityRefFromWire),
    evidence: wire.evidence.map(evidenceFromWire),
    policies: wire.policies.map(policyFromWire),
    approvals: wire.approvals.map(approvalFromWire),
    actions: wire.actions.map(actionFromWire),
    outcome: wire.outcome,
    outcomeReason: wire.outcome_reason,
    precedentRefs: [...wire.precedent_refs],
    metadata: wire.metadata
  };
}

/** Throws a ZodError when the payload does not match the wire format. */
export function parseDecisionRecord(payload: unknown): DecisionRecord {
  return fromWire(decisionRecordWireSchema.parse(payload));
}

export function serializeDecisionRecord(record: DecisionRecord): string {
  return JSON.stringify(toWire(record));
}
