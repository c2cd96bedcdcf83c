import { errorMessage } from "../errors";
import { generateHash } from "../identity/hash";
import { generateId, nowIso, randomIdentity, type IdentitySource } from "../identity/sources";
import { logger } from "../logger";
import type {
  Action,
  Actor,
  ActorType,
  Approval,
  DecisionRecord,
  EntityRef,
  Evidence,
  JsonObject,
  PolicyEval,
  PolicyResult
} from "./types";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Detached, JSON-only copy of a caller's payload: `toJSON` is honoured,
 * functions and symbols are dropped, bigints become strings.
 */
export function toJsonSafe(value: unknown): unknown {
  if (value === undefined || value === null) {
    return null;
  }
  try {
    const text = JSON.stringify(value, jsonReplacer);
    return text === undefined ? null : JSON.parse(text);
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, "Payload is not JSON-serializable; storing its string form");
    return String(value);
  }
}

/**
 * Evidence snapshots and action payloads are always detached objects.
 * Strings are kept under `output`, any other scalar or list under `value`.
 */
export function wrapPayload(value: unknown): JsonObject | null {
  const safe = toJsonSafe(value);
  if (safe === null) {
    return null;
  }
  if (isJsonObject(safe)) {
    return safe;
  }
  if (typeof safe === "string") {
    return { output: safe };
  }
  return { value: safe };
}

function copyEntityRef(ref: EntityRef | null | undefined): EntityRef | null {
  return ref ? { namespace: ref.namespace, type: ref.type, id: ref.id, aliases: [...ref.aliases] } : null;
}

export function createActor(type: ActorType, id: string, name?: string | null): Actor {
  return { type, id, name: name ?? null };
}

export function createEntityRef(input: {
  namespace: string;
  type: string;
  id: string;
  aliases?: Iterable<string>;
}): EntityRef {
  return {
    namespace: input.namespace,
    type: input.type,
    id: input.id,
    aliases: Array.from(new Set(input.aliases ?? []))
  };
}

export type EvidenceInput = {
  source: string;
  evidenceId?: string;
  retrievedAt?: string;
  entityRef?: EntityRef | null;
  snapshot?: JsonObject | null;
  /** Ignored; the hash is always derived from the snapshot. */
  snapshotHash?: string | null;
  toolName?: string | null;
  toolArgs?: JsonObject | null;
};

/** The snapshot is copied before hashing, so later changes to the caller's object cannot drift from the hash. */
export function createEvidence(input: EvidenceInput, identity: IdentitySource = randomIdentity): Evidence {
  const snapshot = wrapPayload(input.snapshot);
  return {
    evidenceId: input.evidenceId ?? generateId(identity),
    source: input.source,
    retrievedAt: input.retrievedAt ?? nowIso(identity),
    entityRef: copyEntityRef(input.entityRef),
    snapshot,
    snapshotHash: snapshot ? generateHash(snapshot) : null,
    toolName: input.toolName ?? null,
    toolArgs: wrapPayload(input.toolArgs)
  };
}

export type ActionInput = {
  tool: string;
  actionId?: string;
  operation?: string | null;
  targetEntity?: EntityRef | null;
  committedAt?: string;
  params?: JsonObject | null;
  result?: JsonObject | null;
  success?: boolean;
};

export function createAction(input: ActionInput, identity: IdentitySource = randomIdentity): Action {
  return {
    actionId: input.actionId ?? generateId(identity),
    tool: input.tool,
    operation: input.operation ?? null,
    targetEntity: copyEntityRef(input.targetEntity),
    committedAt: input.committedAt ?? nowIso(identity),
    params: wrapPayload(input.params),
    result: wrapPayload(input.result),
    success: input.success ?? true
  };
}

export function createPolicyEval(input: {
  policyId: string;
  version: string;
  result: PolicyResult;
  message?: string | null;
  inputsHash?: string | null;
}): PolicyEval {
  return {
    policyId: input.policyId,
    version: input.version,
    result: input.result,
    inputsHash: input.inputsHash ?? null,
    message: input.message ?? null
  };
}

export function createApproval(
  input: {
    approver: Actor;
    granted: boolean;
    approvalId?: string;
    grantedAt?: string;
    reason?: string | null;
  },
  identity: IdentitySource = randomIdentity
): Approval {
  return {
    approvalId: input.approvalId ?? generateId(identity),
    approver: { ...input.approver },
    granted: input.granted,
    grantedAt: input.grantedAt ?? nowIso(identity),
    reason: input.reason ?? null
  };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((entry) => deepFreeze(entry));
  }
  return value;
}

/** Copies the record by value and freezes the copy. */
export function sealDecisionRecord(record: DecisionRecord): Readonly<DecisionRecord> {
  return deepFreeze(structuredClone(record));
}
