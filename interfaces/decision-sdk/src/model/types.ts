export type ActorType = "agent" | "human" | "system";

export type Outcome = "committed" | "denied" | "escalated" | "pending";

export type PolicyResult = "pass" | "fail" | "warn" | "skip";

export type JsonObject = Record<string, unknown>;

export type EntityRef = {
  namespace: string;
  type: string;
  id: string;
  aliases: string[];
};

export type Actor = {
  type: ActorType;
  id: string;
  name: string | null;
};

export type Evidence = {
  evidenceId: string;
  source: string;
  retrievedAt: string;
  entityRef: EntityRef | null;
  snapshot: JsonObject | null;
  snapshotHash: string | null;
  toolName: string | null;
  toolArgs: JsonObject | null;
};

export type PolicyEval = {
  policyId: string;
  version: string;
  result: PolicyResult;
  inputsHash: string | null;
  message: string | null;
};

export type Approval = {
  approvalId: string;
  approver: Actor;
  granted: boolean;
  grantedAt: string;
  reason: string | null;
};

export type Action = {
  actionId: string;
  tool: string;
  operation: string | null;
  targetEntity: EntityRef | null;
  committedAt: string;
  params: JsonObject | null;
  result: JsonObject | null;
  success: boolean;
};

export type DecisionRecord = {
  decisionId: string;
  runId: string;
  traceId: string | null;
  spanId: string | null;
  timestamp: string;
  actor: Actor | null;
  subjectEntities: EntityRef[];
  evidence: Evidence[];
  policies: PolicyEval[];
  approvals: Approval[];
  actions: Action[];
  outcome: Outcome;
  outcomeReason: string | null;
  precedentRefs: string[];
  metadata: JsonObject;
};
