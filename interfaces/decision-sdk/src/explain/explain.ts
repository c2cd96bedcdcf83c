import type { ActorType, DecisionRecord, Outcome, PolicyResult } from "../model/types";

export type EvidenceStep = {
  step: number;
  type: "observation";
  source: string;
  tool: string | null;
  retrievedAt: string;
  snapshotHash: string | null;
  summary: string;
};

export type PolicyStep = {
  step: number;
  type: "policy_check";
  policyId: string;
  version: string;
  result: PolicyResult;
  message: string | null;
  summary: string;
};

export type ApprovalStep = {
  step: number;
  type: "approval";
  approverId: string;
  approverType: ActorType;
  granted: boolean;
  grantedAt: string;
  reason: string | null;
  summary: string;
};

export type ActionStep = {
  step: number;
  type: "action";
  tool: string;
  operation: string | null;
  committedAt: string;
  success: boolean;
  summary: string;
};

export type DecisionExplanation = {
  decisionId: string;
  runId: string;
  timestamp: string;
  outcome: Outcome;
  outcomeReason: string | null;
  actor: { type: ActorType; id: string } | null;
  evidenceChain: EvidenceStep[];
  policyChain: PolicyStep[];
  approvalChain: ApprovalStep[];
  actionChain: ActionStep[];
  summary: string;
};

export function buildExplanationSummary(record: DecisionRecord): string {
  const parts: string[] = [];
  if (record.evidence.length) {
    parts.push(`Gathered ${record.evidence.length} pieces of evidence`);
  }
  if (record.policies.length) {
    const passed = record.policies.filter((policy) => policy.result === "pass").length;
    parts.push(`Evaluated ${record.policies.length} policies (${passed} passed)`);
  }
  if (record.approvals.length) {
    const granted = record.approvals.filter((approval) => approval.granted).length;
    parts.push(`Received ${granted}/${record.approvals.length} approvals`);
  }
  if (record.actions.length) {
    const succeeded = record.actions.filter((action) => action.success).length;
    parts.push(`Executed ${succeeded}/${record.actions.length} actions`);
  }
  parts.push(`Outcome: ${record.outcome}`);
  return `${parts.join(". ")}.`;
}

/** Rebuilds the "why" of a stored record. Chain order is the record's array order. */
export function buildExplanation(record: DecisionRecord): DecisionExplanation {
  return {
    decisionId: record.decisionId,
    runId: record.runId,
    timestamp: record.timestamp,
    outcome: record.outcome,
    outcomeReason: record.outcomeReason,
    actor: record.actor ? { type: record.actor.type, id: record.actor.id } : null,
    evidenceChain: record.evidence.map((evidence, index) => ({
      step: index + 1,
      type: "observation",
      source: evidence.source,
      tool: evidence.toolName,
      retrievedAt: evidence.retrievedAt,
      snapshotHash: evidence.snapshotHash,
      summary: `Read from ${evidence.source}`
    })),
    policyChain: record.policies.map((policy, index) => ({
      step: index + 1,
      type: "policy_check",
      policyId: policy.policyId,
      version: policy.version,
      result: policy.result,
      message: policy.message,
      summary: `Policy ${policy.policyId} ${policy.result}`
    })),
    approvalChain: record.approvals.map((approval, index) => ({
      step: index + 1,
      type: "approval",
      approverId: approval.approver.id,
      approverType: approval.approver.type,
      granted: approval.granted,
      grantedAt: approval.grantedAt,
      reason: approval.reason,
      summary: `${approval.granted ? "Approved" : "Denied"} by ${approval.approver.id}`
    })),
    actionChain: record.actions.map((action, index) => ({
      step: index + 1,
      type: "action",
      tool: action.tool,
      operation: action.operation,
      committedAt: action.committedAt,
      success: action.success,
      summary: `Executed ${action.tool}`
    })),
    summary: buildExplanationSummary(record)
  };
}

export function serializeExplanation(explanation: DecisionExplanation) {
  return {
    decision_id: explanation.decisionId,
    run_id: explanation.runId,
    timestamp: explanation.timestamp,
    outcome: explanation.outcome,
    outcome_reason: explanation.outcomeReason,
    actor: explanation.actor,
    evidence_chain: explanation.evidenceChain.map((step) => ({
      step: step.step,
      type: step.type,
      source: step.source,
      tool: step.tool,
      retrieved_at: step.retrievedAt,
      snapshot_hash: step.snapshotHash,
      summary: step.summary
    })),
    policy_chain: explanation.policyChain.map((step) => ({
      step: step.step,
      type: step.type,
      policy_id: step.policyId,
      version: step.version,
      result: step.result,
      message: step.message,
      summary: step.summary
    })),
    approval_chain: explanation.approvalChain.map((step) => ({
      step: step.step,
      type: step.type,
      approver_id: step.approverId,
      approver_type: step.approverType,
      granted: step.granted,
      granted_at: step.grantedAt,
      reason: step.reason,
      summary: step.summary
    })),
    action_chain: explanation.actionChain.map((step) => ({
      step: step.step,
      type: step.type,
      tool: step.tool,
      operation: step.operation,
      committed_at: step.committedAt,
      success: step.success,
      summary: step.summary
    })),
    summary: explanation.summary
  };
}

export function buildExplanationMarkdown(explanation: DecisionExplanation): string {
  const lines: string[] = [];
  lines.push(`# Decision Explanation: ${explanation.decisionId}`);
  lines.push("");
  lines.push(`- Run ID: ${explanation.runId}`);
  lines.push(`- Started At: ${explanation.timestamp}`);
  lines.push(`- Outcome: ${explanation.outcome}`);
  if (explanation.outcomeReason) {
    lines.push(`- Reason: ${explanation.outcomeReason}`);
  }
  if (explanation.actor) {
    lines.push(`- Actor: ${explanation.actor.type}:${explanation.actor.id}`);
  }
  lines.push("");
  lines.push(explanation.summary);

  const sections: Array<{ title: string; entries: Array<{ step: number; summary: string }> }> = [
    { title: "Evidence", entries: explanation.evidenceChain },
    { title: "Policies", entries: explanation.policyChain },
    { title: "Approvals", entries: explanation.approvalChain },
    { title: "Actions", entries: explanation.actionChain }
  ];
  sections.forEach((section) => {
    lines.push("");
    lines.push(`## ${section.title}`);
    lines.push("");
    if (!section.entries.length) {
      lines.push(`- No ${section.title.toLowerCase()} recorded.`);
      return;
    }
    section.entries.forEach((entry) => lines.push(`${entry.step}. ${entry.summary}`));
  });
  return lines.join("\n");
}
