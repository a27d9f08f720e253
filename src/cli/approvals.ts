import type { AwilixContainer } from "awilix";

import type { ApprovalDecision, ApprovalRequest } from "../shared/approvals/types.js";
import type { FlowgateCradle } from "../service/orchestrator/di/container.js";

export function formatPendingEntry(request: ApprovalRequest): string {
  return `- ${request.id} | ${request.actionKind} | priority=${request.priority} | approver=${request.approverId} | confidence=${request.confidenceScore.toFixed(2)} | ${request.description}`;
}

export async function fetchPendingEntries(
  container: AwilixContainer<FlowgateCradle>,
  approverId?: string
): Promise<ApprovalRequest[]> {
  return container.resolve("approvalManager").listPending(approverId);
}

/**
 * 先解析引擎再做决定，使等待该审批的执行随决定一起迁移状态
 */
export async function recordApprovalDecision(
  container: AwilixContainer<FlowgateCradle>,
  approvalId: string,
  approverId: string,
  decision: ApprovalDecision,
  reason?: string
): Promise<boolean> {
  container.resolve("workflowEngine");
  const manager = container.resolve("approvalManager");
  return manager.handleCallback({ approvalId, approverId, decision, ...(reason ? { reason } : {}) });
}
