import type { NotificationConnector } from "../../../orchestrator/connectors/types.js";
import type { ApprovalMessage, ApprovalNotifier } from "../../../shared/approvals/types.js";

/**
 * 通过通知连接器直接发给审批人
 */
export class ConnectorApprovalNotifier implements ApprovalNotifier {
  constructor(private readonly notifications: NotificationConnector) {}

  async notify(message: ApprovalMessage): Promise<void> {
    const choices = message.actions.map((action) => `[${action.label}]`).join(" ");
    await this.notifications.sendNotification(
      { kind: "direct", userId: message.approverId },
      `${message.title}\n${message.description}\n${choices} (approval ${message.approvalId})`
    );
  }
}
