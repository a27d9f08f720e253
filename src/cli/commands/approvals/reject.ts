import { Args, Command, Flags } from "@oclif/core";

import { recordApprovalDecision } from "../../approvals.js";
import { contextFlags, openContainer } from "../../support/context.js";

export default class ApprovalsReject extends Command {
  static override summary = "驳回待审批请求";

  static override args = {
    id: Args.string({ description: "审批 ID", required: true })
  };

  static override flags = {
    ...contextFlags,
    approver: Flags.string({ description: "审批人", required: true }),
    reason: Flags.string({ description: "驳回原因", required: true })
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ApprovalsReject);
    const container = await openContainer(flags);
    try {
      const applied = await recordApprovalDecision(container, args.id, flags.approver, "reject", flags.reason);
      if (!applied) {
        this.error(`审批 ${args.id} 未生效：不在待审批状态或审批人不匹配`, { exit: 1 });
      }
      this.log(`已记录审批结果：${args.id} -> rejected`);
    } finally {
      await container.dispose();
    }
  }
}
