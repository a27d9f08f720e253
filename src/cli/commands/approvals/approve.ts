import { Args, Command, Flags } from "@oclif/core";

import { recordApprovalDecision } from "../../approvals.js";
import { contextFlags, openContainer } from "../../support/context.js";

export default class ApprovalsApprove extends Command {
  static override summary = "批准待审批请求";

  static override description = "写入审批结果；等待该审批的执行转回 pending，由服务继续派发。";

  static override args = {
    id: Args.string({ description: "审批 ID", required: true })
  };

  static override flags = {
    ...contextFlags,
    approver: Flags.string({ description: "审批人", required: true }),
    reason: Flags.string({ description: "审批备注" })
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ApprovalsApprove);
    const container = await openContainer(flags);
    try {
      const applied = await recordApprovalDecision(container, args.id, flags.approver, "approve", flags.reason);
      if (!applied) {
        this.error(`审批 ${args.id} 未生效：不在待审批状态或审批人不匹配`, { exit: 1 });
      }
      this.log(`已记录审批结果：${args.id} -> approved`);
    } finally {
      await container.dispose();
    }
  }
}
