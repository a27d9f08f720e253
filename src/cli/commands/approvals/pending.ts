import { Command, Flags } from "@oclif/core";

import { fetchPendingEntries, formatPendingEntry } from "../../approvals.js";
import { contextFlags, openContainer } from "../../support/context.js";

export default class ApprovalsPending extends Command {
  static override summary = "列出待审批请求";

  static override flags = {
    ...contextFlags,
    approver: Flags.string({ description: "只显示分配给该审批人的请求" })
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ApprovalsPending);
    const container = await openContainer(flags);
    try {
      const entries = await fetchPendingEntries(container, flags.approver);
      if (entries.length === 0) {
        this.log("暂无待审批项");
        return;
      }
      for (const entry of entries) {
        this.log(formatPendingEntry(entry));
      }
    } finally {
      await container.dispose();
    }
  }
}
