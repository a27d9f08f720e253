import { Command } from "@oclif/core";

import { contextFlags, openContainer } from "../../support/context.js";

export default class SupervisorSweep extends Command {
  static override summary = "执行一次监督扫描";

  static override description = "超时卡住的执行并标记重试；重新派发由运行中的服务完成。";

  static override flags = { ...contextFlags };

  async run(): Promise<void> {
    const { flags } = await this.parse(SupervisorSweep);
    const container = await openContainer(flags);
    try {
      const report = await container.resolve("supervisor").sweep();
      this.log(
        `timedOut=${report.timedOut.length} resubmitted=${report.resubmitted.length} retried=${report.retried.length} exhausted=${report.exhausted.length} resumed=${report.resumed.length}`
      );
      for (const retry of report.retried) {
        this.log(`- retry ${retry.executionId} attempt=${retry.attempt} delayMs=${retry.delayMs}`);
      }
    } finally {
      await container.dispose();
    }
  }
}
