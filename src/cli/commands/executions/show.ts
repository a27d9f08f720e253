import { Args, Command } from "@oclif/core";

import { contextFlags, openContainer } from "../../support/context.js";

export default class ExecutionsShow extends Command {
  static override summary = "查看执行记录";

  static override args = {
    id: Args.string({ description: "执行 ID", required: true })
  };

  static override flags = { ...contextFlags };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ExecutionsShow);
    const container = await openContainer(flags);
    try {
      const execution = await container.resolve("executionsRepository").read(args.id);
      if (!execution) {
        this.error(`执行 ${args.id} 不存在`, { exit: 1 });
      }
      this.log(JSON.stringify(execution, null, 2));
    } finally {
      await container.dispose();
    }
  }
}
