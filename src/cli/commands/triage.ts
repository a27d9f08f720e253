import { randomUUID } from "node:crypto";

import { Args, Command, Flags } from "@oclif/core";

import { EventSourceSchema } from "../../shared/schemas/event.js";
import { triage } from "../../triage/classifier.js";
import { compileAction } from "../../triage/compilers/index.js";

export default class Triage extends Command {
  static override summary = "对一段内容做分诊并输出编译后的动作";

  static override description = "只做分类与编译，不申请审批也不触发工作流。";

  static override args = {
    content: Args.string({ description: "事件内容", required: true })
  };

  static override flags = {
    source: Flags.string({ description: "事件来源", options: [...EventSourceSchema.options], default: "manual" }),
    user: Flags.string({ description: "发起人", default: "cli" })
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Triage);
    const source = EventSourceSchema.parse(flags.source);
    const now = new Date();
    const event = { content: args.content, source, userId: flags.user, metadata: {} };
    const { decision } = triage(event, now, randomUUID());
    const action = compileAction({ decision, event, now, id: randomUUID() });
    this.log(JSON.stringify({ decision, action }, null, 2));
  }
}
