import { resolve as resolvePath } from "node:path";

import { Args, Command } from "@oclif/core";

import { loadWorkflowFromFile } from "../../../orchestrator/workflow/loader.js";
import { ValidationError } from "../../../shared/errors.js";

export default class WorkflowsValidate extends Command {
  static override summary = "校验工作流定义文件";

  static override description = "读取工作流 JSON，检查 schema、步骤引用与无条件循环，不写入任何状态。";

  static override args = {
    file: Args.string({ description: "工作流 JSON 文件路径", required: true })
  };

  async run(): Promise<void> {
    const { args } = await this.parse(WorkflowsValidate);
    try {
      const graph = await loadWorkflowFromFile(resolvePath(args.file));
      const { definition } = graph;
      this.log(
        `✓ ${definition.id} v${definition.version}: ${definition.steps.length} 个步骤，${definition.connections.length} 条连接，触发器 ${definition.trigger.id}`
      );
    } catch (error) {
      if (error instanceof ValidationError) {
        for (const issue of error.issues) {
          this.logToStderr(`  ${issue.path}: ${issue.message}`);
        }
        this.error(error.message, { exit: 1 });
      }
      throw error;
    }
  }
}
