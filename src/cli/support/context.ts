import path from "node:path";

import { Flags } from "@oclif/core";
import type { AwilixContainer } from "awilix";

import { loadEngineConfig } from "../../shared/config/engineConfig.js";
import { createFlowgateContainer, type FlowgateCradle } from "../../service/orchestrator/di/container.js";

export const contextFlags = {
  state: Flags.string({ description: "状态目录（默认 <home>/state）" }),
  config: Flags.string({ description: "引擎配置文件路径" })
};

export interface ContextFlags {
  readonly state?: string;
  readonly config?: string;
}

export async function openContainer(flags: ContextFlags): Promise<AwilixContainer<FlowgateCradle>> {
  const config = await loadEngineConfig(flags.config ? { filePath: path.resolve(flags.config) } : {});
  return createFlowgateContainer({
    config,
    ...(flags.state ? { stateDirectory: path.resolve(flags.state) } : {})
  });
}
