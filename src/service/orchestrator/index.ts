export { WorkflowEngine } from "./engine.js";
export type { TriggerOptions, WorkflowEngineOptions } from "./engine.js";
export { AutomationPipeline } from "./pipeline.js";
export type { PipelineOutcome } from "./pipeline.js";
export { createFlowgateService, DEFAULT_BASE_PATH } from "./server.js";
export type { FlowgateServiceOptions } from "./server.js";
export { createFlowgateContainer, disposeContainer } from "./di/container.js";
export type { ContainerOptions, FlowgateCradle } from "./di/container.js";
