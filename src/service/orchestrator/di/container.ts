/**
 * DI容器配置模块
 *
 * 所有组件都是 SINGLETON，HTTP 服务、CLI 与测试从同一份注册解析。
 * 使用 PROXY 注入：工厂函数拿到 cradle，按需解析依赖。
 */

import { join } from "node:path";

import { asFunction, asValue, createContainer, InjectionMode, Lifetime, type AwilixContainer } from "awilix";

import { createDefaultConnectors } from "../../../orchestrator/connectors/index.js";
import type { Connectors } from "../../../orchestrator/connectors/types.js";
import { GraphExecutor } from "../../../orchestrator/executor/executor.js";
import { ExecutionSupervisor } from "../../../orchestrator/supervisor/supervisor.js";
import { ApprovalManager } from "../../../shared/approvals/manager.js";
import { ConfiguredApproverPolicy, type ApproverPolicy } from "../../../shared/approvals/policy.js";
import { ApprovalStore } from "../../../shared/approvals/store.js";
import type { ApprovalNotifier } from "../../../shared/approvals/types.js";
import type { EngineConfig } from "../../../shared/config/engineConfig.js";
import { RecentLogBuffer } from "../../../shared/logging/events.js";
import { ConnectorApprovalNotifier } from "../approvals/connectorNotifier.js";
import { WorkflowEngine } from "../engine.js";
import { AutomationPipeline } from "../pipeline.js";
import { InProcessDispatchQueue, type DispatchQueue } from "../queue/dispatchQueue.js";
import { ExecutionsRepository } from "../repositories/ExecutionsRepository.js";
import { WorkflowsRepository } from "../repositories/WorkflowsRepository.js";

/**
 * DI容器cradle类型定义
 */
export interface FlowgateCradle {
  config: EngineConfig;
  now: () => Date;
  recentLogs: RecentLogBuffer;
  connectors: Connectors;
  workflowsRepository: WorkflowsRepository;
  executionsRepository: ExecutionsRepository;
  approvalStore: ApprovalStore;
  approverPolicy: ApproverPolicy;
  approvalNotifier: ApprovalNotifier;
  approvalManager: ApprovalManager;
  graphExecutor: GraphExecutor;
  dispatchQueue: DispatchQueue;
  workflowEngine: WorkflowEngine;
  supervisor: ExecutionSupervisor;
  pipeline: AutomationPipeline;
}

export interface ContainerOptions {
  config: EngineConfig;
  /**
   * 状态根目录；不传时各仓库使用 state/ 下的默认目录
   */
  stateDirectory?: string;
  connectors?: Connectors;
  now?: () => Date;
}

export function createFlowgateContainer(options: ContainerOptions): AwilixContainer<FlowgateCradle> {
  const container = createContainer<FlowgateCradle>({
    injectionMode: InjectionMode.PROXY
  });
  const stateDir = (name: string) => (options.stateDirectory ? join(options.stateDirectory, name) : undefined);
  const singleton = { lifetime: Lifetime.SINGLETON };

  container.register({
    config: asValue(options.config),
    now: asValue(options.now ?? (() => new Date())),
    recentLogs: asValue(new RecentLogBuffer()),
    connectors: asFunction(() => options.connectors ?? createDefaultConnectors(), singleton),

    workflowsRepository: asFunction(() => {
      const directory = stateDir("workflows");
      return new WorkflowsRepository(directory ? { directory } : {});
    }, singleton),

    executionsRepository: asFunction(({ now }: FlowgateCradle) => {
      const directory = stateDir("executions");
      return new ExecutionsRepository(directory ? { directory, now } : { now });
    }, singleton),

    approvalStore: asFunction(() => {
      const directory = stateDir("approvals");
      return new ApprovalStore(directory ? { directory } : {});
    }, singleton),

    approverPolicy: asFunction(
      ({ config }: FlowgateCradle) =>
        new ConfiguredApproverPolicy({
          defaultApprover: config.approvals.defaultApprover,
          approvers: config.approvals.approvers
        }),
      singleton
    ),

    approvalNotifier: asFunction(
      ({ connectors }: FlowgateCradle) => new ConnectorApprovalNotifier(connectors.notifications),
      singleton
    ),

    approvalManager: asFunction(
      ({ approvalStore, approverPolicy, approvalNotifier, config, now }: FlowgateCradle) =>
        new ApprovalManager({
          store: approvalStore,
          policy: approverPolicy,
          notifier: approvalNotifier,
          autoApprovalThreshold: config.approvals.autoApprovalThreshold,
          now
        }),
      singleton
    ),

    graphExecutor: asFunction(
      ({ connectors, approvalManager, config }: FlowgateCradle) =>
        new GraphExecutor({
          connectors,
          approvals: approvalManager,
          maxSteps: config.executor.maxSteps
        }),
      singleton
    ),

    // worker 在派发时才解析引擎，避免与引擎的构造互相依赖
    dispatchQueue: asFunction(
      (cradle: FlowgateCradle) =>
        new InProcessDispatchQueue({
          worker: (executionId) => cradle.workflowEngine.processExecution(executionId),
          concurrency: cradle.config.executor.maxConcurrency
        }),
      { ...singleton, dispose: (queue) => queue.close() }
    ),

    workflowEngine: asFunction(
      ({ workflowsRepository, executionsRepository, graphExecutor, approvalManager, dispatchQueue, config, now }: FlowgateCradle) =>
        new WorkflowEngine({
          workflows: workflowsRepository,
          executions: executionsRepository,
          executor: graphExecutor,
          approvals: approvalManager,
          queue: dispatchQueue,
          maxRetries: config.supervisor.maxRetries,
          maxConcurrency: config.executor.maxConcurrency,
          now
        }),
      { ...singleton, dispose: (engine) => engine.close() }
    ),

    supervisor: asFunction(
      ({ executionsRepository, dispatchQueue, workflowEngine, config, now }: FlowgateCradle) =>
        new ExecutionSupervisor({
          executions: executionsRepository,
          dispatcher: dispatchQueue,
          approvals: workflowEngine,
          runningTimeoutMs: config.supervisor.runningTimeoutMs,
          startupGraceMs: config.supervisor.startupGraceMs,
          baseBackoffMs: config.supervisor.baseBackoffMs,
          schedule: config.supervisor.schedule,
          now
        }),
      { ...singleton, dispose: (supervisor) => supervisor.stop() }
    ),

    pipeline: asFunction(
      ({ workflowEngine, approvalManager, config, now }: FlowgateCradle) =>
        new AutomationPipeline({
          engine: workflowEngine,
          approvals: approvalManager,
          escalationTarget: config.escalation.defaultTarget,
          now
        }),
      singleton
    )
  });

  return container;
}

export async function disposeContainer(container: AwilixContainer<FlowgateCradle>): Promise<void> {
  await container.dispose();
}
