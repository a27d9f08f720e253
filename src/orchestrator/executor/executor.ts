import { Annotation, END, START, StateGraph } from "@langchain/langgraph";

import { errorMessage } from "../../shared/errors.js";
import { createLoggerFacade, type LoggerFacade } from "../../shared/logging/logger.js";
import type { StepRecord, WorkflowExecution } from "../../shared/schemas/execution.js";
import type { Connection } from "../../shared/schemas/workflow.js";
import type { Connectors } from "../connectors/types.js";
import type { WorkflowGraph } from "../workflow/loader.js";
import { evaluateAll, evaluateCondition } from "./conditions.js";
import { createStepHandlers } from "./handlers.js";
import { renderConfig } from "./template.js";
import type {
  ApprovalGateway,
  ExecutionContext,
  ExecutionOutcome,
  RunOptions,
  StepHandlerRegistry,
  StepResult
} from "./types.js";

type WalkStatus = "running" | "completed" | "failed" | "pending_approval" | "cancelled";

const WalkState = Annotation.Root({
  // 当前所在节点（触发器或步骤），从它的出边选择下一步
  cursor: Annotation<string>({
    reducer: (_left, right) => right,
    default: () => ""
  }),
  nextStepId: Annotation<string | null>({
    reducer: (_left, right) => right,
    default: () => null
  }),
  status: Annotation<WalkStatus>({
    reducer: (_left, right) => right,
    default: () => "running"
  }),
  context: Annotation<ExecutionContext>({
    reducer: (_left, right) => right,
    default: () => ({})
  }),
  records: Annotation<StepRecord[]>({
    reducer: (left, right) => [...left, ...right],
    default: () => []
  }),
  executedSteps: Annotation<string[]>({
    reducer: (left, right) => [...left, ...right],
    default: () => []
  }),
  dispatched: Annotation<number>({
    reducer: (_left, right) => right,
    default: () => 0
  }),
  error: Annotation<string | null>({
    reducer: (_left, right) => right,
    default: () => null
  }),
  approvalId: Annotation<string | null>({
    reducer: (_left, right) => right,
    default: () => null
  })
});

type WalkSnapshot = typeof WalkState.State;
type WalkUpdate = Partial<WalkSnapshot>;

export interface GraphExecutorOptions {
  readonly connectors: Connectors;
  readonly handlers?: Partial<StepHandlerRegistry>;
  readonly approvals?: ApprovalGateway;
  readonly maxSteps?: number;
  readonly logger?: LoggerFacade;
  readonly sleep?: (ms: number) => Promise<void>;
}

export type ExecutionInput = Pick<WorkflowExecution, "id" | "triggerPayload" | "resume">;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * 图遍历执行器。
 *
 * select 节点在每次派发前检查取消并按声明顺序选择第一条 guard 通过的出边；
 * dispatch 节点评估步骤条件并调用对应处理器。run 从不抛出。
 */
export class GraphExecutor {
  private readonly handlers: StepHandlerRegistry;

  private readonly connectors: Connectors;

  private readonly approvals?: ApprovalGateway;

  private readonly maxSteps: number;

  private readonly logger: LoggerFacade;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: GraphExecutorOptions) {
    this.handlers = createStepHandlers(options.handlers);
    this.connectors = options.connectors;
    this.approvals = options.approvals;
    this.maxSteps = options.maxSteps ?? 100;
    this.logger = options.logger ?? createLoggerFacade("executor");
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(graph: WorkflowGraph, execution: ExecutionInput, options: RunOptions = {}): Promise<ExecutionOutcome> {
    const now = options.now ?? (() => new Date());
    const { definition } = graph;
    const logger = this.logger.child({ workflowId: definition.id, executionId: execution.id });

    const initial: WalkUpdate = execution.resume
      ? { cursor: execution.resume.afterStepId, context: { ...execution.resume.context } }
      : {
          cursor: definition.trigger.id,
          context: { ...definition.variables, ...execution.triggerPayload }
        };

    const select = async (state: WalkSnapshot): Promise<WalkUpdate> => {
      if (options.isCancelled && (await options.isCancelled())) {
        logger.info("执行已取消，停止派发");
        return { status: "cancelled", nextStepId: null };
      }
      if (state.dispatched >= this.maxSteps) {
        return {
          status: "failed",
          nextStepId: null,
          error: `Execution exceeded the maximum of ${this.maxSteps} steps`
        };
      }
      const next = this.selectConnection(graph.outgoing.get(state.cursor) ?? [], state.context, logger);
      if (!next) {
        return { status: "completed", nextStepId: null };
      }
      return { nextStepId: next.toId };
    };

    const dispatch = async (state: WalkSnapshot): Promise<WalkUpdate> => {
      const stepId = state.nextStepId;
      const step = stepId ? graph.steps.get(stepId) : undefined;
      if (!step) {
        return { status: "failed", error: `Step ${String(stepId)} not found` };
      }
      const startedAt = now().toISOString();
      const dispatched = state.dispatched + 1;

      if (!evaluateAll(step.conditions, state.context, logger)) {
        const skipped: StepRecord = { stepId: step.id, executionId: execution.id, status: "skipped", startedAt, completedAt: startedAt };
        await options.onStepRecorded?.(skipped);
        logger.info(`步骤 ${step.id} 条件不满足，跳过`, { stepId: step.id });
        return { cursor: step.id, nextStepId: null, dispatched, records: [skipped] };
      }

      await options.onStepRecorded?.({ stepId: step.id, executionId: execution.id, status: "running", startedAt });
      const result = await this.invokeHandler(step.id, state.context, graph, execution.id, now, logger);
      const completedAt = now().toISOString();

      switch (result.kind) {
        case "ok": {
          const record: StepRecord = {
            stepId: step.id,
            executionId: execution.id,
            status: "completed",
            startedAt,
            completedAt,
            result: result.output
          };
          await options.onStepRecorded?.(record);
          return {
            cursor: step.id,
            nextStepId: null,
            dispatched,
            records: [record],
            executedSteps: [step.id],
            context: { ...state.context, ...(result.patch ?? {}), [step.id]: result.output }
          };
        }
        case "err": {
          const record: StepRecord = {
            stepId: step.id,
            executionId: execution.id,
            status: "failed",
            startedAt,
            completedAt,
            error: `${result.code}: ${result.message}`
          };
          await options.onStepRecorded?.(record);
          if (step.continueOnFailure) {
            logger.warn(`步骤 ${step.id} 失败，按 continueOnFailure 继续`, { error: result.message });
            return {
              cursor: step.id,
              nextStepId: null,
              dispatched,
              records: [record],
              context: { ...state.context, [step.id]: { error: result.message, code: result.code } }
            };
          }
          logger.error(`步骤 ${step.id} 执行失败`, result.message, { code: result.code });
          return { status: "failed", dispatched, records: [record], error: `Step ${step.id} failed: ${result.message}` };
        }
        case "suspend": {
          const record: StepRecord = {
            stepId: step.id,
            executionId: execution.id,
            status: "pending",
            startedAt,
            result: result.output
          };
          await options.onStepRecorded?.(record);
          logger.info(`步骤 ${step.id} 等待审批 ${result.approvalId}`);
          return {
            cursor: step.id,
            status: "pending_approval",
            dispatched,
            records: [record],
            approvalId: result.approvalId
          };
        }
        default: {
          const unreachable: never = result;
          return unreachable;
        }
      }
    };

    const route = (state: WalkSnapshot) => (state.status === "running" && state.nextStepId ? "dispatch" : END);
    const proceed = (state: WalkSnapshot) => (state.status === "running" ? "select" : END);

    const walker = new StateGraph(WalkState)
      .addNode("select", select)
      .addNode("dispatch", dispatch)
      .addEdge(START, "select")
      .addConditionalEdges("select", route, ["dispatch", END])
      .addConditionalEdges("dispatch", proceed, ["select", END])
      .compile();

    let final: WalkSnapshot;
    try {
      final = await walker.invoke(initial, { recursionLimit: this.maxSteps * 2 + 4 });
    } catch (error) {
      logger.error("工作流遍历异常终止", error);
      return {
        status: "failed",
        error: `Execution aborted: ${errorMessage(error)}`,
        steps: [],
        completedAt: now().toISOString()
      };
    }

    logger.info(`工作流 ${definition.id} 执行状态：${final.status}`, {
      executedSteps: final.executedSteps.length
    });
    return this.toOutcome(final, now);
  }

  private selectConnection(
    connections: readonly Connection[],
    context: ExecutionContext,
    logger: LoggerFacade
  ): Connection | undefined {
    return connections.find((connection) => !connection.guard || evaluateCondition(connection.guard, context, logger));
  }

  private async invokeHandler(
    stepId: string,
    context: ExecutionContext,
    graph: WorkflowGraph,
    executionId: string,
    now: () => Date,
    logger: LoggerFacade
  ): Promise<StepResult> {
    const step = graph.steps.get(stepId);
    if (!step) {
      return { kind: "err", code: "invalid_config", message: `Step ${stepId} not found` };
    }
    try {
      return await this.handlers[step.type](step, renderConfig(step.config, context), {
        workflow: graph.definition,
        executionId,
        context,
        connectors: this.connectors,
        approvals: this.approvals,
        logger,
        sleep: this.sleep,
        now
      });
    } catch (error) {
      logger.error(`步骤 ${step.id} 处理器抛出异常`, error);
      return { kind: "err", code: "handler_threw", message: errorMessage(error) };
    }
  }

  private toOutcome(final: WalkSnapshot, now: () => Date): ExecutionOutcome {
    const result = { context: final.context, executedSteps: final.executedSteps };
    switch (final.status) {
      case "pending_approval":
        return {
          status: "pending_approval",
          steps: final.records,
          result,
          ...(final.approvalId ? { approvalId: final.approvalId } : {}),
          resume: { afterStepId: final.cursor, context: final.context }
        };
      case "failed":
        return {
          status: "failed",
          steps: final.records,
          result,
          error: final.error ?? "Execution failed",
          completedAt: now().toISOString()
        };
      case "cancelled":
        return { status: "cancelled", steps: final.records, result, completedAt: now().toISOString() };
      case "running":
      case "completed":
        return { status: "completed", steps: final.records, result, completedAt: now().toISOString() };
      default: {
        const unreachable: never = final.status;
        return unreachable;
      }
    }
  }
}
