import fastify, { type FastifyInstance } from "fastify";
import type { AwilixContainer } from "awilix";

import { createLoggerFacade, setLogEventPublisher } from "../../shared/logging/logger.js";
import type { FlowgateCradle } from "./di/container.js";
import { approvalsPlugin } from "./plugins/approvals.plugin.js";
import { toErrorResponse } from "./plugins/errors.js";
import { eventsPlugin } from "./plugins/events.plugin.js";
import { executionsPlugin } from "./plugins/executions.plugin.js";
import { statusPlugin } from "./plugins/status.plugin.js";
import { workflowsPlugin } from "./plugins/workflows.plugin.js";

export const DEFAULT_BASE_PATH = "/api/v1";

export interface FlowgateServiceOptions {
  container: AwilixContainer<FlowgateCradle>;
  basePath?: string;
  /**
   * 关闭服务时是否同时释放容器（默认 true）
   */
  disposeContainerOnClose?: boolean;
}

export async function createFlowgateService(options: FlowgateServiceOptions): Promise<FastifyInstance> {
  const { container } = options;
  const basePath = options.basePath ?? DEFAULT_BASE_PATH;
  const logger = createLoggerFacade("http");
  const app = fastify({ logger: false });

  const engine = container.resolve("workflowEngine");
  const now = container.resolve("now");
  const recentLogs = container.resolve("recentLogs");
  setLogEventPublisher(recentLogs.push);

  await app.register(executionsPlugin, { basePath, engine });
  await app.register(workflowsPlugin, { basePath, engine, now });
  await app.register(eventsPlugin, { basePath, pipeline: container.resolve("pipeline") });
  await app.register(approvalsPlugin, { basePath, approvals: container.resolve("approvalManager") });
  await app.register(statusPlugin, {
    basePath,
    supervisor: container.resolve("supervisor"),
    executions: container.resolve("executionsRepository"),
    recentLogs
  });

  app.setErrorHandler<Error>((error, request, reply) => {
    const { statusCode, body } = toErrorResponse(error);
    if (statusCode >= 500) {
      logger.error("请求处理失败", error, { method: request.method, url: request.url });
    }
    void reply.code(statusCode).send(body);
  });

  app.addHook("onClose", async () => {
    setLogEventPublisher(null);
    if (options.disposeContainerOnClose !== false) {
      await container.dispose();
    }
  });

  return app;
}
