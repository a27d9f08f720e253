import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { ExecutionNotFoundError } from "../../../shared/errors.js";
import { ExecutionStatusSchema } from "../../../shared/schemas/execution.js";
import type { WorkflowEngine } from "../engine.js";
import { parseRequest } from "./errors.js";

interface ExecutionsPluginOptions {
  basePath: string;
  engine: WorkflowEngine;
}

interface IdParams {
  id: string;
}

const TriggerBodySchema = z.object({
  workflowId: z.string().min(1),
  triggerPayload: z.record(z.unknown()).default({})
});

const ListQuerySchema = z.object({
  status: ExecutionStatusSchema.optional(),
  workflowId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(50),
  offset: z.coerce.number().int().min(0).default(0),
  sortOrder: z.enum(["asc", "desc"]).default("desc")
});

export const executionsPlugin: FastifyPluginAsync<ExecutionsPluginOptions> = async (app, options) => {
  const { engine } = options;
  const executionsRoute = `${options.basePath}/executions`;

  // POST /executions - 触发工作流
  app.post(executionsRoute, async (request, reply) => {
    const body = parseRequest(TriggerBodySchema, request.body, "Invalid execution request");
    const execution = await engine.trigger(body.workflowId, body.triggerPayload);
    reply.code(201);
    return { executionId: execution.id, status: execution.status };
  });

  // GET /executions - 分页查询
  app.get(executionsRoute, async (request) => {
    const query = parseRequest(ListQuerySchema, request.query, "Invalid execution query");
    return engine.listExecutions(query);
  });

  app.get<{ Params: IdParams }>(`${executionsRoute}/:id`, async (request) => {
    const execution = await engine.getExecution(request.params.id);
    if (!execution) {
      throw new ExecutionNotFoundError(request.params.id);
    }
    return execution;
  });

  app.post<{ Params: IdParams }>(`${executionsRoute}/:id/cancel`, async (request) => {
    const cancelled = await engine.cancel(request.params.id);
    return { cancelled };
  });
};
