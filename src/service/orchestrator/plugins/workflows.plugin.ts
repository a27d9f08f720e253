import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import { instantiateTemplate, listTemplates, WORKFLOW_TEMPLATES } from "../../../orchestrator/workflow/templates.js";
import { WorkflowNotFoundError } from "../../../shared/errors.js";
import type { WorkflowEngine } from "../engine.js";
import { errorBody, parseRequest } from "./errors.js";

interface WorkflowsPluginOptions {
  basePath: string;
  engine: WorkflowEngine;
  now?: () => Date;
}

const VersionQuerySchema = z.object({
  version: z.coerce.number().int().min(1).optional()
});

const InstantiateBodySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  variables: z.record(z.unknown()).optional(),
  enabled: z.boolean().optional()
});

export const workflowsPlugin: FastifyPluginAsync<WorkflowsPluginOptions> = async (app, options) => {
  const { engine, basePath } = options;
  const now = options.now ?? (() => new Date());
  const workflowsRoute = `${basePath}/workflows`;
  const templatesRoute = `${basePath}/workflow-templates`;

  // POST /workflows - 登记定义，已存在的 id 生成新版本
  app.post(workflowsRoute, async (request, reply) => {
    const definition = await engine.registerWorkflow(request.body);
    reply.code(201);
    return definition;
  });

  app.get(workflowsRoute, async () => {
    const workflows = await engine.listWorkflows();
    return { workflows };
  });

  app.get<{ Params: { id: string } }>(`${workflowsRoute}/:id`, async (request) => {
    const { version } = parseRequest(VersionQuerySchema, request.query, "Invalid workflow query");
    const definition = await engine.getWorkflow(request.params.id, version);
    if (!definition) {
      throw new WorkflowNotFoundError(request.params.id);
    }
    return definition;
  });

  app.get(templatesRoute, async () => ({ templates: listTemplates() }));

  app.post<{ Params: { name: string } }>(`${templatesRoute}/:name/instantiate`, async (request, reply) => {
    const { name } = request.params;
    if (!Object.hasOwn(WORKFLOW_TEMPLATES, name)) {
      reply.code(404);
      return errorBody("template_not_found", `Workflow template ${name} not found`);
    }
    const body = parseRequest(InstantiateBodySchema, request.body, "Invalid template instantiation");
    const definition = await engine.registerWorkflow(instantiateTemplate(name, body, now()));
    reply.code(201);
    return definition;
  });
};
