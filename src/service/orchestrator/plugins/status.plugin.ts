import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import type { ExecutionSupervisor } from "../../../orchestrator/supervisor/supervisor.js";
import type { RecentLogBuffer } from "../../../shared/logging/events.js";
import type { ExecutionsRepository } from "../repositories/ExecutionsRepository.js";
import { parseRequest } from "./errors.js";

interface StatusPluginOptions {
  basePath: string;
  supervisor: ExecutionSupervisor;
  executions: ExecutionsRepository;
  recentLogs: RecentLogBuffer;
}

const RecentLogsQuerySchema = z.object({
  level: z.enum(["info", "warn", "error"]).optional(),
  component: z.string().min(1).optional(),
  executionId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

export const statusPlugin: FastifyPluginAsync<StatusPluginOptions> = async (app, options) => {
  const { supervisor, executions, recentLogs, basePath } = options;

  app.get(`${basePath}/status`, async () => ({
    status: "ok",
    supervisor: {
      scheduled: supervisor.running,
      lastReport: supervisor.lastReport
    },
    executions: await executions.getStats()
  }));

  // POST /supervisor/sweep - 立即执行一次监督扫描
  app.post(`${basePath}/supervisor/sweep`, async () => supervisor.sweep());

  app.get(`${basePath}/logs/recent`, async (request) => {
    const query = parseRequest(RecentLogsQuerySchema, request.query, "Invalid log query");
    return { entries: recentLogs.list(query) };
  });
};
