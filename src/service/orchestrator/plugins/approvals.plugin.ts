import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";

import type { ApprovalManager } from "../../../shared/approvals/manager.js";
import { errorBody, parseRequest } from "./errors.js";

interface ApprovalsPluginOptions {
  basePath: string;
  approvals: ApprovalManager;
}

const PendingQuerySchema = z.object({
  approverId: z.string().min(1).optional()
});

const HistoryQuerySchema = z.object({
  userId: z.string().min(1)
});

const CallbackBodySchema = z.object({
  approvalId: z.string().min(1),
  approverId: z.string().min(1),
  decision: z.enum(["approve", "reject"]),
  reason: z.string().optional()
});

export const approvalsPlugin: FastifyPluginAsync<ApprovalsPluginOptions> = async (app, options) => {
  const { approvals } = options;
  const approvalsRoute = `${options.basePath}/approvals`;

  // GET /approvals/pending - 待审批列表，可按审批人过滤
  app.get(`${approvalsRoute}/pending`, async (request) => {
    const { approverId } = parseRequest(PendingQuerySchema, request.query, "Invalid approvals query");
    return { approvals: await approvals.listPending(approverId) };
  });

  app.get(`${approvalsRoute}/history`, async (request) => {
    const { userId } = parseRequest(HistoryQuerySchema, request.query, "Invalid approvals query");
    return { approvals: await approvals.history(userId) };
  });

  app.get<{ Params: { id: string } }>(`${approvalsRoute}/:id`, async (request, reply) => {
    const approval = await approvals.getRequest(request.params.id);
    if (!approval) {
      reply.code(404);
      return errorBody("approval_not_found", `Approval ${request.params.id} not found`);
    }
    return approval;
  });

  // POST /approvals/callback - 审批渠道回调
  app.post(`${approvalsRoute}/callback`, async (request, reply) => {
    const callback = parseRequest(CallbackBodySchema, request.body, "Invalid approval callback");
    const applied = await approvals.handleCallback(callback);
    if (!applied) {
      reply.code(409);
      return errorBody(
        "decision_not_applied",
        `Approval ${callback.approvalId} is not pending or is not assigned to ${callback.approverId}`
      );
    }
    return { approval: await approvals.getRequest(callback.approvalId) };
  });
};
