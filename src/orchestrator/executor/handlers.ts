import { randomUUID } from "node:crypto";

import { errorMessage } from "../../shared/errors.js";
import type { Action, Priority } from "../../shared/schemas/action.js";
import type { HttpMethod } from "../connectors/types.js";
import { readPath } from "./conditions.js";
import { err, ok, type HandlerContext, type StepHandler, type StepHandlerRegistry, type StepResult } from "./types.js";

type Config = Readonly<Record<string, unknown>>;

const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "DELETE"];
const PRIORITIES: readonly Priority[] = ["low", "medium", "high", "critical"];
const DEFAULT_CHANNEL = "#general";

function optionalString(config: Config, key: string): string | undefined {
  const value = config[key];
  if (typeof value === "string" && value.trim().length > 0) {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return undefined;
}

function optionalNumber(config: Config, key: string): number | undefined {
  const value = config[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0 && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function missing(step: { id: string; type: string }, keys: readonly string[]): StepResult {
  return err("invalid_config", `${step.type} step ${step.id} requires ${keys.join(", ")}`);
}

/**
 * 连接器异常转为 err，处理器本身不抛出
 */
async function callConnector<T>(ctx: HandlerContext, label: string, call: () => Promise<T>): Promise<StepResult> {
  try {
    return ok(await call());
  } catch (error) {
    ctx.logger.error(`${label} 调用失败`, error, { executionId: ctx.executionId });
    return err("connector_failed", `${label} failed: ${errorMessage(error)}`);
  }
}

const sendNotification: StepHandler = async (step, config, ctx) => {
  const message = optionalString(config, "message");
  if (!message) {
    return missing(step, ["message"]);
  }
  const userId = optionalString(config, "userId");
  const target = userId
    ? { kind: "direct" as const, userId }
    : { kind: "channel" as const, channel: optionalString(config, "channel") ?? DEFAULT_CHANNEL };
  return callConnector(ctx, "notification", async () => ({
    ...(await ctx.connectors.notifications.sendNotification(target, message)),
    target
  }));
};

const createTask: StepHandler = async (step, config, ctx) => {
  const name = optionalString(config, "name");
  const project = optionalString(config, "project");
  if (!name || !project) {
    return missing(step, ["name", "project"]);
  }
  const description = optionalString(config, "description");
  const assignee = optionalString(config, "assignee");
  const dueDate = optionalString(config, "dueDate");
  const task = {
    name,
    project,
    ...(description ? { description } : {}),
    ...(assignee ? { assignee } : {}),
    ...(dueDate ? { dueDate } : {})
  };
  return callConnector(ctx, "task", async () => ({
    ...(await ctx.connectors.tasks.createTask(task)),
    name,
    project
  }));
};

const sendMessage: StepHandler = async (step, config, ctx) => {
  const to = optionalString(config, "to");
  const subject = optionalString(config, "subject");
  const body = optionalString(config, "body");
  if (!to || !subject || !body) {
    return missing(step, ["to", "subject", "body"]);
  }
  return callConnector(ctx, "message", async () => ({
    ...(await ctx.connectors.messages.sendMessage({ to, subject, body })),
    to
  }));
};

const scheduleEvent: StepHandler = async (step, config, ctx) => {
  const title = optionalString(config, "title");
  if (!title) {
    return missing(step, ["title"]);
  }
  const startValue = optionalString(config, "start");
  const start = startValue ? new Date(startValue) : new Date(ctx.now().getTime() + 3_600_000);
  if (Number.isNaN(start.getTime())) {
    return err("invalid_config", `schedule_event step ${step.id} has an invalid start: ${String(startValue)}`);
  }
  const durationMinutes = optionalNumber(config, "durationMinutes") ?? 30;
  const end = new Date(start.getTime() + durationMinutes * 60_000);
  const rawAttendees = config.attendees;
  const attendees = Array.isArray(rawAttendees)
    ? rawAttendees.filter((item): item is string => typeof item === "string" && item.length > 0)
    : [];
  const event = { title, start: start.toISOString(), end: end.toISOString(), attendees };
  return callConnector(ctx, "calendar", async () => ({
    ...(await ctx.connectors.calendar.scheduleEvent(event)),
    start: event.start,
    end: event.end
  }));
};

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

const webhookCall: StepHandler = async (step, config, ctx) => {
  const url = optionalString(config, "url");
  if (!url) {
    return missing(step, ["url"]);
  }
  const method = (optionalString(config, "method") ?? "POST").toUpperCase();
  if (!isHttpMethod(method)) {
    return err("invalid_config", `webhook_call step ${step.id} has unsupported method ${method}`);
  }
  const headers: Record<string, string> = {};
  const rawHeaders = config.headers;
  if (typeof rawHeaders === "object" && rawHeaders !== null) {
    for (const [key, value] of Object.entries(rawHeaders)) {
      if (typeof value === "string") {
        headers[key] = value;
      }
    }
  }
  try {
    const response = await ctx.connectors.webhooks.call({ url, method, headers, body: config.body });
    if (response.statusCode >= 400) {
      return err("http_error", `webhook ${url} responded with ${response.statusCode}`);
    }
    return ok(response);
  } catch (error) {
    ctx.logger.error("webhook 调用失败", error, { executionId: ctx.executionId, url });
    return err("connector_failed", `webhook failed: ${errorMessage(error)}`);
  }
};

const delay: StepHandler = async (step, config, ctx) => {
  const seconds =
    (optionalNumber(config, "seconds") ?? 0) +
    (optionalNumber(config, "minutes") ?? 0) * 60 +
    (optionalNumber(config, "hours") ?? 0) * 3600;
  if (seconds < 0) {
    return err("invalid_config", `delay step ${step.id} has a negative duration`);
  }
  await ctx.sleep(seconds * 1000);
  return ok({ delayedSeconds: seconds });
};

const setVariable: StepHandler = async (step, config) => {
  const variable = optionalString(config, "variable");
  if (!variable) {
    return missing(step, ["variable"]);
  }
  const value = config.value ?? null;
  return ok({ [variable]: value }, { [variable]: value });
};

const approvalGate: StepHandler = async (step, config, ctx) => {
  if (!ctx.approvals) {
    return err("approval_unavailable", `approval_gate step ${step.id} has no approval manager`);
  }
  const priorityValue = optionalString(config, "priority");
  const priority = PRIORITIES.find((candidate) => candidate === priorityValue) ?? "medium";
  const requesterFromEvent = readPath(ctx.context, "event.userId");
  const requesterId =
    optionalString(config, "requesterId") ??
    (typeof requesterFromEvent === "string" ? requesterFromEvent : `workflow:${ctx.workflow.id}`);

  const action: Action = {
    id: `${ctx.executionId}:${step.id}:${randomUUID()}`,
    kind: "decision",
    operation: "approval_gate",
    description: optionalString(config, "description") ?? `Approve step ${step.name ?? step.id} of ${ctx.workflow.name}`,
    priority,
    payload: { workflowId: ctx.workflow.id, executionId: ctx.executionId, stepId: step.id },
    requiresApproval: config.requiresApproval !== false,
    approvalConfidenceThreshold: 0.8,
    maxRetries: 0,
    timeoutSeconds: 300,
    createdAt: ctx.now().toISOString(),
    status: "pending"
  };

  try {
    const request = await ctx.approvals.requestApproval(action, requesterId);
    const output = { approvalId: request.id, status: request.status };
    if (request.status === "pending") {
      return { kind: "suspend", approvalId: request.id, output };
    }
    return ok(output);
  } catch (error) {
    ctx.logger.error("审批请求失败", error, { executionId: ctx.executionId, stepId: step.id });
    return err("connector_failed", `approval request failed: ${errorMessage(error)}`);
  }
};

export function createStepHandlers(overrides: Partial<StepHandlerRegistry> = {}): StepHandlerRegistry {
  return {
    send_notification: sendNotification,
    create_task: createTask,
    send_message: sendMessage,
    schedule_event: scheduleEvent,
    webhook_call: webhookCall,
    delay,
    set_variable: setVariable,
    approval_gate: approvalGate,
    ...overrides
  };
}
