export type NotificationTarget =
  | { readonly kind: "direct"; readonly userId: string }
  | { readonly kind: "channel"; readonly channel: string };

export interface TaskInput {
  readonly name: string;
  readonly project: string;
  readonly description?: string;
  readonly assignee?: string;
  readonly dueDate?: string;
}

export interface MessageInput {
  readonly to: string;
  readonly subject: string;
  readonly body: string;
}

export interface CalendarEventInput {
  readonly title: string;
  readonly start: string;
  readonly end: string;
  readonly attendees: readonly string[];
}

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface WebhookRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: unknown;
  readonly timeoutMs?: number;
}

export interface WebhookResponse {
  readonly statusCode: number;
  readonly body: unknown;
}

export interface NotificationConnector {
  sendNotification(target: NotificationTarget, message: string): Promise<{ messageId: string }>;
}

export interface TaskConnector {
  createTask(task: TaskInput): Promise<{ taskId: string }>;
}

export interface MessageConnector {
  sendMessage(message: MessageInput): Promise<{ messageId: string }>;
}

export interface CalendarConnector {
  scheduleEvent(event: CalendarEventInput): Promise<{ eventId: string }>;
}

export interface WebhookConnector {
  call(request: WebhookRequest): Promise<WebhookResponse>;
}

/**
 * 外部系统出口；步骤处理器只通过这些接口产生副作用
 */
export interface Connectors {
  readonly notifications: NotificationConnector;
  readonly tasks: TaskConnector;
  readonly messages: MessageConnector;
  readonly calendar: CalendarConnector;
  readonly webhooks: WebhookConnector;
}
