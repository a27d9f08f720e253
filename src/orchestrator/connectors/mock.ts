import type {
  CalendarEventInput,
  Connectors,
  MessageInput,
  NotificationTarget,
  TaskInput,
  WebhookRequest
} from "./types.js";

export interface RecordedCalls {
  readonly notifications: { target: NotificationTarget; message: string }[];
  readonly tasks: TaskInput[];
  readonly messages: MessageInput[];
  readonly events: CalendarEventInput[];
  readonly webhooks: WebhookRequest[];
}

export interface MockConnectors extends Connectors {
  readonly calls: RecordedCalls;
}

/**
 * 不访问外部系统的连接器，返回可预测的 ID（task-1、msg-1 ...）
 */
export function createMockConnectors(): MockConnectors {
  const calls: RecordedCalls = {
    notifications: [],
    tasks: [],
    messages: [],
    events: [],
    webhooks: []
  };
  let sequence = 0;
  const nextId = (prefix: string) => {
    sequence += 1;
    return `${prefix}-${sequence}`;
  };

  return {
    calls,
    notifications: {
      async sendNotification(target, message) {
        calls.notifications.push({ target, message });
        return { messageId: nextId("msg") };
      }
    },
    tasks: {
      async createTask(task) {
        calls.tasks.push(task);
        return { taskId: nextId("task") };
      }
    },
    messages: {
      async sendMessage(message) {
        calls.messages.push(message);
        return { messageId: nextId("msg") };
      }
    },
    calendar: {
      async scheduleEvent(event) {
        calls.events.push(event);
        return { eventId: nextId("event") };
      }
    },
    webhooks: {
      async call(request) {
        calls.webhooks.push(request);
        return { statusCode: 200, body: { ok: true } };
      }
    }
  };
}
