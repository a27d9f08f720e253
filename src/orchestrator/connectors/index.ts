import { createMockConnectors } from "./mock.js";
import type { Connectors } from "./types.js";
import { HttpWebhookConnector } from "./webhook.js";

/**
 * 服务默认连接器：聊天、任务、邮件、日历走内存实现，webhook 走真实 HTTP
 */
export function createDefaultConnectors(): Connectors {
  const mock = createMockConnectors();
  return {
    notifications: mock.notifications,
    tasks: mock.tasks,
    messages: mock.messages,
    calendar: mock.calendar,
    webhooks: new HttpWebhookConnector()
  };
}

export { createMockConnectors } from "./mock.js";
export type { MockConnectors, RecordedCalls } from "./mock.js";
export * from "./types.js";
