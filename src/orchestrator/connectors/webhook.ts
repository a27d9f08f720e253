import got from "got";

import { createLoggerFacade } from "../../shared/logging/logger.js";
import type { WebhookConnector, WebhookRequest, WebhookResponse } from "./types.js";

const DEFAULT_TIMEOUT_MS = 10_000;

const logger = createLoggerFacade("webhook");

export class HttpWebhookConnector implements WebhookConnector {
  async call(request: WebhookRequest): Promise<WebhookResponse> {
    const hasJsonBody = typeof request.body === "object" && request.body !== null;
    const response = await got(request.url, {
      method: request.method,
      headers: { ...request.headers },
      timeout: { request: request.timeoutMs ?? DEFAULT_TIMEOUT_MS },
      throwHttpErrors: false,
      ...(hasJsonBody ? { json: request.body } : {}),
      ...(typeof request.body === "string" ? { body: request.body } : {})
    });

    const contentType = response.headers["content-type"];
    let parsedBody: unknown = response.body;
    if (contentType?.includes("application/json")) {
      try {
        parsedBody = JSON.parse(response.body);
      } catch (error) {
        logger.warn("webhook 响应 JSON 解析失败", {
          url: request.url,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    logger.info("webhook 请求完成", { url: request.url, statusCode: response.statusCode });
    return { statusCode: response.statusCode, body: parsedBody };
  }
}
