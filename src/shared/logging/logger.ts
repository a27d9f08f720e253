import { join } from "node:path";

import pino, { type Logger } from "pino";

import type { LogEntry, LogLevel } from "./events.js";
import { getLogsDirectory } from "../environment/pathResolver.js";

const LOG_FILE = "flowgate.jsonl";

const destination = pino.destination({
  dest: join(getLogsDirectory(), LOG_FILE),
  mkdir: true,
  sync: false
});

const rootLogger: Logger = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    base: { service: "flowgate" },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  destination
);

let publisher: ((entry: LogEntry) => void) | null = null;

/**
 * 服务运行期间把每条日志转给订阅者（最近日志缓冲），传 null 解除
 */
export function setLogEventPublisher(next: ((entry: LogEntry) => void) | null): void {
  publisher = next;
}

export function flushLogs(): void {
  destination.flushSync();
}

/**
 * 执行相关的绑定字段；其他键原样写入
 */
export interface LogContext {
  workflowId?: string;
  executionId?: string;
  stepId?: string;
  approvalId?: string;
  [key: string]: unknown;
}

export interface LoggerFacade {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  /** 绑定上下文后的同组件 logger */
  child(context: LogContext): LoggerFacade;
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

function buildFacade(component: string, bound: LogContext): LoggerFacade {
  const logger = rootLogger.child({ component, ...bound });

  const publish = (level: LogLevel, message: string, extra: Record<string, unknown>) => {
    publisher?.({
      time: new Date().toISOString(),
      level,
      component,
      message,
      context: { ...bound, ...extra }
    });
  };

  return {
    info(message, extra = {}) {
      logger.info(extra, message);
      publish("info", message, extra);
    },
    warn(message, extra = {}) {
      logger.warn(extra, message);
      publish("warn", message, extra);
    },
    error(message, error, extra = {}) {
      const context = error === undefined ? extra : { ...extra, error: describeError(error) };
      logger.error(context, message);
      publish("error", message, context);
    },
    child(context) {
      return buildFacade(component, { ...bound, ...context });
    }
  };
}

export function createLoggerFacade(component: string, context: LogContext = {}): LoggerFacade {
  return buildFacade(component, context);
}
