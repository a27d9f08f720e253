import { ZodError, type ZodType, type ZodTypeDef } from "zod";

import {
  DomainError,
  ValidationError,
  toValidationIssues,
  type DomainErrorCode,
  type ValidationIssue
} from "../../../shared/errors.js";

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    issues?: readonly ValidationIssue[];
  };
}

const STATUS_BY_CODE: Record<DomainErrorCode, number> = {
  validation_failed: 400,
  workflow_not_found: 404,
  execution_not_found: 404,
  approver_mismatch: 409,
  step_failed: 500,
  execution_timeout: 500,
  retry_exhausted: 500,
  config_invalid: 500
};

function frameworkStatus(error: Error): number | undefined {
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

export function errorBody(code: string, message: string, issues?: readonly ValidationIssue[]): ErrorBody {
  return { error: issues && issues.length > 0 ? { code, message, issues } : { code, message } };
}

/**
 * 领域错误映射到 HTTP 状态码；其余错误按框架给出的 statusCode，缺省 500
 */
export function toErrorResponse(error: Error): { statusCode: number; body: ErrorBody } {
  if (error instanceof ValidationError) {
    return { statusCode: 400, body: errorBody(error.code, error.message, error.issues) };
  }
  if (error instanceof DomainError) {
    return { statusCode: STATUS_BY_CODE[error.code], body: errorBody(error.code, error.message) };
  }
  if (error instanceof ZodError) {
    return { statusCode: 400, body: errorBody("validation_failed", "Invalid request", toValidationIssues(error.issues)) };
  }
  const statusCode = frameworkStatus(error) ?? 500;
  const code = "code" in error && typeof error.code === "string" && statusCode < 500 ? error.code : "internal_error";
  return { statusCode, body: errorBody(code, error.message) };
}

export function parseRequest<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, message: string): T {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ValidationError(message, toValidationIssues(parsed.error.issues));
  }
  return parsed.data;
}
