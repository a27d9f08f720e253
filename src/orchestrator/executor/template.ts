import { readPath } from "./conditions.js";

const PLACEHOLDER = /\{\{\s*([^{}\s]+)\s*\}\}/g;
const SOLE_PLACEHOLDER = /^\{\{\s*([^{}\s]+)\s*\}\}$/;

function stringify(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * 渲染 {{path}} 占位符；整串只有一个占位符时保留原始类型
 */
export function renderValue(value: unknown, context: Readonly<Record<string, unknown>>): unknown {
  if (typeof value === "string") {
    const sole = SOLE_PLACEHOLDER.exec(value);
    if (sole?.[1]) {
      return readPath(context, sole[1]);
    }
    return value.replace(PLACEHOLDER, (_match, path: string) => stringify(readPath(context, path)));
  }
  if (Array.isArray(value)) {
    return value.map((item) => renderValue(item, context));
  }
  if (typeof value === "object" && value !== null) {
    return renderConfig(Object.fromEntries(Object.entries(value)), context);
  }
  return value;
}

export function renderConfig(
  config: Readonly<Record<string, unknown>>,
  context: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const rendered: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    rendered[key] = renderValue(value, context);
  }
  return rendered;
}
