import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { joinConfigPath } from "../environment/pathResolver.js";
import { DomainError, errorMessage } from "../errors.js";
import { ActionKindSchema } from "../schemas/action.js";

const ENV_CONFIG_PATH = "FLOWGATE_CONFIG_PATH";
const USER_CONFIG_PATH = joinConfigPath("engine.json");
const REPO_CONFIG_PATH = path.resolve("config", "engine.json");

const MINUTE = 60_000;

export const EngineConfigSchema = z.object({
  approvals: z
    .object({
      autoApprovalThreshold: z.number().min(0).max(1).default(0.8),
      defaultApprover: z.string().min(1).default("approver@example.com"),
      approvers: z.record(ActionKindSchema, z.string().min(1)).default({})
    })
    .default({}),
  supervisor: z
    .object({
      runningTimeoutMs: z.number().int().positive().default(30 * MINUTE),
      startupGraceMs: z.number().int().positive().default(5 * MINUTE),
      baseBackoffMs: z.number().int().positive().default(MINUTE),
      maxRetries: z.number().int().min(0).default(3),
      schedule: z.string().min(1).default("*/30 * * * * *")
    })
    .default({}),
  executor: z
    .object({
      maxSteps: z.number().int().positive().default(100),
      maxConcurrency: z.number().int().positive().default(4)
    })
    .default({}),
  escalation: z
    .object({
      defaultTarget: z.string().min(1).default("on-call")
    })
    .default({})
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

type Env = Readonly<Record<string, string | undefined>>;

type RawConfig = Record<string, unknown>;

interface EnvOverride {
  readonly variable: string;
  readonly section: keyof EngineConfig;
  readonly key: string;
}

const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: "FLOWGATE_AUTO_APPROVAL_THRESHOLD", section: "approvals", key: "autoApprovalThreshold" },
  { variable: "FLOWGATE_RUNNING_TIMEOUT_MS", section: "supervisor", key: "runningTimeoutMs" },
  { variable: "FLOWGATE_STARTUP_GRACE_MS", section: "supervisor", key: "startupGraceMs" },
  { variable: "FLOWGATE_BASE_BACKOFF_MS", section: "supervisor", key: "baseBackoffMs" },
  { variable: "FLOWGATE_MAX_RETRIES", section: "supervisor", key: "maxRetries" },
  { variable: "FLOWGATE_MAX_CONCURRENCY", section: "executor", key: "maxConcurrency" }
];

function withSetting(input: RawConfig, section: string, key: string, value: unknown): RawConfig {
  const current = input[section];
  const existing = typeof current === "object" && current !== null && !Array.isArray(current) ? current : {};
  return { ...input, [section]: { ...existing, [key]: value } };
}

const RawConfigSchema = z.record(z.unknown());

export class ConfigError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, "config_invalid", cause);
  }
}

/**
 * 合并文件内容与环境变量覆盖，再交给 zod 填充默认值
 */
export function parseEngineConfig(raw: unknown, env: Env = process.env): EngineConfig {
  const base = RawConfigSchema.safeParse(raw ?? {});
  if (!base.success) {
    throw new ConfigError("Engine config must be a JSON object");
  }
  let input: RawConfig = base.data;

  for (const override of ENV_OVERRIDES) {
    const value = env[override.variable];
    if (value === undefined || value.trim().length === 0) {
      continue;
    }
    const numeric = Number(value);
    if (!Number.isFinite(numeric)) {
      throw new ConfigError(`${override.variable} must be numeric, got "${value}"`);
    }
    input = withSetting(input, override.section, override.key, numeric);
  }

  const schedule = env.FLOWGATE_SUPERVISOR_SCHEDULE;
  if (schedule && schedule.trim().length > 0) {
    input = withSetting(input, "supervisor", "schedule", schedule.trim());
  }

  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid engine config: ${details.join("; ")}`, parsed.error);
  }
  return parsed.data;
}

export function resolveConfigPath(customPath?: string, env: Env = process.env): string {
  const explicit = customPath ?? env[ENV_CONFIG_PATH];
  if (explicit && explicit.trim().length > 0) {
    return path.resolve(explicit.trim());
  }
  if (existsSync(USER_CONFIG_PATH)) {
    return USER_CONFIG_PATH;
  }
  if (existsSync(REPO_CONFIG_PATH)) {
    return REPO_CONFIG_PATH;
  }
  return USER_CONFIG_PATH;
}

interface LoadOptions {
  filePath?: string;
  env?: Env;
  reload?: boolean;
}

let cache: EngineConfig | null = null;

/**
 * 配置文件缺失时使用默认值
 */
export async function loadEngineConfig(options: LoadOptions = {}): Promise<EngineConfig> {
  if (cache && !options.reload && !options.filePath) {
    return cache;
  }
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options.filePath, env);

  let raw: unknown = {};
  if (existsSync(configPath)) {
    const content = await readFile(configPath, "utf-8");
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Engine config ${configPath} is not valid JSON: ${errorMessage(error)}`, error);
    }
  }

  const config = parseEngineConfig(raw, env);
  if (!options.filePath) {
    cache = config;
  }
  return config;
}
