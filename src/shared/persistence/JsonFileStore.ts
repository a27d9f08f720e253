import { randomUUID } from "node:crypto";
import { readFile, writeFile, readdir, unlink, mkdir, rename, stat } from "node:fs/promises";
import { join, dirname } from "node:path";
import type { z } from "zod";

import { createLoggerFacade, type LoggerFacade } from "../logging/logger.js";
import { isTransientFsError, retryWithBackoff, type RetryOptions } from "../retry/retryWithBackoff.js";

export interface JsonFileStoreOptions<T> {
  /**
   * 存储目录（绝对路径）
   */
  readonly directory: string;

  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  /**
   * 实体 ID 字段名，默认为 'id'
   */
  readonly idField?: keyof T & string;

  readonly logComponent?: string;

  readonly retryOptions?: Partial<RetryOptions>;
}

export type JsonFileStoreErrorCode =
  | "initialization_failed"
  | "entity_exists"
  | "entity_not_found"
  | "id_mismatch"
  | "invalid_id"
  | "read_failed"
  | "write_failed"
  | "delete_failed"
  | "list_failed"
  | "validation_failed";

export class JsonFileStoreError extends Error {
  constructor(
    message: string,
    public readonly code: JsonFileStoreErrorCode,
    public override readonly cause?: unknown
  ) {
    super(message);
    this.name = "JsonFileStoreError";
  }
}

/**
 * 基于文件系统的 JSON 实体存储，每个实体一个文件。
 *
 * 写入走临时文件 + rename；读写遇到 EBUSY/EAGAIN 等瞬态错误时按指数退避重试。
 */
export abstract class JsonFileStore<T extends object> {
  protected readonly directory: string;
  protected readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  protected readonly idField: keyof T & string;
  protected readonly logger: LoggerFacade;
  protected readonly retryOptions: RetryOptions;

  constructor(options: JsonFileStoreOptions<T>) {
    this.directory = options.directory;
    this.schema = options.schema;
    this.idField = options.idField ?? "id";
    this.logger = createLoggerFacade(options.logComponent ?? this.constructor.name);

    this.retryOptions = {
      retries: 3,
      baseDelay: 100,
      ...options.retryOptions,
      onFailedAttempt: ({ error, attemptNumber, retriesLeft }) => {
        this.logger.warn("File operation failed, retrying", {
          attemptNumber,
          retriesLeft,
          error: error.message
        });
      },
      shouldRetry: isTransientFsError
    };
  }

  async initialize(): Promise<void> {
    await retryWithBackoff(async () => {
      try {
        await mkdir(this.directory, { recursive: true });
      } catch (error) {
        this.logger.error("Failed to initialize storage", error, {
          directory: this.directory
        });
        throw new JsonFileStoreError(
          "Failed to initialize storage directory",
          "initialization_failed",
          error
        );
      }
    }, this.retryOptions);
  }

  async create(entity: T): Promise<T> {
    const validated = this.validateEntity(entity);
    const id = this.extractId(validated);
    const filePath = this.getFilePath(id);

    if (await this.fileExists(filePath)) {
      throw new JsonFileStoreError(
        `Entity with id '${id}' already exists`,
        "entity_exists"
      );
    }

    await this.atomicWrite(filePath, validated);
    this.logger.info("Entity created", { id });
    return validated;
  }

  async read(id: string): Promise<T | null> {
    const filePath = this.getFilePath(id);
    if (!(await this.fileExists(filePath))) {
      return null;
    }

    return retryWithBackoff(async () => {
      let data: unknown;
      try {
        const raw = await readFile(filePath, "utf-8");
        data = JSON.parse(raw);
      } catch (error) {
        this.logger.error("Failed to read entity", error, { id, filePath });
        throw new JsonFileStoreError(`Failed to read entity '${id}'`, "read_failed", error);
      }
      return this.validateEntity(data);
    }, this.retryOptions);
  }

  async update(id: string, entity: T): Promise<T> {
    const validated = this.validateEntity(entity);
    const entityId = this.extractId(validated);

    if (entityId !== id) {
      throw new JsonFileStoreError(
        `Entity id '${entityId}' does not match provided id '${id}'`,
        "id_mismatch"
      );
    }

    const filePath = this.getFilePath(id);
    if (!(await this.fileExists(filePath))) {
      throw new JsonFileStoreError(`Entity with id '${id}' not found`, "entity_not_found");
    }

    await this.atomicWrite(filePath, validated);
    return validated;
  }

  async delete(id: string): Promise<void> {
    const filePath = this.getFilePath(id);
    if (!(await this.fileExists(filePath))) {
      throw new JsonFileStoreError(`Entity with id '${id}' not found`, "entity_not_found");
    }

    await retryWithBackoff(async () => {
      try {
        await unlink(filePath);
        this.logger.info("Entity deleted", { id });
      } catch (error) {
        this.logger.error("Failed to delete entity", error, { id, filePath });
        throw new JsonFileStoreError(`Failed to delete entity '${id}'`, "delete_failed", error);
      }
    }, this.retryOptions);
  }

  async list(): Promise<T[]> {
    const files = await retryWithBackoff(async () => {
      try {
        await mkdir(this.directory, { recursive: true });
        return await readdir(this.directory);
      } catch (error) {
        this.logger.error("Failed to list entities", error, { directory: this.directory });
        throw new JsonFileStoreError("Failed to list entities", "list_failed", error);
      }
    }, this.retryOptions);

    const entities: T[] = [];
    for (const file of files.filter((f) => f.endsWith(".json"))) {
      const filePath = join(this.directory, file);
      try {
        const raw = await readFile(filePath, "utf-8");
        entities.push(this.validateEntity(JSON.parse(raw)));
      } catch (error) {
        // 跳过损坏或被并发删除的文件
        this.logger.warn("Skipping invalid file during list", {
          file,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
    return entities;
  }

  async exists(id: string): Promise<boolean> {
    return this.fileExists(this.getFilePath(id));
  }

  protected async atomicWrite(filePath: string, data: T): Promise<void> {
    const validated = this.validateEntity(data);

    await retryWithBackoff(async () => {
      const tempPath = `${filePath}.${randomUUID()}.tmp`;
      try {
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(tempPath, JSON.stringify(validated, null, 2) + "\n", "utf-8");
        await rename(tempPath, filePath);
      } catch (error) {
        await unlink(tempPath).catch((cleanupError: unknown) => {
          this.logger.warn("Temp file cleanup failed", {
            tempPath,
            error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
          });
        });
        this.logger.error("Atomic write failed", error, { filePath });
        throw new JsonFileStoreError("Atomic write failed", "write_failed", error);
      }
    }, this.retryOptions);
  }

  protected validateEntity(data: unknown): T {
    const parsed = this.schema.safeParse(data);
    if (!parsed.success) {
      throw new JsonFileStoreError("Entity validation failed", "validation_failed", parsed.error);
    }
    return parsed.data;
  }

  protected extractId(entity: T): string {
    const id: unknown = entity[this.idField];
    if (typeof id !== "string" || id.length === 0) {
      throw new JsonFileStoreError(
        `Entity must have a valid '${this.idField}' field`,
        "invalid_id"
      );
    }
    return id;
  }

  protected getFilePath(id: string): string {
    return join(this.directory, `${this.sanitizeId(id)}.json`);
  }

  /**
   * 防止路径穿越
   */
  protected sanitizeId(id: string): string {
    return id.replace(/[^a-zA-Z0-9_-]/g, "").slice(0, 128);
  }

  protected async fileExists(filePath: string): Promise<boolean> {
    try {
      const stats = await stat(filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }
}
