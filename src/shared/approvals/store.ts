import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import { z } from "zod";

import { joinStatePath } from "../environment/pathResolver.js";
import { ApprovalRequestSchema, type ApprovalRequest, type DecisionOutcome } from "./types.js";

const PENDING_FILE = "pending.json";
const HISTORY_FILE = "history.json";

const PendingDocumentSchema = z.object({
  version: z.literal(1),
  items: z.array(z.string())
});

const HistoryDocumentSchema = z.object({
  version: z.literal(1),
  items: z.array(ApprovalRequestSchema)
});

type PendingDocument = z.infer<typeof PendingDocumentSchema>;
type HistoryDocument = z.infer<typeof HistoryDocumentSchema>;

export interface ApprovalStoreOptions {
  directory?: string;
}

/**
 * 审批持久化：pending.json 保存待审批 id 索引，history.json 保存全部请求。
 *
 * 所有读-改-写都在同一个同步调用内完成，同进程内并发的两个决定不会同时生效。
 */
export class ApprovalStore {
  private readonly pendingPath: string;

  private readonly historyPath: string;

  constructor(options: ApprovalStoreOptions = {}) {
    const directory = resolve(options.directory ?? joinStatePath("approvals"));
    mkdirSync(directory, { recursive: true });
    this.pendingPath = join(directory, PENDING_FILE);
    this.historyPath = join(directory, HISTORY_FILE);
  }

  async save(request: ApprovalRequest): Promise<void> {
    const validated = ApprovalRequestSchema.parse(request);
    const history = this.readHistory();
    const index = history.items.findIndex((item) => item.id === validated.id);
    if (index >= 0) {
      history.items[index] = validated;
    } else {
      history.items.push(validated);
    }
    this.writeDocument(this.historyPath, history);

    const pending = this.readPending();
    const isPending = validated.status === "pending";
    const indexed = pending.items.includes(validated.id);
    if (isPending && !indexed) {
      pending.items.push(validated.id);
      this.writeDocument(this.pendingPath, pending);
    } else if (!isPending && indexed) {
      pending.items = pending.items.filter((id) => id !== validated.id);
      this.writeDocument(this.pendingPath, pending);
    }
  }

  /**
   * 原子地检查并移出待审批索引；apply 产出最终记录
   */
  async resolvePending(
    id: string,
    approverId: string,
    apply: (request: ApprovalRequest) => ApprovalRequest
  ): Promise<DecisionOutcome> {
    const pending = this.readPending();
    if (!pending.items.includes(id)) {
      return { applied: false, reason: "not_pending" };
    }
    const history = this.readHistory();
    const index = history.items.findIndex((item) => item.id === id);
    const current = history.items[index];
    if (!current || current.status !== "pending") {
      return { applied: false, reason: "not_pending" };
    }
    if (current.approverId !== approverId) {
      return { applied: false, reason: "approver_mismatch" };
    }

    const updated = ApprovalRequestSchema.parse(apply(current));
    history.items[index] = updated;
    pending.items = pending.items.filter((item) => item !== id);
    this.writeDocument(this.pendingPath, pending);
    this.writeDocument(this.historyPath, history);
    return { applied: true, request: updated };
  }

  async get(id: string): Promise<ApprovalRequest | undefined> {
    return this.readHistory().items.find((item) => item.id === id);
  }

  async listPending(): Promise<ApprovalRequest[]> {
    const ids = new Set(this.readPending().items);
    return this.readHistory()
      .items.filter((item) => ids.has(item.id))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async listHistory(): Promise<ApprovalRequest[]> {
    return [...this.readHistory().items].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  private readPending(): PendingDocument {
    return this.readDocument(this.pendingPath, PendingDocumentSchema, { version: 1, items: [] });
  }

  private readHistory(): HistoryDocument {
    return this.readDocument(this.historyPath, HistoryDocumentSchema, { version: 1, items: [] });
  }

  private readDocument<T>(filePath: string, schema: z.ZodType<T>, empty: T): T {
    let raw: string;
    try {
      raw = readFileSync(filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && Reflect.get(error, "code") === "ENOENT") {
        return empty;
      }
      throw error;
    }
    return schema.parse(JSON.parse(raw));
  }

  private writeDocument(filePath: string, document: PendingDocument | HistoryDocument): void {
    const tempPath = `${filePath}.tmp`;
    writeFileSync(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
    renameSync(tempPath, filePath);
  }
}
