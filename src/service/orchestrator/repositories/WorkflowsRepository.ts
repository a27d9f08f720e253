import { z } from "zod";

import { JsonFileStore } from "../../../shared/persistence/JsonFileStore.js";
import { joinStatePath } from "../../../shared/environment/pathResolver.js";
import { isValidWorkflowId, WorkflowDefinitionSchema, type WorkflowDefinition } from "../../../shared/schemas/workflow.js";

const StoredWorkflowSchema = z.object({
  key: z.string().min(1),
  definition: WorkflowDefinitionSchema
});

type StoredWorkflow = z.infer<typeof StoredWorkflowSchema>;

export interface WorkflowsRepositoryOptions {
  directory?: string;
}

function storageKey(id: string, version: number): string {
  return `${id}_v${version}`;
}

/**
 * 工作流定义按版本保存，每个版本一个文件，写入后不再修改
 */
export class WorkflowsRepository extends JsonFileStore<StoredWorkflow> {
  constructor(options: WorkflowsRepositoryOptions = {}) {
    super({
      directory: options.directory ?? joinStatePath("workflows"),
      schema: StoredWorkflowSchema,
      idField: "key",
      logComponent: "WorkflowsRepository"
    });
  }

  async save(definition: WorkflowDefinition): Promise<WorkflowDefinition> {
    const stored = await this.create({ key: storageKey(definition.id, definition.version), definition });
    return stored.definition;
  }

  async get(id: string, version?: number): Promise<WorkflowDefinition | null> {
    // 存储层会清洗文件名，非法 id 不能落到别的工作流上
    if (!isValidWorkflowId(id)) {
      return null;
    }
    if (version !== undefined) {
      const stored = await this.read(storageKey(id, version));
      return stored?.definition ?? null;
    }
    const versions = await this.versions(id);
    return versions.at(-1) ?? null;
  }

  /**
   * 按版本升序
   */
  async versions(id: string): Promise<WorkflowDefinition[]> {
    const all = await this.list();
    return all
      .map((stored) => stored.definition)
      .filter((definition) => definition.id === id)
      .sort((a, b) => a.version - b.version);
  }

  async listLatest(): Promise<WorkflowDefinition[]> {
    const latest = new Map<string, WorkflowDefinition>();
    for (const { definition } of await this.list()) {
      const current = latest.get(definition.id);
      if (!current || current.version < definition.version) {
        latest.set(definition.id, definition);
      }
    }
    return [...latest.values()].sort((a, b) => a.id.localeCompare(b.id));
  }
}
