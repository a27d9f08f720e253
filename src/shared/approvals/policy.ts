import type { Action, ActionKind } from "../schemas/action.js";

export interface ApproverPolicy {
  resolveApprover(action: Action, requesterId: string): string;
}

export interface ConfiguredApproverPolicyOptions {
  readonly defaultApprover: string;
  readonly approvers?: Partial<Record<ActionKind, string>>;
}

/**
 * 按动作类型查表，缺省落到默认审批人
 */
export class ConfiguredApproverPolicy implements ApproverPolicy {
  constructor(private readonly options: ConfiguredApproverPolicyOptions) {}

  resolveApprover(action: Action): string {
    return this.options.approvers?.[action.kind] ?? this.options.defaultApprover;
  }
}
