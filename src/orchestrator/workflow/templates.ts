import { ValidationError } from "../../shared/errors.js";
import type { WorkflowDefinition, WorkflowDefinitionInput } from "../../shared/schemas/workflow.js";
import { loadWorkflow } from "./loader.js";

type TemplateBody = Omit<WorkflowDefinitionInput, "id" | "version" | "createdAt">;

export const WORKFLOW_TEMPLATES: Readonly<Record<string, TemplateBody>> = {
  "email-to-task": {
    name: "Email to Task",
    description: "Create a task from emails that ask for action",
    trigger: { id: "email-trigger", type: "email", name: "Email Received", config: { filters: ["important", "urgent"] } },
    steps: [
      {
        id: "create-task",
        type: "create_task",
        name: "Create Task",
        config: { project: "Inbox", name: "{{email.subject}}", description: "{{email.body}}" }
      },
      {
        id: "send-notification",
        type: "send_notification",
        name: "Send Notification",
        config: { channel: "#tasks", message: "New task created: {{create-task.name}}" }
      }
    ],
    connections: [
      {
        id: "conn1",
        fromId: "email-trigger",
        toId: "create-task",
        guard: { field: "email.subject", operator: "contains", value: "action" }
      },
      { id: "conn2", fromId: "create-task", toId: "send-notification" }
    ]
  },
  "meeting-followup": {
    name: "Meeting Follow-up",
    description: "Create action items and send a summary after a meeting",
    trigger: { id: "meeting-trigger", type: "scheduled", name: "Meeting Ended", config: { schedule: "after_meeting" } },
    steps: [
      {
        id: "announce-summary",
        type: "send_notification",
        name: "Announce Summary",
        config: { channel: "#meetings", message: "Summary ready for {{meeting.title}}" }
      },
      {
        id: "create-action-items",
        type: "create_task",
        name: "Create Action Items",
        config: { project: "Meeting Follow-ups", name: "Action items: {{meeting.title}}", assignee: "{{meeting.organizer}}" }
      },
      {
        id: "send-summary",
        type: "send_message",
        name: "Send Summary",
        config: { to: "{{meeting.organizer}}", subject: "Summary: {{meeting.title}}", body: "{{meeting.notes}}" }
      }
    ],
    connections: [
      { id: "conn1", fromId: "meeting-trigger", toId: "announce-summary" },
      { id: "conn2", fromId: "announce-summary", toId: "create-action-items" },
      { id: "conn3", fromId: "create-action-items", toId: "send-summary" }
    ]
  },
  "sales-lead": {
    name: "Sales Lead Processing",
    description: "Triage inbound sales leads and book a first call",
    trigger: { id: "lead-trigger", type: "email", name: "Lead Email", config: { filters: ["lead", "inquiry", "quote"] } },
    steps: [
      {
        id: "categorize-lead",
        type: "set_variable",
        name: "Categorize Lead",
        config: { variable: "leadTier", value: "enterprise" },
        conditions: [{ field: "email.subject", operator: "contains", value: "enterprise" }]
      },
      {
        id: "create-lead-task",
        type: "create_task",
        name: "Create Lead Task",
        config: { project: "Sales Pipeline", name: "Lead: {{email.from}}", description: "{{email.subject}}" }
      },
      {
        id: "schedule-followup",
        type: "schedule_event",
        name: "Schedule Follow-up",
        config: { title: "Sales call with {{email.from}}", durationMinutes: 30, attendees: ["{{email.from}}"] }
      },
      {
        id: "send-welcome",
        type: "send_message",
        name: "Send Welcome",
        config: { to: "{{email.from}}", subject: "Thanks for reaching out", body: "We have booked a call for {{schedule-followup.start}}." }
      }
    ],
    connections: [
      { id: "conn1", fromId: "lead-trigger", toId: "categorize-lead" },
      { id: "conn2", fromId: "categorize-lead", toId: "create-lead-task" },
      { id: "conn3", fromId: "create-lead-task", toId: "schedule-followup" },
      { id: "conn4", fromId: "schedule-followup", toId: "send-welcome" }
    ]
  }
};

export interface TemplateOverrides {
  readonly id: string;
  readonly name?: string;
  readonly variables?: Record<string, unknown>;
  readonly enabled?: boolean;
}

export function listTemplates(): { name: string; title: string; description?: string }[] {
  return Object.entries(WORKFLOW_TEMPLATES).map(([name, body]) => ({
    name,
    title: body.name,
    description: body.description
  }));
}

export function instantiateTemplate(templateName: string, overrides: TemplateOverrides, now: Date): WorkflowDefinition {
  const template = WORKFLOW_TEMPLATES[templateName];
  if (!template) {
    throw new ValidationError(`Unknown workflow template ${templateName}`, [
      { path: "template", message: `可用模板: ${Object.keys(WORKFLOW_TEMPLATES).join(", ")}` }
    ]);
  }
  return loadWorkflow({
    ...template,
    id: overrides.id,
    name: overrides.name ?? template.name,
    variables: { ...(template.variables ?? {}), ...(overrides.variables ?? {}) },
    enabled: overrides.enabled ?? true,
    version: 1,
    createdAt: now.toISOString()
  }).definition;
}
