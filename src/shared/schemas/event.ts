import { z } from "zod";

export const EventSourceSchema = z.enum([
  "chat",
  "email",
  "task_tracker",
  "scheduled",
  "manual",
  "webhook"
]);

export const InboundEventSchema = z.object({
  content: z.string(),
  source: EventSourceSchema,
  userId: z.string().min(1),
  metadata: z.record(z.unknown()).default({}),
  receivedAt: z.string().optional()
});

export type EventSource = z.infer<typeof EventSourceSchema>;
export type InboundEvent = z.infer<typeof InboundEventSchema>;
export type InboundEventInput = z.input<typeof InboundEventSchema>;
