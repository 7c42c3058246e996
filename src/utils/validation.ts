/**
 * Input validation utilities using Zod
 */

import { z } from 'zod';
import { CAPABILITIES, type Capability } from '../types.js';

export const CapabilitySchema = z.enum(CAPABILITIES);

export const AgentIdSchema = z.string().min(1).max(100).regex(/^[a-zA-Z0-9_-]+$/);
export const TaskIdSchema = z.string().min(1).max(64).regex(/^[A-Za-z][A-Za-z0-9]*-\d+$/);
export const PayloadSchema = z.string().trim().min(1).max(100_000);

// Wire messages. Field names are the stable exchange format.
const EnvelopeSchema = z.object({
  from: z.string().min(1),
  to: AgentIdSchema.optional(),
  timestamp: z.string().datetime(),
});

export const NewTaskMessageSchema = EnvelopeSchema.extend({
  type: z.literal('NEW_TASK'),
  task_id: TaskIdSchema,
  payload: z.string(),
  capabilities: z.array(CapabilitySchema).optional(),
});

export const DelegatedTaskMessageSchema = EnvelopeSchema.extend({
  type: z.literal('DELEGATED_TASK'),
  task_id: TaskIdSchema,
  payload: z.string(),
});

export const TaskCompleteMessageSchema = EnvelopeSchema.extend({
  type: z.literal('TASK_COMPLETE'),
  agent_id: AgentIdSchema,
  task_id: TaskIdSchema,
});

export const TaskFailedMessageSchema = EnvelopeSchema.extend({
  type: z.literal('TASK_FAILED'),
  agent_id: AgentIdSchema,
  task_id: TaskIdSchema,
  reason: z.string(),
});

export const MessageSchema = z.discriminatedUnion('type', [
  NewTaskMessageSchema,
  DelegatedTaskMessageSchema,
  TaskCompleteMessageSchema,
  TaskFailedMessageSchema,
]);

// Roster document (JSON form, also accepted inline in the config file).
// Tags are checked against the capability enumeration by the roster loader,
// which skips unknown ones instead of rejecting the whole document.
export const RosterAgentSchema = z.object({
  capabilities: z.array(z.string().min(1)).default([]),
  permissions: z.array(z.string().min(1)).optional(),
});

export const RosterDocumentSchema = z.object({
  agents: z.record(AgentIdSchema, RosterAgentSchema),
});

export const SubmitTaskInputSchema = z.object({
  payload: PayloadSchema,
  capabilities: z.array(CapabilitySchema).optional(),
});

// Validation helper
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; errors: string[] } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
  };
}

// Type guards
export function isCapability(tag: string): tag is Capability {
  return CapabilitySchema.safeParse(tag).success;
}
