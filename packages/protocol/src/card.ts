import { z } from 'zod';
import { PROTOCOL_VERSION } from './types.js';

export const AgentSkill = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

export type AgentSkill = z.infer<typeof AgentSkill>;

export const AgentCapabilities = z.object({
  streaming: z.boolean().default(false),
  asyncTasks: z.boolean().default(false),
});

export type AgentCapabilities = z.infer<typeof AgentCapabilities>;

/**
 * Agent card - public description of an agent served by the relay.
 */
export const AgentCard = z.object({
  protocolVersion: z.string().default(PROTOCOL_VERSION),
  name: z.string().min(1),
  description: z.string().default(''),
  url: z.string().url(),
  version: z.string().default('1.0.0'),
  defaultInputModes: z.array(z.string()).default(['text']),
  defaultOutputModes: z.array(z.string()).default(['text']),
  capabilities: AgentCapabilities.default({}),
  skills: z.array(AgentSkill).default([]),
});

export type AgentCard = z.infer<typeof AgentCard>;
export type AgentCardInput = z.input<typeof AgentCard>;
