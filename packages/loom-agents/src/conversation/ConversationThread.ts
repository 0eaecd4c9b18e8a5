/**
 * ConversationThread - pure operations on conversation threads
 *
 * Threads are immutable values: every operation returns a new thread and
 * leaves its input untouched.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { Message, ProviderTag } from '../types/index.js';
import { defaultTokenCounter, type ITokenCounter } from '../context/TokenCounter.js';
import { ThreadImportError } from './errors.js';
import type {
  ConversationCheckpoint,
  ConversationMessage,
  ConversationState,
  ConversationThread,
} from './types.js';

export interface ConversationMessageOptions {
  id?: string;
  timestamp?: Date;
  tokens?: number;
  model?: string;
  costUsd?: number;
  metadata?: Record<string, string>;
  important?: boolean;
  provider?: ProviderTag;
  counter?: ITokenCounter;
}

/**
 * Wrap a plain message for storage in a thread.
 * System and tool messages are important unless told otherwise.
 */
export function createConversationMessage(
  message: Message,
  options: ConversationMessageOptions = {}
): ConversationMessage {
  const counter = options.counter ?? defaultTokenCounter;
  const tokens = options.tokens ?? counter.countMessage(options.provider ?? 'generic', message);

  return {
    ...message,
    id: options.id ?? uuidv4(),
    timestamp: options.timestamp ?? new Date(),
    tokens,
    ...(options.model !== undefined ? { model: options.model } : {}),
    ...(options.costUsd !== undefined ? { costUsd: options.costUsd } : {}),
    metadata: { ...options.metadata },
    important: options.important ?? (message.role === 'system' || message.role === 'tool'),
  };
}

export function toMessage(message: ConversationMessage): Message {
  return {
    role: message.role,
    content: message.content,
    ...(message.toolCallId !== undefined ? { toolCallId: message.toolCallId } : {}),
    ...(message.toolName !== undefined ? { toolName: message.toolName } : {}),
  };
}

export function createThread(
  id: string,
  at: Date = new Date(),
  metadata: Record<string, string> = {}
): ConversationThread {
  return {
    id,
    messages: [],
    state: 'in-progress',
    checkpoints: [],
    metadata: { ...metadata },
    createdAt: at,
    updatedAt: at,
  };
}

const latest = (a: Date, b: Date): Date => (b.getTime() > a.getTime() ? b : a);

export function appendToThread(
  thread: ConversationThread,
  message: ConversationMessage,
  newState: ConversationState = thread.state
): ConversationThread {
  return {
    ...thread,
    messages: [...thread.messages, message],
    state: newState,
    updatedAt: latest(thread.updatedAt, message.timestamp),
  };
}

export function setThreadState(
  thread: ConversationThread,
  state: ConversationState,
  at: Date = new Date()
): ConversationThread {
  return { ...thread, state, updatedAt: latest(thread.updatedAt, at) };
}

export function checkpointThread(
  thread: ConversationThread,
  at: Date = new Date(),
  note?: string
): ConversationThread {
  const checkpoint: ConversationCheckpoint = {
    id: uuidv4(),
    state: thread.state,
    messageCount: thread.messages.length,
    createdAt: at,
    ...(note !== undefined ? { note } : {}),
  };

  return {
    ...thread,
    checkpoints: [...thread.checkpoints, checkpoint],
    updatedAt: latest(thread.updatedAt, at),
  };
}

/**
 * Branch a thread: history is copied, checkpoints are not
 */
export function forkThread(
  thread: ConversationThread,
  newId: string,
  at: Date = new Date()
): ConversationThread {
  return {
    id: newId,
    parentId: thread.id,
    messages: thread.messages.map((message) => ({ ...message, metadata: { ...message.metadata } })),
    state: 'in-progress',
    checkpoints: [],
    metadata: { ...thread.metadata },
    createdAt: at,
    updatedAt: at,
  };
}

// Serialization

const RoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);
const StateSchema = z.enum(['in-progress', 'waiting-for-tool', 'completed', 'failed']);

const ConversationMessageSchema = z.object({
  id: z.string(),
  role: RoleSchema,
  content: z.string(),
  toolCallId: z.string().optional(),
  toolName: z.string().optional(),
  timestamp: z.coerce.date(),
  tokens: z.number().int().nonnegative(),
  model: z.string().optional(),
  costUsd: z.number().optional(),
  metadata: z.record(z.string()),
  important: z.boolean(),
});

const ConversationThreadSchema = z.object({
  id: z.string().min(1),
  parentId: z.string().optional(),
  messages: z.array(ConversationMessageSchema),
  state: StateSchema,
  checkpoints: z.array(
    z.object({
      id: z.string(),
      state: StateSchema,
      messageCount: z.number().int().nonnegative(),
      createdAt: z.coerce.date(),
      note: z.string().optional(),
    })
  ),
  metadata: z.record(z.string()),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export function exportThread(thread: ConversationThread): string {
  return JSON.stringify(thread);
}

export function importThread(json: string): ConversationThread {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ThreadImportError(
      `Invalid thread JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = ConversationThreadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ThreadImportError(`Invalid thread: ${parsed.error.message}`);
  }
  return parsed.data;
}
