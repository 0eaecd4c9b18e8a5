/**
 * Memory types
 */

import type { Message } from '../types/index.js';

/**
 * A thread as memory sees it: plain history plus lineage
 */
export interface MemoryThread {
  readonly threadId: string;
  readonly parentThreadId?: string;
  readonly history: readonly Message[];
  readonly metadata: Readonly<Record<string, string>>;
  readonly updatedAt: Date;
}

/**
 * One recorded message, as returned by search
 */
export interface MemoryEntry {
  readonly threadId: string;
  readonly message: Message;
  readonly recordedAt: Date;
}

export function createMemoryThread(
  threadId: string,
  fields: Partial<Omit<MemoryThread, 'threadId'>> = {}
): MemoryThread {
  return {
    threadId,
    ...(fields.parentThreadId !== undefined ? { parentThreadId: fields.parentThreadId } : {}),
    history: fields.history ?? [],
    metadata: fields.metadata ?? {},
    updatedAt: fields.updatedAt ?? new Date(0),
  };
}

export const DEFAULT_SEARCH_LIMIT = 20;
