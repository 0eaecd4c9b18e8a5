/**
 * InMemoryMemory - process-local thread memory
 *
 * All threads sit in one AtomicRef holding an immutable map, so every
 * mutation is a single synchronous swap.
 */

import type { Message } from '../types/index.js';
import { AtomicRef } from '../shared/utils/AtomicRef.js';
import type { IMemory } from './interfaces.js';
import { DEFAULT_SEARCH_LIMIT, createMemoryThread, type MemoryEntry, type MemoryThread } from './types.js';
import { InvalidMemoryInputError, ThreadNotFoundError } from './errors.js';

export interface InMemoryMemoryOptions {
  clock?: () => Date;
}

type ThreadTable = ReadonlyMap<string, MemoryThread>;

export class InMemoryMemory implements IMemory {
  private readonly state = new AtomicRef<ThreadTable>(new Map());
  private readonly clock: () => Date;

  constructor(options: InMemoryMemoryOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  async append(threadId: string, message: Message): Promise<void> {
    await this.appendAll(threadId, [message]);
  }

  /**
   * Appending to an unknown thread creates it
   */
  async appendAll(threadId: string, messages: readonly Message[]): Promise<void> {
    const now = this.clock();
    this.state.update((current) => {
      const existing = current.get(threadId) ?? createMemoryThread(threadId);
      const updated: MemoryThread = {
        ...existing,
        history: [...existing.history, ...messages],
        updatedAt: now.getTime() > existing.updatedAt.getTime() ? now : existing.updatedAt,
      };
      return new Map(current).set(threadId, updated);
    });
  }

  async read(threadId: string): Promise<Message[]> {
    return [...(await this.getThread(threadId)).history];
  }

  async getThread(threadId: string): Promise<MemoryThread> {
    const thread = this.state.get().get(threadId);
    if (!thread) {
      throw new ThreadNotFoundError(threadId);
    }
    return thread;
  }

  async upsert(thread: MemoryThread): Promise<void> {
    this.state.update((current) => new Map(current).set(thread.threadId, thread));
  }

  /**
   * Store the thread unless one is already held under its id; returns whichever is cached
   */
  async insertIfAbsent(thread: MemoryThread): Promise<MemoryThread> {
    return this.state.modify((current) => {
      const existing = current.get(thread.threadId);
      return existing
        ? ([existing, current] as const)
        : ([thread, new Map(current).set(thread.threadId, thread)] as const);
    });
  }

  async fork(fromThreadId: string, newThreadId: string): Promise<MemoryThread> {
    const now = this.clock();
    return this.state.modify((current) => {
      const source = current.get(fromThreadId);
      if (!source) {
        throw new ThreadNotFoundError(fromThreadId);
      }
      const forked: MemoryThread = {
        threadId: newThreadId,
        parentThreadId: fromThreadId,
        history: [...source.history],
        metadata: { ...source.metadata },
        updatedAt: now,
      };
      return [forked, new Map(current).set(newThreadId, forked)] as const;
    });
  }

  async search(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<MemoryEntry[]> {
    validateSearch(query, limit);
    const needle = query.toLowerCase();

    const entries: MemoryEntry[] = [];
    for (const thread of this.state.get().values()) {
      for (let i = thread.history.length - 1; i >= 0; i--) {
        const message = thread.history[i];
        if (message && message.content.toLowerCase().includes(needle)) {
          entries.push({ threadId: thread.threadId, message, recordedAt: thread.updatedAt });
        }
      }
    }

    return entries
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime())
      .slice(0, limit);
  }
}

export function validateSearch(query: string, limit: number): void {
  if (query.trim().length === 0) {
    throw new InvalidMemoryInputError('Search query must be non-empty');
  }
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidMemoryInputError(`Search limit must be a positive integer, got ${limit}`);
  }
}
