/**
 * PersistentMemory - cache-first memory over a durable store
 *
 * Strategy:
 * - Read from the cache, falling through to the store on a miss (and repopulating the cache)
 * - Write every append and upsert to both sides
 * - Search the cache, falling back to the store when it has nothing
 *
 * Writes to one thread run one at a time, in call order, so the store never
 * receives an older snapshot after a newer one.
 */

import type { Message } from '../types/index.js';
import type { ILogger } from '../shared/logging/ILogger.js';
import { noopLogger } from '../shared/logging/ILogger.js';
import { errorMessage } from '../shared/utils/errors.js';
import type { IMemory, IPersistentMemoryStore } from './interfaces.js';
import { DEFAULT_SEARCH_LIMIT, type MemoryEntry, type MemoryThread } from './types.js';
import { MemoryError, PersistenceFailedError, ThreadNotFoundError } from './errors.js';
import { InMemoryMemory, validateSearch } from './InMemoryMemory.js';

export interface PersistentMemoryOptions {
  store: IPersistentMemoryStore;
  cache?: InMemoryMemory;
  logger?: ILogger;
  clock?: () => Date;
}

export class PersistentMemory implements IMemory {
  private readonly store: IPersistentMemoryStore;
  private readonly cache: InMemoryMemory;
  private readonly logger: ILogger;
  private readonly clock: () => Date;
  private readonly pending = new Map<string, Promise<void>>();

  constructor(options: PersistentMemoryOptions) {
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
    this.cache = options.cache ?? new InMemoryMemory({ clock: this.clock });
    this.logger = options.logger ?? noopLogger;
  }

  async append(threadId: string, message: Message): Promise<void> {
    await this.appendAll(threadId, [message]);
  }

  async appendAll(threadId: string, messages: readonly Message[]): Promise<void> {
    await this.serialize(threadId, async () => {
      // Warm the cache first so a thread known only to the store keeps its history
      await this.loadIntoCache(threadId);
      await this.cache.appendAll(threadId, messages);

      const recordedAt = this.clock();
      for (const message of messages) {
        await this.persist(() => this.store.appendEntry({ threadId, message, recordedAt }));
      }

      const thread = await this.cache.getThread(threadId);
      await this.persist(() => this.store.upsertThread(thread));
    });
  }

  async read(threadId: string): Promise<Message[]> {
    return [...(await this.getThread(threadId)).history];
  }

  async getThread(threadId: string): Promise<MemoryThread> {
    const thread = await this.loadIntoCache(threadId);
    if (!thread) {
      throw new ThreadNotFoundError(threadId);
    }
    return thread;
  }

  async upsert(thread: MemoryThread): Promise<void> {
    await this.serialize(thread.threadId, async () => {
      await this.cache.upsert(thread);
      await this.persist(() => this.store.upsertThread(thread));
    });
  }

  async fork(fromThreadId: string, newThreadId: string): Promise<MemoryThread> {
    await this.getThread(fromThreadId);
    return this.serialize(newThreadId, async () => {
      const forked = await this.cache.fork(fromThreadId, newThreadId);
      await this.persist(() => this.store.upsertThread(forked));
      return forked;
    });
  }

  async search(query: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<MemoryEntry[]> {
    validateSearch(query, limit);

    try {
      const cached = await this.cache.search(query, limit);
      if (cached.length > 0) {
        return cached;
      }
    } catch (error) {
      if (!(error instanceof MemoryError) || error.kind === 'InvalidInput') {
        throw error;
      }
      this.logger.warn('Cache search failed, falling back to store', { error: error.message });
    }

    this.logger.debug('Searching durable store', { query, limit });
    return this.persist(() => this.store.searchEntries(query, limit));
  }

  /**
   * Cache hit, else load from the store and cache it; null when neither has it
   */
  private async loadIntoCache(threadId: string): Promise<MemoryThread | null> {
    try {
      return await this.cache.getThread(threadId);
    } catch (error) {
      if (!(error instanceof ThreadNotFoundError)) {
        throw error;
      }
    }

    const stored = await this.persist(() => this.store.loadThread(threadId));
    if (!stored) {
      return null;
    }
    // Another call may have cached the thread while the load was in flight
    this.logger.debug('Loaded thread from durable store', { threadId });
    return this.cache.insertIfAbsent(stored);
  }

  /**
   * Chain an operation behind earlier writes to the same thread
   */
  private async serialize<T>(threadId: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(threadId) ?? Promise.resolve();
    const result = previous.then(operation);
    const settled = result.then(
      () => undefined,
      () => undefined
    );
    this.pending.set(threadId, settled);

    try {
      return await result;
    } finally {
      if (this.pending.get(threadId) === settled) {
        this.pending.delete(threadId);
      }
    }
  }

  private async persist<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof MemoryError) {
        throw error;
      }
      this.logger.error('Durable store operation failed', { error: errorMessage(error) });
      throw new PersistenceFailedError(errorMessage(error));
    }
  }
}
