/**
 * Memory interfaces
 * Platform-agnostic contracts for thread memory and its durable backing store
 */

import type { Message } from '../types/index.js';
import type { MemoryEntry, MemoryThread } from './types.js';

/**
 * Append-only per-thread history with fork and keyword search
 */
export interface IMemory {
  append(threadId: string, message: Message): Promise<void>;

  appendAll(threadId: string, messages: readonly Message[]): Promise<void>;

  /**
   * @throws ThreadNotFoundError
   */
  read(threadId: string): Promise<Message[]>;

  /**
   * @throws ThreadNotFoundError
   */
  getThread(threadId: string): Promise<MemoryThread>;

  upsert(thread: MemoryThread): Promise<void>;

  /**
   * Copy a thread's history under a new id, recording the source as parent
   * @throws ThreadNotFoundError
   */
  fork(fromThreadId: string, newThreadId: string): Promise<MemoryThread>;

  /**
   * Case-insensitive substring search, newest first
   * @throws InvalidMemoryInputError on a blank query or a limit below 1
   */
  search(query: string, limit?: number): Promise<MemoryEntry[]>;
}

/**
 * Durable store behind PersistentMemory.
 * Implementations reject with MemoryError subclasses.
 */
export interface IPersistentMemoryStore {
  upsertThread(thread: MemoryThread): Promise<void>;
  loadThread(threadId: string): Promise<MemoryThread | null>;
  appendEntry(entry: MemoryEntry): Promise<void>;
  searchEntries(query: string, limit: number): Promise<MemoryEntry[]>;
}
