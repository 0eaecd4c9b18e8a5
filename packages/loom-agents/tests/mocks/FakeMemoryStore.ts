/**
 * FakeMemoryStore - in-process durable store for testing PersistentMemory
 */

import type { IPersistentMemoryStore } from '../../src/memory/interfaces.js';
import type { MemoryEntry, MemoryThread } from '../../src/memory/types.js';

export class FakeMemoryStore implements IPersistentMemoryStore {
  readonly threads = new Map<string, MemoryThread>();
  readonly entries: MemoryEntry[] = [];
  failWith?: Error;
  /** Delay in ms applied to successive loadThread calls */
  loadDelays: number[] = [];

  async upsertThread(thread: MemoryThread): Promise<void> {
    this.check();
    this.threads.set(thread.threadId, thread);
  }

  async loadThread(threadId: string): Promise<MemoryThread | null> {
    this.check();
    const stored = this.threads.get(threadId) ?? null;
    const delay = this.loadDelays.shift();
    if (delay !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    return stored;
  }

  async appendEntry(entry: MemoryEntry): Promise<void> {
    this.check();
    this.entries.push(entry);
  }

  async searchEntries(query: string, limit: number): Promise<MemoryEntry[]> {
    this.check();
    const needle = query.toLowerCase();
    return this.entries
      .filter((entry) => entry.message.content.toLowerCase().includes(needle))
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime())
      .slice(0, limit);
  }

  private check(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}
