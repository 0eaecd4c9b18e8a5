/**
 * ConversationStore - keeps whole conversation threads by id
 */

import { AtomicRef } from '../shared/utils/AtomicRef.js';
import { ThreadNotFoundError } from '../memory/errors.js';
import type { ConversationThread } from './types.js';

export interface IConversationStore {
  save(thread: ConversationThread): Promise<void>;
  load(id: string): Promise<ConversationThread | null>;
  list(): Promise<ConversationThread[]>;
  delete(id: string): Promise<void>;
}

export class InMemoryConversationStore implements IConversationStore {
  private readonly state = new AtomicRef<ReadonlyMap<string, ConversationThread>>(new Map());

  async save(thread: ConversationThread): Promise<void> {
    this.state.update((current) => new Map(current).set(thread.id, thread));
  }

  async load(id: string): Promise<ConversationThread | null> {
    return this.state.get().get(id) ?? null;
  }

  /**
   * Most recently updated first
   */
  async list(): Promise<ConversationThread[]> {
    return Array.from(this.state.get().values()).sort(
      (a, b) => b.updatedAt.getTime() - a.updatedAt.getTime()
    );
  }

  async delete(id: string): Promise<void> {
    this.state.modify((current) => {
      if (!current.has(id)) {
        throw new ThreadNotFoundError(id);
      }
      const next = new Map(current);
      next.delete(id);
      return [undefined, next] as const;
    });
  }
}
