/**
 * SqlMemoryStore - durable memory store on the sql.js database
 */

import {
  MemoryError,
  PersistenceFailedError,
  errorMessage,
  validateSearch,
  type IPersistentMemoryStore,
  type MemoryEntry,
  type MemoryThread,
  type Message,
} from '@agentloom/agents';
import { z } from 'zod';
import type { DatabaseManager, Row } from './Database.js';

const RoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);

const MessageSchema = z.object({
  role: RoleSchema,
  content: z.string(),
  toolCallId: z.string().optional(),
  toolName: z.string().optional(),
});

const ThreadRowSchema = z.object({
  thread_id: z.string(),
  parent_thread_id: z.string().nullable(),
  history: z.string(),
  metadata: z.string(),
  updated_at: z.number(),
});

const EntryRowSchema = z.object({
  thread_id: z.string(),
  role: RoleSchema,
  content: z.string(),
  tool_call_id: z.string().nullable(),
  tool_name: z.string().nullable(),
  recorded_at: z.number(),
});

export class SqlMemoryStore implements IPersistentMemoryStore {
  constructor(private readonly db: DatabaseManager) {}

  async upsertThread(thread: MemoryThread): Promise<void> {
    this.run('upsertThread', () => {
      this.db.execute(
        `INSERT INTO threads (thread_id, parent_thread_id, history, metadata, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(thread_id) DO UPDATE SET
           parent_thread_id = excluded.parent_thread_id,
           history = excluded.history,
           metadata = excluded.metadata,
           updated_at = excluded.updated_at`,
        [
          thread.threadId,
          thread.parentThreadId ?? null,
          JSON.stringify(thread.history),
          JSON.stringify(thread.metadata),
          thread.updatedAt.getTime(),
        ]
      );
    });
  }

  async loadThread(threadId: string): Promise<MemoryThread | null> {
    return this.run('loadThread', () => {
      const row = this.db.queryOne(
        'SELECT thread_id, parent_thread_id, history, metadata, updated_at FROM threads WHERE thread_id = ?',
        [threadId]
      );
      return row === null ? null : toThread(row);
    });
  }

  async appendEntry(entry: MemoryEntry): Promise<void> {
    this.run('appendEntry', () => {
      this.db.execute(
        `INSERT INTO memory_entries (thread_id, role, content, tool_call_id, tool_name, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          entry.threadId,
          entry.message.role,
          entry.message.content,
          entry.message.toolCallId ?? null,
          entry.message.toolName ?? null,
          entry.recordedAt.getTime(),
        ]
      );
    });
  }

  /**
   * Case-insensitive substring search over recorded entries, newest first
   */
  async searchEntries(query: string, limit: number): Promise<MemoryEntry[]> {
    validateSearch(query, limit);
    return this.run('searchEntries', () =>
      this.db
        .query(
          `SELECT thread_id, role, content, tool_call_id, tool_name, recorded_at
           FROM memory_entries
           WHERE lower(content) LIKE ? ESCAPE '\\'
           ORDER BY recorded_at DESC, id DESC
           LIMIT ?`,
          [`%${escapeLike(query.toLowerCase())}%`, limit]
        )
        .map(toEntry)
    );
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof MemoryError) {
        throw error;
      }
      throw new PersistenceFailedError(`${operation} failed: ${errorMessage(error)}`);
    }
  }
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function toThread(raw: Row): MemoryThread {
  const row = ThreadRowSchema.parse(raw);
  return {
    threadId: row.thread_id,
    ...(row.parent_thread_id !== null && { parentThreadId: row.parent_thread_id }),
    history: z.array(MessageSchema).parse(JSON.parse(row.history)).map(toMessage),
    metadata: z.record(z.string()).parse(JSON.parse(row.metadata)),
    updatedAt: new Date(row.updated_at),
  };
}

function toEntry(raw: Row): MemoryEntry {
  const row = EntryRowSchema.parse(raw);
  return {
    threadId: row.thread_id,
    message: toMessage({
      role: row.role,
      content: row.content,
      toolCallId: row.tool_call_id ?? undefined,
      toolName: row.tool_name ?? undefined,
    }),
    recordedAt: new Date(row.recorded_at),
  };
}

// Drops absent tool fields so loaded messages compare equal to the originals
function toMessage(parsed: z.infer<typeof MessageSchema>): Message {
  return {
    role: parsed.role,
    content: parsed.content,
    ...(parsed.toolCallId !== undefined && { toolCallId: parsed.toolCallId }),
    ...(parsed.toolName !== undefined && { toolName: parsed.toolName }),
  };
}
