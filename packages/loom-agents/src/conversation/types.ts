/**
 * Conversation model types
 */

import type { Message } from '../types/index.js';

export type ConversationState = 'in-progress' | 'waiting-for-tool' | 'completed' | 'failed';

/**
 * Message recorded in a thread
 */
export interface ConversationMessage extends Message {
  readonly id: string;
  readonly timestamp: Date;
  readonly tokens: number;
  readonly model?: string;
  readonly costUsd?: number;
  readonly metadata: Readonly<Record<string, string>>;
  readonly important: boolean;
}

export interface ConversationCheckpoint {
  readonly id: string;
  readonly state: ConversationState;
  readonly messageCount: number;
  readonly createdAt: Date;
  readonly note?: string;
}

export interface ConversationThread {
  readonly id: string;
  readonly parentId?: string;
  readonly messages: readonly ConversationMessage[];
  readonly state: ConversationState;
  readonly checkpoints: readonly ConversationCheckpoint[];
  readonly metadata: Readonly<Record<string, string>>;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}
