/**
 * Agent runtime types
 */

import type { JsonValue } from '../types/index.js';
import type { AgentContext } from './AgentContext.js';

export interface AgentMetadata {
  /** Unique among the agents of one routing call */
  readonly name: string;
  readonly capabilities: ReadonlySet<string>;
  /** Semantic version, e.g. "1.4.0" */
  readonly version: string;
  readonly description: string;
  /** Higher wins ties */
  readonly priority: number;
}

export interface AgentHandoff {
  readonly targetAgent: string;
  readonly reason: string;
  readonly payload: JsonValue;
}

export interface AgentResult {
  readonly agent: string;
  readonly content: string;
  readonly handoff?: AgentHandoff;
  readonly statePatch: Readonly<Record<string, JsonValue>>;
  readonly metadata: Readonly<Record<string, string>>;
}

export interface IAgent {
  readonly metadata: AgentMetadata;
  execute(input: string, context: AgentContext): Promise<AgentResult>;
}

export type ConflictResolution =
  | 'highest-priority'
  | 'newest-version'
  | 'first-registered'
  | 'fail-on-conflict';

export type AgentResultAggregator = (results: readonly AgentResult[]) => AgentResult;

export function createAgentMetadata(
  fields: Pick<AgentMetadata, 'name' | 'version'> & {
    capabilities: Iterable<string>;
    description?: string;
    priority?: number;
  }
): AgentMetadata {
  return {
    name: fields.name,
    capabilities: new Set(fields.capabilities),
    version: fields.version,
    description: fields.description ?? '',
    priority: fields.priority ?? 0,
  };
}

export function createAgentResult(
  agent: string,
  content: string,
  extras: Partial<Omit<AgentResult, 'agent' | 'content'>> = {}
): AgentResult {
  return {
    agent,
    content,
    ...(extras.handoff ? { handoff: extras.handoff } : {}),
    statePatch: extras.statePatch ?? {},
    metadata: extras.metadata ?? {},
  };
}
