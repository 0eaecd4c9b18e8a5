/**
 * AgentRouter - capability-based agent selection
 */

import type { ILogger } from '../shared/logging/ILogger.js';
import { noopLogger } from '../shared/logging/ILogger.js';
import type { ConflictResolution, IAgent } from './types.js';
import { AgentValidationError, RoutingConflictError, RoutingError } from './errors.js';

export function validateAgent(agent: IAgent): void {
  const { name, capabilities } = agent.metadata;
  if (name.trim().length === 0) {
    throw new AgentValidationError('Agent name must be non-empty');
  }
  if (capabilities.size === 0) {
    throw new AgentValidationError(`Agent ${name} must expose at least one capability`);
  }
}

/**
 * [major, minor, patch]; the leading digits of each part count, anything else is 0
 */
export function parseSemanticVersion(version: string): [number, number, number] {
  const [major, minor, patch] = [...version.split('.'), '0', '0', '0'].slice(0, 3).map((part) => {
    const digits = /^\d*/.exec(part)?.[0] ?? '';
    return digits.length === 0 ? 0 : Number.parseInt(digits, 10);
  });
  return [major ?? 0, minor ?? 0, patch ?? 0];
}

function compareVersions(a: string, b: string): number {
  const left = parseSemanticVersion(a);
  const right = parseSemanticVersion(b);
  for (let i = 0; i < left.length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

const byName = (a: IAgent, b: IAgent): number =>
  a.metadata.name === b.metadata.name ? 0 : a.metadata.name < b.metadata.name ? -1 : 1;

export interface AgentRouterOptions {
  logger?: ILogger;
}

export class AgentRouter {
  private readonly logger: ILogger;

  constructor(options: AgentRouterOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  route(
    capability: string,
    agents: readonly IAgent[],
    strategy: ConflictResolution = 'highest-priority'
  ): IAgent {
    const seen = new Set<string>();
    for (const agent of agents) {
      validateAgent(agent);
      if (seen.has(agent.metadata.name)) {
        throw new AgentValidationError(`Duplicate agent name: ${agent.metadata.name}`);
      }
      seen.add(agent.metadata.name);
    }

    const candidates = agents.filter((agent) => agent.metadata.capabilities.has(capability));
    const [first] = candidates;
    if (!first) {
      this.logger.warn('No agent for capability', { capability });
      throw new RoutingError(capability);
    }
    if (candidates.length === 1) {
      return first;
    }

    const chosen = this.resolveConflict(capability, candidates, first, strategy);
    this.logger.debug('Resolved routing conflict', {
      capability,
      strategy,
      contenders: candidates.map((agent) => agent.metadata.name),
      chosen: chosen.metadata.name,
    });
    return chosen;
  }

  private resolveConflict(
    capability: string,
    candidates: readonly IAgent[],
    first: IAgent,
    strategy: ConflictResolution
  ): IAgent {
    switch (strategy) {
      case 'highest-priority':
        return maxBy(
          candidates,
          (a, b) => a.metadata.priority - b.metadata.priority || byName(a, b)
        );
      case 'newest-version':
        return maxBy(
          candidates,
          (a, b) => compareVersions(a.metadata.version, b.metadata.version) || byName(a, b)
        );
      case 'first-registered':
        return first;
      case 'fail-on-conflict':
        throw new RoutingConflictError(
          capability,
          candidates.map((agent) => agent.metadata.name)
        );
    }
  }
}

function maxBy(agents: readonly IAgent[], compare: (a: IAgent, b: IAgent) => number): IAgent {
  return agents.reduce((best, agent) => (compare(agent, best) > 0 ? agent : best));
}
