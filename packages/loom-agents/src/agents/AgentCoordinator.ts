/**
 * AgentCoordinator - runs agents in handoff chains or in parallel
 */

import type { ILogger } from '../shared/logging/ILogger.js';
import { noopLogger } from '../shared/logging/ILogger.js';
import { errorMessage } from '../shared/utils/errors.js';
import type { AgentContext, ContextTrimStrategy } from './AgentContext.js';
import type { AgentHandoff, AgentResult, AgentResultAggregator, IAgent } from './types.js';
import {
  AgentError,
  AgentExecutionError,
  AgentNotFoundError,
  AgentValidationError,
  HandoffDepthExceededError,
} from './errors.js';

export const DEFAULT_MAX_HANDOFF_DEPTH = 4;
export const PARALLEL_COORDINATOR = 'parallel-coordinator';

export function renderHandoffInput(input: string, result: AgentResult, handoff: AgentHandoff): string {
  return [
    input,
    '',
    `Handoff from ${result.agent} to ${handoff.targetAgent}`,
    `Reason: ${handoff.reason}`,
    `Payload: ${JSON.stringify(handoff.payload)}`,
    '',
    'Continue based on this handoff context.',
    '',
  ].join('\n');
}

/**
 * `[agent] content` per result, metadata merged left to right plus agents_executed
 */
export const defaultAggregation: AgentResultAggregator = (results) => ({
  agent: PARALLEL_COORDINATOR,
  content: results.map((result) => `[${result.agent}] ${result.content}`).join('\n'),
  statePatch: {},
  metadata: {
    ...results.reduce<Record<string, string>>(
      (merged, result) => ({ ...merged, ...result.metadata }),
      {}
    ),
    agents_executed: String(results.length),
  },
});

export interface AgentCoordinatorOptions {
  logger?: ILogger;
  trimStrategy?: ContextTrimStrategy;
}

export class AgentCoordinator {
  private readonly logger: ILogger;
  private readonly trimStrategy: ContextTrimStrategy;

  constructor(options: AgentCoordinatorOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.trimStrategy = options.trimStrategy ?? 'keep-system-and-latest';
  }

  /**
   * Run an agent and follow its handoffs until one answers without handing off
   */
  async executeWithHandoff(
    input: string,
    initialAgent: IAgent,
    context: AgentContext,
    agents: readonly IAgent[],
    maxDepth: number = DEFAULT_MAX_HANDOFF_DEPTH
  ): Promise<AgentResult> {
    if (!Number.isInteger(maxDepth) || maxDepth <= 0) {
      throw new AgentValidationError('maxDepth must be > 0');
    }

    const chain: string[] = [];
    let current = initialAgent;
    let currentInput = input;
    let currentContext = context;

    for (let depth = 0; ; depth++) {
      chain.push(current.metadata.name);
      if (depth >= maxDepth) {
        this.logger.warn('Handoff depth exceeded', { maxDepth, chain });
        throw new HandoffDepthExceededError(maxDepth, chain);
      }

      const result = await this.invoke(current, currentInput, currentContext.trim(this.trimStrategy));
      const { handoff } = result;
      if (!handoff) {
        return result;
      }

      const target = agents.find((agent) => agent.metadata.name === handoff.targetAgent);
      if (!target) {
        throw new AgentNotFoundError(handoff.targetAgent);
      }

      this.logger.info('Agent handoff', {
        from: result.agent,
        to: handoff.targetAgent,
        reason: handoff.reason,
        depth: depth + 1,
      });

      currentInput = renderHandoffInput(currentInput, result, handoff);
      currentContext = currentContext
        .applyStatePatch(result.statePatch)
        .fork(`${context.threadId}/handoff-${depth + 1}`);
      current = target;
    }
  }

  /**
   * Run every agent concurrently on the same input; any failure fails the whole call
   */
  async executeParallel(
    input: string,
    context: AgentContext,
    agents: readonly IAgent[],
    aggregate: AgentResultAggregator = defaultAggregation
  ): Promise<AgentResult> {
    const trimmed = context.trim(this.trimStrategy);
    this.logger.debug('Parallel fan-out', { agents: agents.map((agent) => agent.metadata.name) });
    const results = await Promise.all(agents.map((agent) => this.invoke(agent, input, trimmed)));
    return aggregate(results);
  }

  private async invoke(agent: IAgent, input: string, context: AgentContext): Promise<AgentResult> {
    try {
      return await agent.execute(input, context);
    } catch (error) {
      if (error instanceof AgentError) {
        throw error;
      }
      this.logger.error('Agent execution failed', {
        agent: agent.metadata.name,
        error: errorMessage(error),
      });
      throw new AgentExecutionError(agent.metadata.name, errorMessage(error));
    }
  }
}
