/**
 * Runtime factory - wires the core services from a validated configuration
 */

import {
  AgentContext,
  AgentCoordinator,
  AgentRouter,
  InMemoryPromptRegistry,
  PersistentMemory,
  ToolConversationManager,
  ToolRegistry,
  applyWindow,
  type AgentResult,
  type ContextTrimmingStrategy,
  type ContextWindow,
  type ConversationMessage,
  type ConversationThread,
  type IAgent,
  type ILLMService,
  type ILogger,
  type IPersistentMemoryStore,
  type Message,
  type ToolConversationResult,
} from '@agentloom/agents';
import { Logger } from '../logging/Logger.js';
import { DatabaseManager } from '../storage/Database.js';
import { SqlMemoryStore } from '../storage/SqlMemoryStore.js';
import type { ContextConfig, RuntimeConfig } from '../config/schemas.js';

export interface RuntimeOptions {
  config: RuntimeConfig;
  logger?: ILogger;
  /** Durable store; a sql.js store at config.storage.path when omitted */
  store?: IPersistentMemoryStore;
  clock?: () => Date;
}

export interface AgentRuntime {
  readonly config: RuntimeConfig;
  readonly logger: ILogger;
  readonly memory: PersistentMemory;
  readonly prompts: InMemoryPromptRegistry;
  readonly tools: ToolRegistry;
  readonly router: AgentRouter;
  readonly coordinator: AgentCoordinator;
  readonly toolLoop: ToolConversationManager;

  /** Route with the configured conflict resolution */
  route(capability: string, agents: readonly IAgent[]): IAgent;

  /** Handoff chain bounded by the configured depth */
  handoff(
    input: string,
    agent: IAgent,
    context: AgentContext,
    agents: readonly IAgent[]
  ): Promise<AgentResult>;

  /** Tool loop bounded by the configured iteration count */
  runTools(
    prompt: string,
    thread: ConversationThread,
    llm: ILLMService,
    tools?: readonly string[]
  ): Promise<ToolConversationResult>;

  window(messages: readonly ConversationMessage[]): ContextWindow;

  createContext(threadId: string, history?: readonly Message[]): AgentContext;

  close(): void;
}

export function windowStrategy(context: ContextConfig): ContextTrimmingStrategy {
  return context.strategy === 'summarize-old-messages'
    ? { type: context.strategy, summaryTargetTokens: context.summaryTargetTokens }
    : { type: context.strategy };
}

export async function createRuntime(options: RuntimeOptions): Promise<AgentRuntime> {
  const { config } = options;
  const logger =
    options.logger ??
    new Logger({
      level: config.logging.level,
      dir: config.logging.dir,
      console: config.logging.console,
      file: config.logging.file,
    });

  let database: DatabaseManager | null = null;
  let store = options.store;
  if (store === undefined) {
    database = await DatabaseManager.create({ path: config.storage.path, logger });
    store = new SqlMemoryStore(database);
  }

  const memory = new PersistentMemory({
    store,
    logger,
    ...(options.clock && { clock: options.clock }),
  });
  const prompts = new InMemoryPromptRegistry();
  const tools = new ToolRegistry({ logger });
  const router = new AgentRouter({ logger });
  const coordinator = new AgentCoordinator({ logger, trimStrategy: config.agents.trimStrategy });
  const toolLoop = new ToolConversationManager({
    logger,
    provider: config.context.provider,
    ...(options.clock && { clock: options.clock }),
  });
  const strategy = windowStrategy(config.context);

  logger.info('Runtime ready', {
    storage: config.storage.path ?? (database ? ':memory:' : 'external'),
    strategy: strategy.type,
  });

  return {
    config,
    logger,
    memory,
    prompts,
    tools,
    router,
    coordinator,
    toolLoop,

    route: (capability, agents) =>
      router.route(capability, agents, config.agents.conflictResolution),

    handoff: (input, agent, context, agents) =>
      coordinator.executeWithHandoff(input, agent, context, agents, config.agents.maxHandoffDepth),

    runTools: (prompt, thread, llm, toolNames) =>
      toolLoop.run({
        prompt,
        thread,
        llm,
        toolRegistry: tools,
        ...(toolNames && { tools: toolNames }),
        maxIterations: config.tools.maxIterations,
      }),

    window: (messages) =>
      applyWindow(
        messages,
        config.context.provider,
        { maxTokens: config.context.maxTokens, maxMessages: config.context.maxMessages },
        strategy
      ),

    createContext: (threadId, history = []) =>
      new AgentContext({
        threadId,
        history,
        availableTools: tools.listEnabled(),
        constraints: {
          maxContextMessages: config.context.maxMessages,
          maxEstimatedTokens: config.context.maxTokens,
        },
        provider: config.context.provider,
      }),

    close: () => {
      database?.close();
    },
  };
}
