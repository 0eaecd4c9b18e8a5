// Main entry point - re-export all modules

// Shared
export { LoomError, ConfigurationError, errorMessage } from './shared/utils/errors.js';
export { AtomicRef } from './shared/utils/AtomicRef.js';
export { noopLogger } from './shared/logging/ILogger.js';
export type { ILogger, LogLevel } from './shared/logging/ILogger.js';
export type { IFileSystem } from './shared/platform/IFileSystem.js';

// Core types
export { createMessage } from './types/index.js';
export type {
  JsonPrimitive,
  JsonValue,
  Message,
  MessageRole,
  ToolCall,
  FinishReason,
  TokenUsage,
  LLMResponse,
  LLMChunk,
  ToolCallResponse,
  ProviderTag,
} from './types/index.js';

// Conversation model
export {
  createConversationMessage,
  toMessage,
  createThread,
  appendToThread,
  setThreadState,
  checkpointThread,
  forkThread,
  exportThread,
  importThread,
} from './conversation/ConversationThread.js';
export { InMemoryConversationStore } from './conversation/ConversationStore.js';
export { ThreadImportError } from './conversation/errors.js';
export type { IConversationStore } from './conversation/ConversationStore.js';
export type { ConversationMessageOptions } from './conversation/ConversationThread.js';
export type {
  ConversationState,
  ConversationMessage,
  ConversationCheckpoint,
  ConversationThread,
} from './conversation/types.js';

// Context windows
export {
  DefaultTokenCounter,
  defaultTokenCounter,
  CHARS_PER_TOKEN,
  MESSAGE_OVERHEAD_TOKENS,
} from './context/TokenCounter.js';
export { applyWindow } from './context/ContextWindow.js';
export type { ITokenCounter } from './context/TokenCounter.js';
export type { ContextTrimmingStrategy, ContextLimits, ContextWindow } from './context/ContextWindow.js';

// Memory
export { InMemoryMemory, validateSearch } from './memory/InMemoryMemory.js';
export { PersistentMemory } from './memory/PersistentMemory.js';
export { createMemoryThread, DEFAULT_SEARCH_LIMIT } from './memory/types.js';
export {
  MemoryError,
  ThreadNotFoundError,
  PersistenceFailedError,
  InvalidMemoryInputError,
} from './memory/errors.js';
export type { IMemory, IPersistentMemoryStore } from './memory/interfaces.js';
export type { MemoryThread, MemoryEntry } from './memory/types.js';
export type { InMemoryMemoryOptions } from './memory/InMemoryMemory.js';
export type { PersistentMemoryOptions } from './memory/PersistentMemory.js';

// Prompts
export { InMemoryPromptRegistry, renderTemplate, stringHash } from './prompts/PromptRegistry.js';
export { PromptTemplateInputSchema } from './prompts/types.js';
export {
  PromptError,
  PromptValidationError,
  DuplicatePromptError,
  PromptNotFoundError,
  EmptyVariantListError,
} from './prompts/errors.js';
export type { IPromptRegistry } from './prompts/PromptRegistry.js';
export type {
  PromptTemplate,
  PromptTemplateRef,
  PromptTemplateInput,
  PromptVariables,
} from './prompts/types.js';

// Agents
export { AgentContext, DEFAULT_AGENT_CONSTRAINTS } from './agents/AgentContext.js';
export { AgentRouter, validateAgent, parseSemanticVersion } from './agents/AgentRouter.js';
export {
  AgentCoordinator,
  defaultAggregation,
  renderHandoffInput,
  DEFAULT_MAX_HANDOFF_DEPTH,
  PARALLEL_COORDINATOR,
} from './agents/AgentCoordinator.js';
export { createAgentMetadata, createAgentResult } from './agents/types.js';
export {
  AgentError,
  AgentValidationError,
  HandoffDepthExceededError,
  AgentExecutionError,
  RoutingError,
  AgentNotFoundError,
  RoutingConflictError,
} from './agents/errors.js';
export type {
  AgentConstraints,
  AgentContextInit,
  ContextTrimStrategy,
} from './agents/AgentContext.js';
export type { AgentRouterOptions } from './agents/AgentRouter.js';
export type { AgentCoordinatorOptions } from './agents/AgentCoordinator.js';
export type {
  AgentMetadata,
  AgentHandoff,
  AgentResult,
  IAgent,
  ConflictResolution,
  AgentResultAggregator,
} from './agents/types.js';

// Tools
export { BaseTool } from './tools/BaseTool.js';
export { ToolRegistry } from './tools/ToolRegistry.js';
export type { ToolRegistryOptions } from './tools/ToolRegistry.js';
export { ToolRegistrationError } from './tools/errors.js';
export { toJsonSchema } from './tools/schema.js';
export type { ITool } from './tools/interfaces/ITool.js';
export type {
  ToolResult,
  ToolContext,
  ToolSource,
  ToolMetadata,
  ToolParameterSchema,
  ToolDefinition,
  ToolValidation,
} from './tools/types.js';

// Model service and tool loop
export {
  ToolConversationManager,
  renderHistory,
} from './llm/ToolConversationManager.js';
export {
  executeWithClarification,
  jsonParser,
  clarificationPrompt,
} from './llm/MultiTurnInteractions.js';
export {
  LLMError,
  ProviderError,
  AuthenticationError,
  InvalidRequestError,
  TimeoutError,
  ParseError,
  RateLimitError,
  ConfigError,
  ToolError,
  MaxIterationsExceededError,
} from './llm/errors.js';
export type { ILLMService, LLMTool } from './llm/ILLMService.js';
export type { LLMErrorKind } from './llm/errors.js';
export type {
  ToolConversationOptions,
  ToolConversationResult,
  ToolConversationManagerOptions,
} from './llm/ToolConversationManager.js';
export type { ParseOutcome, ResponseParser } from './llm/MultiTurnInteractions.js';
