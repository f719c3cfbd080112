// Library entry point
export { ConversationEngine, DEFAULT_MAX_ITERATIONS, DEFAULT_RUN_TIMEOUT_MS, parseToolArguments, seedTranscript } from './conversation-loop.js';
export type { ConversationEngineOptions, ConversationResult, RunOptions, ToolGateway } from './conversation-loop.js';
export { ConversationTimeoutError, GenerationError, IterationsExceededError, isConversationError } from './engine-errors.js';

export { SessionRegistry, DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_DISCOVERY_TIMEOUT_MS } from './tools/session-registry.js';
export type { ConnectSummary, SessionRegistryOptions } from './tools/session-registry.js';
export { ProviderSession, UNHEALTHY_FAILURE_THRESHOLD } from './tools/provider-session.js';
export { invokeWithRetry, backoffDelay, DEFAULT_MAX_ATTEMPTS, DEFAULT_ATTEMPT_TIMEOUT_MS } from './tools/invocation-pipeline.js';
export { McpConnector, McpConnection } from './tools/mcp-connector.js';
export { resolveTransportBinding, buildStdioEnvironment, buildProviderFetch } from './tools/transport-binding.js';
export type { TransportBinding } from './tools/transport-binding.js';
export { ToolInvocationError, ProviderConnectError, ToolResultError, isToolInvocationError, TOOL_ERROR_KIND_MEANINGS } from './tools/tool-errors.js';
export type { ToolErrorKind } from './tools/tool-errors.js';
export type { ProviderConnection, ProviderConnector, RequestDeadline, ToolCallOutcome } from './tools/types.js';

export { OpenAICompatibleEndpoint } from './llm-providers/openai-compatible.js';
export type { ModelEndpoint, GenerateOptions } from './llm-providers/base.js';

export { BroadcastDriver } from './broadcast/broadcast-driver.js';
export type { BroadcastDriverOptions, BroadcastOutcome } from './broadcast/broadcast-driver.js';
export { nextFireTime, parseFireTime, InvalidFireTimeError } from './broadcast/schedule.js';

export { ChatCommandRouter } from './chat-command-router.js';
export type { ChatReply, ChatRequest } from './chat-command-router.js';
export { ConsoleSender, DeliveryRouter, DeliveryError, parseDeliveryTarget } from './delivery.js';
export type { MessageDelivery, PlatformSender } from './delivery.js';
export { JsonFileUserConfigStore, MemoryUserConfigStore } from './user-config-store.js';
export type { UserConfigStore } from './user-config-store.js';
export { buildConfiguration, loadConfiguration, isAllowed } from './config.js';
export { createRuntime } from './runtime.js';
export { ShutdownController } from './shutdown-controller.js';
export { createStructuredLogger, StructuredLogger } from './logging/structured-logger.js';
export { makeTTYLogCallbacks } from './log-sink-tty.js';

export type {
  AIConfig,
  ChatMessage,
  Configuration,
  LogEntry,
  LogSink,
  ToolCall,
  ToolDefinition,
  ToolProviderConfig,
} from './types.js';
