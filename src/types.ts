// Core conversation structures
export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  toolName: string;
  argumentsJson: string; // raw JSON text as produced by the model
}

export interface ChatMessage {
  role: ChatRole;
  content: string | null;
  toolCalls: ToolCall[];
  toolCallId?: string; // only on tool-role messages
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameterSchema: Record<string, unknown>;
}

// Tool provider (MCP server) configuration
export type ToolTransportType = 'http' | 'sse' | 'stdio';

export interface ToolProviderConfig {
  type: ToolTransportType;
  url?: string;
  headers?: Record<string, string>;
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  useProxy: boolean;
  enabled: boolean;
}

export interface ProxyConfig {
  url?: string;
}

// Model endpoint configuration; also the shape persisted as a per-user override
export interface AIConfig {
  provider?: string;
  baseUrl: string;
  apiKey?: string;
  model: string;
  defaultPrompt?: string;
}

export interface PersonaConfig {
  name: string;
  prompt: string;
}

export interface AllowListConfig {
  users: string[];
  platforms: Record<string, string[]>;
  // Platforms on which every sender is accepted
  openPlatforms: string[];
}

export interface BroadcastConfig {
  enabled: boolean;
  time: string; // HH:MM, local time
  targets: string[]; // platform:recipient
  prompt: string;
  systemPrompt: string;
}

export interface EngineConfig {
  maxIterations: number;
  runTimeoutMs: number;
}

export type LogFormat = 'logfmt' | 'json' | 'console';

export interface Configuration {
  ai: AIConfig;
  proxy: ProxyConfig;
  mcpServers: Record<string, ToolProviderConfig>;
  allowed: AllowListConfig;
  platformPrompts: Record<string, string>;
  personas: Record<string, PersonaConfig>;
  broadcast?: BroadcastConfig;
  engine: EngineConfig;
  storage: { userConfigFile?: string };
  logging: { format?: LogFormat; verbose: boolean };
}

// Structured logging interface
export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';
  type: 'llm' | 'tool' | 'engine' | 'broadcast';
  remoteIdentifier: string;             // 'mcp:server', 'mcp:server:tool', 'provider:model', 'engine:run'
  fatal: boolean;                       // True if this ended the current operation
  message: string;
  iteration?: number;                   // Conversation loop iteration (1-based)
  toolCallId?: string;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogSink = (entry: LogEntry) => void;
