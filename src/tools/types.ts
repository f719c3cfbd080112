import type { LogSink, ToolDefinition, ToolProviderConfig, ToolTransportType } from '../types.js';

export interface RequestDeadline {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ToolCallOutcome {
  text: string;
  isError: boolean;
}

/**
 * One live channel to one tool provider. The registry only ever talks to
 * providers through this capability, whatever transport sits underneath.
 */
export interface ProviderConnection {
  readonly transport: ToolTransportType;
  // Subprocess id for stdio providers, null otherwise
  readonly pid: number | null;
  listTools(deadline: RequestDeadline): Promise<ToolDefinition[]>;
  callTool(name: string, args: Record<string, unknown>, deadline: RequestDeadline): Promise<ToolCallOutcome>;
  close(): Promise<void>;
}

export interface ConnectOptions {
  timeoutMs: number;
  proxyUrl?: string;
  onLog?: LogSink;
}

export interface ProviderConnector {
  connect(providerName: string, config: ToolProviderConfig, opts: ConnectOptions): Promise<ProviderConnection>;
}
