import type { GenerateOptions, ModelEndpoint } from '../../llm-providers/base.js';
import type { ProviderConnection, ProviderConnector, RequestDeadline, ToolCallOutcome } from '../../tools/types.js';
import type { AIConfig, ChatMessage, LogEntry, LogSink, ToolDefinition, ToolTransportType } from '../../types.js';

export const TEST_MODEL: AIConfig = {
  provider: 'test',
  baseUrl: 'http://model.invalid/v1',
  apiKey: 'test-secret',
  model: 'test-model',
};

export const toolDef = (name: string, description = `${name} tool`): ToolDefinition => ({
  name,
  description,
  parameterSchema: { type: 'object', properties: {} },
});

export type CallHandler = (name: string, args: Record<string, unknown>, deadline: RequestDeadline) => Promise<ToolCallOutcome>;

export const okHandler: CallHandler = (name) => Promise.resolve({ text: `${name} result`, isError: false });

export class FakeConnection implements ProviderConnection {
  readonly transport: ToolTransportType = 'http';
  readonly pid = null;
  readonly calls: { name: string; args: Record<string, unknown> }[] = [];
  closed = false;
  handler: CallHandler;
  private readonly tools: ToolDefinition[];
  private readonly listError?: Error;

  constructor(tools: ToolDefinition[], handler: CallHandler = okHandler, listError?: Error) {
    this.tools = tools;
    this.handler = handler;
    this.listError = listError;
  }

  listTools(): Promise<ToolDefinition[]> {
    if (this.listError !== undefined) return Promise.reject(this.listError);
    return Promise.resolve([...this.tools]);
  }

  async callTool(name: string, args: Record<string, unknown>, deadline: RequestDeadline): Promise<ToolCallOutcome> {
    this.calls.push({ name, args });
    return await this.handler(name, args, deadline);
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

// Each provider name maps to a factory so reconnects get a fresh connection
export class FakeConnector implements ProviderConnector {
  readonly connects: string[] = [];
  readonly created: FakeConnection[] = [];
  private readonly plan: Record<string, () => FakeConnection | Error>;

  constructor(plan: Record<string, () => FakeConnection | Error>) {
    this.plan = plan;
  }

  connect(providerName: string): Promise<ProviderConnection> {
    this.connects.push(providerName);
    const factory = this.plan[providerName];
    if (factory === undefined) return Promise.reject(new Error(`no plan for '${providerName}'`));
    const outcome = factory();
    if (outcome instanceof Error) return Promise.reject(outcome);
    this.created.push(outcome);
    return Promise.resolve(outcome);
  }
}

export type ScriptStep = ChatMessage | Error | ((transcript: readonly ChatMessage[], opts: GenerateOptions) => Promise<ChatMessage>);

export interface RecordedGeneration {
  transcript: ChatMessage[];
  tools: readonly ToolDefinition[] | undefined;
}

/**
 * Model endpoint that replays a fixed script, one step per generate() call,
 * and records what it was asked.
 */
export class ScriptedEndpoint implements ModelEndpoint {
  readonly calls: RecordedGeneration[] = [];
  private readonly steps: ScriptStep[];
  private readonly fallback?: ScriptStep;

  constructor(steps: ScriptStep[], fallback?: ScriptStep) {
    this.steps = [...steps];
    this.fallback = fallback;
  }

  async generate(
    _modelConfig: AIConfig,
    transcript: readonly ChatMessage[],
    tools: readonly ToolDefinition[] | undefined,
    opts: GenerateOptions = {}
  ): Promise<ChatMessage> {
    this.calls.push({ transcript: [...transcript], tools });
    const step = this.steps.shift() ?? this.fallback;
    if (step === undefined) throw new Error('script exhausted');
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return await step(transcript, opts);
    return step;
  }
}

export const assistant = (content: string | null, toolCalls: { id: string; toolName: string; argumentsJson?: string }[] = []): ChatMessage => ({
  role: 'assistant',
  content,
  toolCalls: toolCalls.map((tc) => ({ id: tc.id, toolName: tc.toolName, argumentsJson: tc.argumentsJson ?? '{}' })),
});

export function collectLogs(): { entries: LogEntry[]; onLog: LogSink } {
  const entries: LogEntry[] = [];
  return { entries, onLog: (entry) => { entries.push(entry); } };
}

export const noSleep = (): Promise<void> => Promise.resolve();
