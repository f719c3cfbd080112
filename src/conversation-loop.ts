import type { ModelEndpoint } from './llm-providers/base.js';
import type { AIConfig, ChatMessage, LogEntry, LogSink, ToolCall, ToolDefinition } from './types.js';

import { ConversationTimeoutError, GenerationError, IterationsExceededError } from './engine-errors.js';
import { buildFormattingRequest, systemMessage, userMessage } from './prompts.js';
import { abortReason, errorMessage, isPlainObject, warn } from './utils.js';

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_RUN_TIMEOUT_MS = 120_000;

// What the loop needs from the tool side; SessionRegistry is the production implementation
export interface ToolGateway {
  listTools(): readonly ToolDefinition[];
  callTool(name: string, args: Record<string, unknown>, opts?: { signal?: AbortSignal }): Promise<string>;
}

export interface ConversationEngineOptions {
  onLog?: LogSink;
  maxIterations?: number;
  runTimeoutMs?: number;
}

export interface RunOptions {
  modelConfig: AIConfig;
  maxIterations?: number;
  // Platform restyling instruction; applied once to the final answer
  formattingInstruction?: string;
  // 0 disables the end-to-end deadline
  timeoutMs?: number;
  signal?: AbortSignal;
  // Shown in logs, e.g. 'telegram:42' or 'broadcast'
  label?: string;
}

export interface ConversationResult {
  text: string;
  transcript: ChatMessage[];
  iterations: number;
  formatted: boolean;
}

export function seedTranscript(systemPrompt: string, userText: string): ChatMessage[] {
  return [systemMessage(systemPrompt), userMessage(userText)];
}

/**
 * Parse the raw argument text of a tool call. An empty payload means no
 * arguments; anything that is not a JSON object is rejected with a reason.
 */
export function parseToolArguments(raw: string): { ok: true; args: Record<string, unknown> } | { ok: false; reason: string } {
  if (raw.trim().length === 0) return { ok: true, args: {} };
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    return { ok: false, reason: errorMessage(e) };
  }
  if (!isPlainObject(parsed)) {
    const kind = parsed === null ? 'null' : Array.isArray(parsed) ? 'array' : typeof parsed;
    return { ok: false, reason: `expected a JSON object, got ${kind}` };
  }
  return { ok: true, args: parsed };
}

/**
 * Drives model generation and tool execution until the model answers without
 * asking for tools, the iteration bound is hit, or the deadline expires.
 */
export class ConversationEngine {
  private readonly endpoint: ModelEndpoint;
  private readonly tools: ToolGateway;
  private readonly opts: ConversationEngineOptions;

  constructor(endpoint: ModelEndpoint, tools: ToolGateway, opts: ConversationEngineOptions = {}) {
    this.endpoint = endpoint;
    this.tools = tools;
    this.opts = opts;
  }

  async run(initialTranscript: readonly ChatMessage[], options: RunOptions): Promise<ConversationResult> {
    const timeoutMs = options.timeoutMs ?? this.opts.runTimeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
    const controller = new AbortController();
    const callerSignal = options.signal;
    const forward = (): void => { controller.abort(abortReason(callerSignal)); };
    if (callerSignal?.aborted === true) throw abortReason(callerSignal);
    callerSignal?.addEventListener('abort', forward, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      if (timeoutMs <= 0) return;
      timer = setTimeout(() => {
        const err = new ConversationTimeoutError(timeoutMs);
        controller.abort(err);
        this.log('ERR', err.message, options.label, { fatal: true });
        reject(err);
      }, timeoutMs);
    });

    const started = Date.now();
    try {
      const result = await Promise.race([this.loop(initialTranscript, options, controller.signal), deadline]);
      this.log('FIN', `answered in ${String(result.iterations)} iteration(s)`, options.label, {
        iteration: result.iterations,
        details: { iterations: result.iterations, duration_ms: Date.now() - started, formatted: result.formatted, chars: result.text.length },
      });
      return result;
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      callerSignal?.removeEventListener('abort', forward);
    }
  }

  private async loop(initialTranscript: readonly ChatMessage[], options: RunOptions, signal: AbortSignal): Promise<ConversationResult> {
    const requested = options.maxIterations ?? this.opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    const maxIterations = requested > 0 ? requested : DEFAULT_MAX_ITERATIONS;
    const transcript: ChatMessage[] = [...initialTranscript];

    // eslint-disable-next-line functional/no-loop-statements -- bounded generate/invoke cycle
    for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
      const catalog = this.tools.listTools();
      let reply: ChatMessage;
      try {
        reply = await this.endpoint.generate(options.modelConfig, transcript, catalog.length > 0 ? catalog : undefined, { abortSignal: signal });
      } catch (e) {
        if (signal.aborted) throw abortReason(signal);
        this.log('ERR', `generation failed: ${errorMessage(e)}`, options.label, {
          iteration,
          fatal: true,
          stack: e instanceof Error ? e.stack : undefined,
        });
        throw new GenerationError(iteration, e);
      }
      transcript.push(reply);

      if (reply.toolCalls.length === 0) {
        const answer = reply.content ?? '';
        this.log('VRB', `final answer after ${String(iteration)} iteration(s), ${String(answer.length)} chars`, options.label, { iteration });
        const styled = await this.applyFormatting(answer, options, signal);
        return { text: styled ?? answer, transcript, iterations: iteration, formatted: styled !== undefined };
      }

      this.log('VRB', `model requested ${String(reply.toolCalls.length)} tool call(s): ${reply.toolCalls.map((c) => c.toolName).join(', ')}`, options.label, { iteration });
      // executed concurrently, appended in the order the model issued them
      const results = await Promise.all(reply.toolCalls.map(async (call) => await this.executeToolCall(call, signal, options.label, iteration)));
      transcript.push(...results);
      if (signal.aborted) throw abortReason(signal);
    }

    this.log('WRN', `no final answer within ${String(maxIterations)} iterations`, options.label, { iteration: maxIterations, fatal: true });
    throw new IterationsExceededError(maxIterations, transcript);
  }

  private async executeToolCall(call: ToolCall, signal: AbortSignal, label: string | undefined, iteration: number): Promise<ChatMessage> {
    const parsed = parseToolArguments(call.argumentsJson);
    if (!parsed.ok) {
      this.log('WRN', `bad arguments for '${call.toolName}': ${parsed.reason}`, label, { iteration, toolCallId: call.id });
      return toolMessage(call.id, `Error parsing arguments: ${parsed.reason}`);
    }
    const started = Date.now();
    try {
      const text = await this.tools.callTool(call.toolName, parsed.args, { signal });
      const durationMs = Date.now() - started;
      this.log('VRB', `tool '${call.toolName}' ok in ${String(durationMs)}ms`, label, { iteration, toolCallId: call.id, details: { tool_name: call.toolName, duration_ms: durationMs } });
      return toolMessage(call.id, text);
    } catch (e) {
      this.log('WRN', `tool '${call.toolName}' failed: ${errorMessage(e)}`, label, { iteration, toolCallId: call.id });
      return toolMessage(call.id, `Error executing tool: ${errorMessage(e)}`);
    }
  }

  // Returns the restyled answer, or undefined when no pass ran or it failed
  private async applyFormatting(answer: string, options: RunOptions, signal: AbortSignal): Promise<string | undefined> {
    const instruction = options.formattingInstruction?.trim() ?? '';
    if (answer.length === 0 || instruction.length === 0) return undefined;
    try {
      const styled = await this.endpoint.generate(options.modelConfig, [buildFormattingRequest(answer, instruction)], undefined, { abortSignal: signal });
      const text = styled.content ?? '';
      if (text.length === 0) {
        this.log('WRN', 'formatting pass returned no text; keeping the original answer', options.label);
        return undefined;
      }
      return text;
    } catch (e) {
      if (signal.aborted) throw abortReason(signal);
      this.log('WRN', `formatting pass failed: ${errorMessage(e)}`, options.label);
      return undefined;
    }
  }

  private log(
    severity: LogEntry['severity'],
    message: string,
    label: string | undefined,
    extra: Pick<LogEntry, 'iteration' | 'toolCallId' | 'details' | 'stack'> & { fatal?: boolean } = {}
  ): void {
    const sink = this.opts.onLog;
    if (sink === undefined) return;
    const { fatal = false, ...rest } = extra;
    try {
      sink({
        timestamp: Date.now(),
        severity,
        type: 'engine',
        remoteIdentifier: `engine:${label ?? 'run'}`,
        fatal,
        message,
        ...rest,
      });
    } catch (e) {
      warn(`log sink failed: ${errorMessage(e)}`);
    }
  }
}

const toolMessage = (toolCallId: string, content: string): ChatMessage => ({ role: 'tool', content, toolCalls: [], toolCallId });
