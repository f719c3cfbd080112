import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { generateText } from 'ai';

import type { AIConfig, ChatMessage, LogSink, ToolDefinition } from '../types.js';
import type { GenerateOptions } from './base.js';
import type { LanguageModel } from 'ai';

import { errorMessage, warn } from '../utils.js';

import { BaseModelEndpoint } from './base.js';

export interface OpenAICompatibleEndpointOptions {
  fetch?: typeof fetch;
  onLog?: LogSink;
  // Retries done by the SDK itself on transient HTTP errors
  maxRetries?: number;
}

/**
 * Model endpoint for any server speaking the OpenAI chat-completions dialect.
 * Providers are built lazily per (baseUrl, apiKey) since per-user overrides can
 * point each request somewhere else.
 */
export class OpenAICompatibleEndpoint extends BaseModelEndpoint {
  private readonly opts: OpenAICompatibleEndpointOptions;
  private readonly providers = new Map<string, (model: string) => LanguageModel>();

  constructor(opts: OpenAICompatibleEndpointOptions = {}) {
    super();
    this.opts = opts;
  }

  async generate(
    modelConfig: AIConfig,
    transcript: readonly ChatMessage[],
    tools: readonly ToolDefinition[] | undefined,
    opts: GenerateOptions = {}
  ): Promise<ChatMessage> {
    const model = this.resolveProvider(modelConfig)(modelConfig.model);
    const toolSet = this.convertTools(tools);
    const started = Date.now();
    const result = await generateText({
      model,
      messages: this.convertMessages(transcript),
      ...(toolSet !== undefined ? { tools: toolSet } : {}),
      maxRetries: this.opts.maxRetries ?? 1,
      abortSignal: opts.abortSignal,
    });
    this.log('VRB', `generated in ${String(Date.now() - started)}ms: ${String(result.text.length)} chars, ${String(result.toolCalls.length)} tool calls, finish=${result.finishReason}`, modelConfig);
    return this.toAssistantMessage(result.text, result.toolCalls);
  }

  private resolveProvider(cfg: AIConfig): (model: string) => LanguageModel {
    const key = `${cfg.provider ?? 'openai-compatible'}|${cfg.baseUrl}|${cfg.apiKey ?? ''}`;
    const cached = this.providers.get(key);
    if (cached !== undefined) return cached;
    if (cfg.baseUrl.length === 0) {
      throw new Error(`model endpoint '${cfg.provider ?? 'openai-compatible'}' missing baseUrl`);
    }
    const prov = createOpenAICompatible({
      name: cfg.provider ?? 'openai-compatible',
      baseURL: cfg.baseUrl,
      apiKey: cfg.apiKey,
      fetch: this.opts.fetch,
      includeUsage: true,
    });
    const factory = (model: string): LanguageModel => prov.chatModel(model);
    this.providers.set(key, factory);
    return factory;
  }

  private log(severity: 'VRB' | 'TRC', message: string, cfg: AIConfig): void {
    const sink = this.opts.onLog;
    if (sink === undefined) return;
    try {
      sink({ timestamp: Date.now(), severity, type: 'llm', remoteIdentifier: `${cfg.provider ?? 'openai-compatible'}:${cfg.model}`, fatal: false, message });
    } catch (e) {
      warn(`log sink failed: ${errorMessage(e)}`);
    }
  }
}
