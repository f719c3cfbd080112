import type { ConversationEngine } from './conversation-loop.js';
import type { UserConfigStore } from './user-config-store.js';
import type { AIConfig, Configuration, LogEntry, LogSink } from './types.js';

import { isAllowed, personaFor, platformPrompt, userKeyOf } from './config.js';
import { seedTranscript } from './conversation-loop.js';
import { ConversationTimeoutError, GenerationError, IterationsExceededError } from './engine-errors.js';
import { DEFAULT_SYSTEM_PROMPT, NEWS_SYSTEM_PROMPT, NEWS_USER_PROMPT, SEARCH_SYSTEM_PROMPT } from './prompts.js';
import { errorMessage, warn } from './utils.js';

export interface ChatRequest {
  platform: string;
  userId: string;
  text: string;
}

export type ChatReplyKind = 'answer' | 'command' | 'error';

export interface ChatReply {
  kind: ChatReplyKind;
  text: string;
}

export interface ChatCommandRouterOptions {
  config: Configuration;
  engine: Pick<ConversationEngine, 'run'>;
  store: UserConfigStore;
  onLog?: LogSink;
}

export const SET_AI_USAGE = 'Usage: /set_ai key=<api key> model=<model name> url=<base url> [provider=<name>]';
export const SEARCH_USAGE = 'Usage: /s <query>';
export const HELP_TEXT = [
  'Send any message to chat with the assistant.',
  '/news - summary of today\'s news',
  '/s <query> - search the web and answer',
  '/set_ai key=... model=... url=... - use your own model endpoint',
  '/reset_ai - go back to the default model endpoint',
].join('\n');

/**
 * Entry point for inbound chat messages: applies the allow-list, handles the
 * slash commands and turns everything else into a conversation run. Returns
 * undefined when the message should be ignored.
 */
export class ChatCommandRouter {
  private readonly opts: ChatCommandRouterOptions;

  constructor(opts: ChatCommandRouterOptions) {
    this.opts = opts;
  }

  async handle(req: ChatRequest): Promise<ChatReply | undefined> {
    const { config } = this.opts;
    if (!isAllowed(config, req.platform, req.userId)) {
      this.log('VRB', `ignoring message from non-allowed user`, req);
      return undefined;
    }
    const text = req.text.trim();
    if (!text.startsWith('/')) return await this.chat(req, text);

    const [rawCommand, ...rest] = text.split(/\s+/);
    // '/news@SomeBot' style suffixes are dropped
    const command = rawCommand.split('@')[0].toLowerCase();
    switch (command) {
      case '/set_ai':
        return await this.setAi(req, rest);
      case '/reset_ai':
        return await this.resetAi(req);
      case '/news':
        return await this.news(req);
      case '/s':
        return await this.search(req, rest.join(' '));
      case '/help':
      case '/start':
        return { kind: 'command', text: HELP_TEXT };
      case '/ping':
        return { kind: 'command', text: 'pong' };
      default:
        return undefined;
    }
  }

  // An unreadable store degrades to the global model settings
  async effectiveModelConfig(req: Pick<ChatRequest, 'platform' | 'userId'>): Promise<AIConfig> {
    try {
      const override = await this.opts.store.getOverride(userKeyOf(req.platform, req.userId));
      return override ?? this.opts.config.ai;
    } catch (e) {
      this.log('WRN', `reading override failed, using global settings: ${errorMessage(e)}`, req);
      return this.opts.config.ai;
    }
  }

  private async chat(req: ChatRequest, text: string): Promise<ChatReply | undefined> {
    if (text.length === 0) return undefined;
    const modelConfig = await this.effectiveModelConfig(req);
    const persona = personaFor(this.opts.config, userKeyOf(req.platform, req.userId));
    if (persona !== undefined) this.log('VRB', `using persona '${persona.name}'`, req);
    const systemPrompt = persona?.prompt ?? modelConfig.defaultPrompt ?? this.opts.config.ai.defaultPrompt ?? DEFAULT_SYSTEM_PROMPT;
    return await this.runConversation(req, modelConfig, systemPrompt, text, 'Error generating reply');
  }

  private async news(req: ChatRequest): Promise<ChatReply> {
    const modelConfig = await this.effectiveModelConfig(req);
    return await this.runConversation(req, modelConfig, NEWS_SYSTEM_PROMPT, NEWS_USER_PROMPT, 'Error fetching news');
  }

  private async search(req: ChatRequest, query: string): Promise<ChatReply> {
    if (query.trim().length === 0) return { kind: 'command', text: SEARCH_USAGE };
    const modelConfig = await this.effectiveModelConfig(req);
    return await this.runConversation(req, modelConfig, SEARCH_SYSTEM_PROMPT, query.trim(), 'Error searching');
  }

  private async setAi(req: ChatRequest, args: string[]): Promise<ChatReply> {
    if (args.length === 0) return { kind: 'command', text: SET_AI_USAGE };
    const next: AIConfig = { ...(await this.effectiveModelConfig(req)) };
    const applied: string[] = [];
    args.forEach((arg) => {
      const eq = arg.indexOf('=');
      if (eq <= 0) return;
      const key = arg.slice(0, eq).toLowerCase();
      const value = arg.slice(eq + 1);
      switch (key) {
        case 'key':
        case 'api_key':
          next.apiKey = value;
          applied.push('key');
          break;
        case 'model':
          next.model = value;
          applied.push('model');
          break;
        case 'url':
        case 'base_url':
          next.baseUrl = value;
          applied.push('url');
          break;
        case 'provider':
          next.provider = value;
          applied.push('provider');
          break;
        default:
          break;
      }
    });
    if (applied.length === 0) return { kind: 'command', text: SET_AI_USAGE };
    try {
      await this.opts.store.setOverride(userKeyOf(req.platform, req.userId), next);
    } catch (e) {
      this.log('ERR', `saving override failed: ${errorMessage(e)}`, req);
      return { kind: 'error', text: `Failed to save settings: ${errorMessage(e)}` };
    }
    this.log('VRB', `model override updated (${applied.join(', ')})`, req);
    return { kind: 'command', text: 'AI settings updated.' };
  }

  private async resetAi(req: ChatRequest): Promise<ChatReply> {
    try {
      await this.opts.store.clearOverride(userKeyOf(req.platform, req.userId));
    } catch (e) {
      this.log('ERR', `clearing override failed: ${errorMessage(e)}`, req);
      return { kind: 'error', text: `Failed to reset settings: ${errorMessage(e)}` };
    }
    return { kind: 'command', text: 'AI settings reset to the global defaults.' };
  }

  private async runConversation(
    req: ChatRequest,
    modelConfig: AIConfig,
    systemPrompt: string,
    userText: string,
    failurePrefix: string
  ): Promise<ChatReply> {
    try {
      const result = await this.opts.engine.run(seedTranscript(systemPrompt, userText), {
        modelConfig,
        formattingInstruction: platformPrompt(this.opts.config, req.platform),
        maxIterations: this.opts.config.engine.maxIterations,
        timeoutMs: this.opts.config.engine.runTimeoutMs,
        label: userKeyOf(req.platform, req.userId),
      });
      return { kind: 'answer', text: result.text };
    } catch (e) {
      return { kind: 'error', text: describeFailure(e, failurePrefix) };
    }
  }

  private log(severity: LogEntry['severity'], message: string, req: Pick<ChatRequest, 'platform' | 'userId'>): void {
    const sink = this.opts.onLog;
    if (sink === undefined) return;
    try {
      sink({ timestamp: Date.now(), severity, type: 'engine', remoteIdentifier: `chat:${userKeyOf(req.platform, req.userId)}`, fatal: false, message });
    } catch (e) {
      warn(`log sink failed: ${errorMessage(e)}`);
    }
  }
}

export function describeFailure(error: unknown, prefix: string): string {
  if (error instanceof IterationsExceededError) return 'Too many tool rounds without an answer; stopped.';
  if (error instanceof ConversationTimeoutError) return 'Timed out waiting for an answer.';
  if (error instanceof GenerationError) {
    const cause = error.cause !== undefined ? errorMessage(error.cause) : error.message;
    return `${prefix}: ${cause}`;
  }
  return `${prefix}: ${errorMessage(error)}`;
}
