import { jsonSchema } from '@ai-sdk/provider-utils';
import { tool } from 'ai';

import type { AIConfig, ChatMessage, ToolCall, ToolDefinition } from '../types.js';
import type { ModelMessage, TextPart, ToolCallPart, ToolSet } from 'ai';

export interface GenerateOptions {
  abortSignal?: AbortSignal;
}

/**
 * Anything that can turn a transcript into exactly one assistant turn. An
 * absent or empty tool list means plain generation.
 */
export interface ModelEndpoint {
  generate(
    modelConfig: AIConfig,
    transcript: readonly ChatMessage[],
    tools: readonly ToolDefinition[] | undefined,
    opts?: GenerateOptions
  ): Promise<ChatMessage>;
}

// Shape of the pieces of a generateText result this layer reads
export interface RawToolCall {
  toolCallId: string;
  toolName: string;
  input: unknown;
}

export abstract class BaseModelEndpoint implements ModelEndpoint {
  abstract generate(
    modelConfig: AIConfig,
    transcript: readonly ChatMessage[],
    tools: readonly ToolDefinition[] | undefined,
    opts?: GenerateOptions
  ): Promise<ChatMessage>;

  // Tools carry no execute(): the engine runs them and feeds results back itself
  protected convertTools(tools: readonly ToolDefinition[] | undefined): ToolSet | undefined {
    if (tools === undefined || tools.length === 0) return undefined;
    return Object.fromEntries(
      tools.map((t) => [
        t.name,
        tool({
          description: t.description,
          inputSchema: jsonSchema(t.parameterSchema),
        }),
      ])
    );
  }

  protected convertMessages(messages: readonly ChatMessage[]): ModelMessage[] {
    const callIdToName = new Map<string, string>();
    messages.forEach((m) => {
      m.toolCalls.forEach((tc) => { callIdToName.set(tc.id, tc.toolName); });
    });

    return messages.map((m): ModelMessage => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content ?? '' };
        case 'user':
          return { role: 'user', content: m.content ?? '' };
        case 'assistant': {
          const parts: (TextPart | ToolCallPart)[] = [];
          if (typeof m.content === 'string' && m.content.length > 0) parts.push({ type: 'text', text: m.content });
          m.toolCalls.forEach((tc) => {
            parts.push({ type: 'tool-call', toolCallId: tc.id, toolName: tc.toolName, input: replayInput(tc) });
          });
          return { role: 'assistant', content: parts.length > 0 ? parts : '' };
        }
        case 'tool': {
          const toolCallId = m.toolCallId ?? '';
          return {
            role: 'tool',
            content: [{
              type: 'tool-result',
              toolCallId,
              toolName: callIdToName.get(toolCallId) ?? 'unknown',
              output: { type: 'text', value: m.content ?? '' },
            }],
          };
        }
      }
    });
  }

  protected toAssistantMessage(text: string, toolCalls: readonly RawToolCall[]): ChatMessage {
    return {
      role: 'assistant',
      content: text.length > 0 ? text : null,
      toolCalls: toolCalls.map((tc) => ({
        id: tc.toolCallId,
        toolName: tc.toolName,
        argumentsJson: typeof tc.input === 'string' ? tc.input : JSON.stringify(tc.input ?? {}),
      })),
    };
  }
}

// The model sees back the arguments it produced; unparseable ones replay as an empty object
function replayInput(tc: ToolCall): unknown {
  if (tc.argumentsJson.trim().length === 0) return {};
  try {
    const parsed: unknown = JSON.parse(tc.argumentsJson);
    return parsed;
  } catch {
    return {};
  }
}
