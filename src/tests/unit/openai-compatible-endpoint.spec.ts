import { describe, expect, it } from 'vitest';

import type { ChatMessage } from '../../types.js';

import { seedTranscript } from '../../conversation-loop.js';
import { OpenAICompatibleEndpoint } from '../../llm-providers/openai-compatible.js';
import { assistant, collectLogs, TEST_MODEL, toolDef } from '../fixtures/fakes.js';

interface CapturedRequest {
  url: string;
  headers: Headers;
  body: Record<string, unknown>;
}

function chatCompletion(message: Record<string, unknown>, finishReason: string): Record<string, unknown> {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, message: { role: 'assistant', ...message }, finish_reason: finishReason }],
    usage: { prompt_tokens: 5, completion_tokens: 3, total_tokens: 8 },
  };
}

function fakeServer(reply: Record<string, unknown>): { requests: CapturedRequest[]; fetch: typeof fetch } {
  const requests: CapturedRequest[] = [];
  const fakeFetch: typeof fetch = (input, init) => {
    const url = input instanceof Request ? input.url : input.toString();
    const raw = typeof init?.body === 'string' ? init.body : '{}';
    const parsed: unknown = JSON.parse(raw);
    const body: Record<string, unknown> = typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : {};
    requests.push({ url, headers: new Headers(init?.headers), body });
    return Promise.resolve(new Response(JSON.stringify(reply), { status: 200, headers: { 'content-type': 'application/json' } }));
  };
  return { requests, fetch: fakeFetch };
}

describe('OpenAICompatibleEndpoint', () => {
  it('returns a plain answer as an assistant turn without tool calls', async () => {
    const server = fakeServer(chatCompletion({ content: 'Hello there.' }, 'stop'));
    const endpoint = new OpenAICompatibleEndpoint({ fetch: server.fetch, maxRetries: 0 });

    const reply = await endpoint.generate(TEST_MODEL, seedTranscript('be brief', 'hi'), undefined);

    expect(reply).toEqual({ role: 'assistant', content: 'Hello there.', toolCalls: [] });
    expect(server.requests).toHaveLength(1);
    expect(server.requests[0]?.url).toBe('http://model.invalid/v1/chat/completions');
    expect(server.requests[0]?.headers.get('authorization')).toBe('Bearer test-secret');
    expect(server.requests[0]?.body.model).toBe('test-model');
    expect(server.requests[0]?.body.messages).toMatchObject([
      { role: 'system', content: 'be brief' },
      { role: 'user', content: 'hi' },
    ]);
    expect(server.requests[0]?.body.tools).toBeUndefined();
  });

  it('hands tool requests back with their raw JSON arguments', async () => {
    const server = fakeServer(chatCompletion({
      content: null,
      tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'forecast', arguments: '{"city":"Oslo"}' } }],
    }, 'tool_calls'));
    const { entries, onLog } = collectLogs();
    const endpoint = new OpenAICompatibleEndpoint({ fetch: server.fetch, maxRetries: 0, onLog });

    const reply = await endpoint.generate(TEST_MODEL, seedTranscript('be brief', 'weather?'), [toolDef('forecast')]);

    expect(reply).toEqual({
      role: 'assistant',
      content: null,
      toolCalls: [{ id: 'call_1', toolName: 'forecast', argumentsJson: '{"city":"Oslo"}' }],
    });
    expect(server.requests[0]?.body.tools).toMatchObject([{
      type: 'function',
      function: { name: 'forecast', description: 'forecast tool', parameters: { type: 'object', properties: {} } },
    }]);
    expect(entries.map((e) => [e.severity, e.type, e.remoteIdentifier])).toEqual([['VRB', 'llm', 'test:test-model']]);
  });

  it('replays earlier tool calls and their results to the model', async () => {
    const server = fakeServer(chatCompletion({ content: 'Sunny.' }, 'stop'));
    const endpoint = new OpenAICompatibleEndpoint({ fetch: server.fetch, maxRetries: 0 });
    const transcript: ChatMessage[] = [
      ...seedTranscript('be brief', 'weather?'),
      assistant(null, [{ id: 'call_1', toolName: 'forecast', argumentsJson: '{"city":"Oslo"}' }]),
      { role: 'tool', content: 'sunny, 21C', toolCalls: [], toolCallId: 'call_1' },
    ];

    await endpoint.generate(TEST_MODEL, transcript, [toolDef('forecast')]);

    const messages = server.requests[0]?.body.messages;
    expect(Array.isArray(messages) ? messages.slice(2) : undefined).toMatchObject([
      { role: 'assistant', tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'forecast', arguments: '{"city":"Oslo"}' } }] },
      { role: 'tool', tool_call_id: 'call_1', content: 'sunny, 21C' },
    ]);
  });

  it('rejects a configuration without a base url', async () => {
    const endpoint = new OpenAICompatibleEndpoint({ fetch: fakeServer({}).fetch });
    await expect(endpoint.generate({ ...TEST_MODEL, baseUrl: '' }, seedTranscript('s', 'u'), undefined)).rejects.toThrow("model endpoint 'test' missing baseUrl");
  });
});
