import { describe, expect, it } from 'vitest';

import { buildConfiguration } from '../../config.js';
import { createRuntime } from '../../runtime.js';
import { MemoryUserConfigStore } from '../../user-config-store.js';
import { assistant, collectLogs, FakeConnection, FakeConnector, ScriptedEndpoint, toolDef } from '../fixtures/fakes.js';

describe('createRuntime', () => {
  it('wires providers, the model and the router into one chat round trip', async () => {
    const config = buildConfiguration({
      ai: { baseUrl: 'http://llm.invalid/v1', model: 'm' },
      mcpServers: { search: { url: 'http://tools.invalid/mcp' } },
      allowed: { allowAllPlatforms: ['console'] },
      broadcast: { enabled: true, time: '08:00', targets: ['console:ops'], prompt: 'digest' },
    });
    const connector = new FakeConnector({ search: () => new FakeConnection([toolDef('web_search')]) });
    const endpoint = new ScriptedEndpoint([
      assistant(null, [{ id: 'c1', toolName: 'web_search', argumentsJson: '{"q":"news"}' }]),
      assistant('Here is the news.'),
      assistant('Broadcast body.'),
    ]);
    const written: string[] = [];
    const { onLog } = collectLogs();
    const rt = createRuntime(config, onLog, { connector, endpoint, store: new MemoryUserConfigStore(), write: (s) => { written.push(s); } });

    const summary = await rt.registry.connectAll(rt.config.mcpServers);
    expect(summary).toEqual({ connected: ['search'], failed: {} });

    expect(await rt.router.handle({ platform: 'console', userId: 'me', text: 'news?' })).toEqual({ kind: 'answer', text: 'Here is the news.' });
    expect(connector.created[0]?.calls).toEqual([{ name: 'web_search', args: { q: 'news' } }]);

    const outcome = await rt.broadcast?.runOnce();
    expect(outcome?.delivered).toEqual(['console:ops']);
    expect(written).toEqual(['--- ops ---\nBroadcast body.\n']);

    await rt.shutdown.shutdown({ onLog });
    expect(connector.created[0]?.closed).toBe(true);
    await expect(rt.registry.callTool('web_search', {})).rejects.toThrow("provider 'search' is closed");
  });

  it('has no broadcast driver without a broadcast section', () => {
    const config = buildConfiguration({ ai: { baseUrl: 'http://llm.invalid/v1', model: 'm' } });
    const rt = createRuntime(config, () => undefined, { connector: new FakeConnector({}), endpoint: new ScriptedEndpoint([]), store: new MemoryUserConfigStore() });
    expect(rt.broadcast).toBeUndefined();
    expect(rt.delivery.platforms()).toEqual(['console']);
  });
});
