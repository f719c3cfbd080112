import { describe, expect, it } from 'vitest';

import type { ProviderFetch } from '../../tools/transport-binding.js';
import type { ToolProviderConfig } from '../../types.js';

import { buildProviderFetch, buildStdioEnvironment, resolveTransportBinding } from '../../tools/transport-binding.js';

const stdio = (overrides: Partial<ToolProviderConfig> = {}): ToolProviderConfig => ({
  type: 'stdio',
  command: 'files-server',
  args: ['--root', '/srv'],
  useProxy: false,
  enabled: true,
  ...overrides,
});

function recordingFetch(): { seen: (RequestInit | undefined)[]; fetch: ProviderFetch } {
  const seen: (RequestInit | undefined)[] = [];
  return {
    seen,
    fetch: (_input, init) => {
      seen.push(init);
      return Promise.resolve(new Response('ok'));
    },
  };
}

describe('buildStdioEnvironment', () => {
  it('layers parent, proxy variables, then the provider entries', () => {
    const env = buildStdioEnvironment(
      stdio({ env: { https_proxy: 'http://own-proxy.invalid:1', API_TOKEN: 'test-secret' } }),
      'http://proxy.invalid:3128',
      { PATH: '/usr/bin', HTTP_PROXY: 'http://stale.invalid', UNSET: undefined }
    );
    expect(env).toEqual({
      PATH: '/usr/bin',
      HTTP_PROXY: 'http://proxy.invalid:3128',
      HTTPS_PROXY: 'http://proxy.invalid:3128',
      http_proxy: 'http://proxy.invalid:3128',
      https_proxy: 'http://own-proxy.invalid:1',
      API_TOKEN: 'test-secret',
    });
  });
});

describe('resolveTransportBinding', () => {
  it('injects the proxy only for providers that opt in', () => {
    const ctx = { proxyUrl: 'http://proxy.invalid:3128', env: { PATH: '/usr/bin' } };

    const plain = resolveTransportBinding('files', stdio(), ctx);
    const proxied = resolveTransportBinding('files', stdio({ useProxy: true }), ctx);

    expect(plain).toEqual({ kind: 'stdio', command: 'files-server', args: ['--root', '/srv'], env: { PATH: '/usr/bin' }, proxied: false });
    expect(proxied.proxied).toBe(true);
    expect(proxied.kind === 'stdio' ? proxied.env.HTTPS_PROXY : undefined).toBe('http://proxy.invalid:3128');
  });

  it('is not proxied when no proxy is configured', () => {
    const binding = resolveTransportBinding('files', stdio({ useProxy: true }), { env: {} });
    expect(binding.proxied).toBe(false);
    expect(binding.kind === 'stdio' ? binding.env : undefined).toEqual({});
  });

  it('keeps header names but not values in the binding', () => {
    const binding = resolveTransportBinding('search', {
      type: 'sse',
      url: 'https://tools.example.invalid/sse',
      headers: { Authorization: 'Bearer ${TOKEN}', 'X-Team': 'core' },
      useProxy: true,
      enabled: true,
    }, { proxyUrl: 'http://proxy.invalid:3128', env: {} });

    expect(binding.kind).toBe('sse');
    if (binding.kind === 'stdio') return;
    expect(binding.url.toString()).toBe('https://tools.example.invalid/sse');
    expect(binding.headerNames).toEqual(['Authorization', 'X-Team']);
    expect(binding.proxied).toBe(true);
  });

  it('rejects a missing command, a missing url and an unparsable url', () => {
    expect(() => resolveTransportBinding('files', stdio({ command: undefined }))).toThrow("stdio provider 'files' requires a 'command'");
    expect(() => resolveTransportBinding('web', { type: 'http', useProxy: false, enabled: true })).toThrow("http provider 'web' requires a 'url'");
    expect(() => resolveTransportBinding('web', { type: 'http', url: 'not a url', useProxy: false, enabled: true })).toThrow("http provider 'web' has an invalid url 'not a url'");
  });
});

describe('buildProviderFetch', () => {
  it('adds configured headers to every request and expands them at request time', async () => {
    const env: NodeJS.ProcessEnv = { TOKEN: 'test-token-1' };
    const { seen, fetch } = recordingFetch();
    const providerFetch = buildProviderFetch({ Authorization: 'Bearer ${TOKEN}' }, { env, baseFetch: fetch });

    await providerFetch('https://tools.example.invalid/mcp', { method: 'POST', headers: { 'content-type': 'application/json' } });
    env.TOKEN = 'test-token-2';
    await providerFetch('https://tools.example.invalid/mcp');

    const first = new Headers(seen[0]?.headers);
    expect(first.get('authorization')).toBe('Bearer test-token-1');
    expect(first.get('content-type')).toBe('application/json');
    expect(seen[0]?.method).toBe('POST');
    expect(new Headers(seen[1]?.headers).get('authorization')).toBe('Bearer test-token-2');
  });

  it('lets configured headers override the request headers', async () => {
    const { seen, fetch } = recordingFetch();
    const providerFetch = buildProviderFetch({ 'X-Team': 'core' }, { env: {}, baseFetch: fetch });

    await providerFetch('https://tools.example.invalid/mcp', { headers: { 'x-team': 'other' } });

    expect(new Headers(seen[0]?.headers).get('x-team')).toBe('core');
    expect(seen[0] !== undefined && 'dispatcher' in seen[0]).toBe(false);
  });
});
