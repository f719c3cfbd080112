import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { ProxyAgent, type Dispatcher } from 'undici';

import type { LogSink, ToolProviderConfig } from '../types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { expandEnvReferences, warn } from '../utils.js';

export type ProviderFetch = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type TransportBinding =
  | { kind: 'stdio'; command: string; args: string[]; env: Record<string, string>; proxied: boolean }
  | { kind: 'http'; url: URL; fetch: ProviderFetch; headerNames: string[]; proxied: boolean }
  | { kind: 'sse'; url: URL; fetch: ProviderFetch; headerNames: string[]; proxied: boolean };

export interface BindingContext {
  proxyUrl?: string;
  env?: NodeJS.ProcessEnv;
  // Injected for tests; defaults to the global fetch
  baseFetch?: ProviderFetch;
}

export const PROXY_ENV_KEYS = ['HTTP_PROXY', 'HTTPS_PROXY', 'http_proxy', 'https_proxy'] as const;

/**
 * Resolve the channel for one provider from its configuration. Pure apart
 * from reading the environment it is given, so the resulting environment and
 * header behaviour can be inspected before anything is spawned or dialled.
 */
export function resolveTransportBinding(name: string, config: ToolProviderConfig, ctx: BindingContext = {}): TransportBinding {
  const env = ctx.env ?? process.env;
  const proxyUrl = typeof ctx.proxyUrl === 'string' && ctx.proxyUrl.length > 0 ? ctx.proxyUrl : undefined;
  const proxied = config.useProxy && proxyUrl !== undefined;

  if (config.type === 'stdio') {
    if (typeof config.command !== 'string' || config.command.length === 0) {
      throw new Error(`stdio provider '${name}' requires a 'command'`);
    }
    return {
      kind: 'stdio',
      command: config.command,
      args: config.args ?? [],
      env: buildStdioEnvironment(config, proxied ? proxyUrl : undefined, env),
      proxied,
    };
  }

  if (typeof config.url !== 'string' || config.url.length === 0) {
    throw new Error(`${config.type} provider '${name}' requires a 'url'`);
  }
  let url: URL;
  try {
    url = new URL(config.url);
  } catch {
    throw new Error(`${config.type} provider '${name}' has an invalid url '${config.url}'`);
  }
  const headers = config.headers ?? {};
  const dispatcher = proxied ? new ProxyAgent(proxyUrl) : undefined;
  return {
    kind: config.type,
    url,
    fetch: buildProviderFetch(headers, { dispatcher, env, baseFetch: ctx.baseFetch }),
    headerNames: Object.keys(headers),
    proxied,
  };
}

// Parent environment, then proxy variables when opted in, then the provider's own entries
export function buildStdioEnvironment(
  config: ToolProviderConfig,
  proxyUrl: string | undefined,
  parentEnv: NodeJS.ProcessEnv
): Record<string, string> {
  const env: Record<string, string> = {};
  Object.entries(parentEnv).forEach(([key, value]) => {
    if (typeof value === 'string') env[key] = value;
  });
  if (proxyUrl !== undefined) {
    PROXY_ENV_KEYS.forEach((key) => { env[key] = proxyUrl; });
  }
  Object.entries(config.env ?? {}).forEach(([key, value]) => { env[key] = value; });
  return env;
}

export function buildProviderFetch(
  headers: Record<string, string>,
  opts: { dispatcher?: Dispatcher; env?: NodeJS.ProcessEnv; baseFetch?: ProviderFetch } = {}
): ProviderFetch {
  const baseFetch: ProviderFetch = opts.baseFetch ?? fetch;
  return async (input, init) => {
    const merged = new Headers(init?.headers);
    // expanded per request so rotated secrets are picked up without a reconnect
    Object.entries(headers).forEach(([key, value]) => {
      merged.set(key, expandEnvReferences(value, opts.env ?? process.env));
    });
    const request: RequestInit & { dispatcher?: Dispatcher } = { ...init, headers: merged };
    if (opts.dispatcher !== undefined) request.dispatcher = opts.dispatcher;
    return await baseFetch(input, request);
  };
}

export function createTransport(name: string, binding: TransportBinding, onLog?: LogSink): Transport {
  switch (binding.kind) {
    case 'stdio': {
      const transport = new StdioClientTransport({ command: binding.command, args: binding.args, env: binding.env, stderr: 'pipe' });
      const stderr = transport.stderr;
      if (stderr !== null) {
        stderr.on('data', (chunk: Buffer) => {
          const text = chunk.toString('utf8').trim();
          if (text.length === 0) return;
          try {
            onLog?.({
              timestamp: Date.now(), severity: 'VRB', type: 'tool', remoteIdentifier: `mcp:${name}`, fatal: false, message: `stderr: ${text}`,
            });
          } catch (e) { warn(`mcp stderr relay failed for '${name}': ${e instanceof Error ? e.message : String(e)}`); }
        });
      }
      return transport;
    }
    case 'http':
      return new StreamableHTTPClientTransport(binding.url, { fetch: binding.fetch });
    case 'sse':
      // eslint-disable-next-line @typescript-eslint/no-deprecated -- legacy push-stream servers still speak SSE
      return new SSEClientTransport(binding.url, { eventSourceInit: { fetch: binding.fetch }, fetch: binding.fetch });
  }
}
