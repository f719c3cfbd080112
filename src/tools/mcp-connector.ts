import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';

import type { LogEntry, LogSink, ToolDefinition, ToolProviderConfig, ToolTransportType } from '../types.js';
import type { BindingContext } from './transport-binding.js';
import type { ConnectOptions, ProviderConnection, ProviderConnector, RequestDeadline, ToolCallOutcome } from './types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { errorMessage, isPlainObject, warn, withTimeout } from '../utils.js';
import { isProcessAlive, terminateProcessTree } from '../utils/process-tree.js';

import { ProviderConnectError } from './tool-errors.js';
import { createTransport, resolveTransportBinding } from './transport-binding.js';

const CLIENT_INFO = { name: 'tool-engine', version: '1.0.0' } as const;
const EMPTY_SCHEMA: Record<string, unknown> = { type: 'object', properties: {} };
// Hard stop on runaway pagination
const MAX_DISCOVERY_PAGES = 50;

/**
 * Connects MCP servers over the transport their configuration names and hands
 * back a {@link ProviderConnection}. Discovery is left to the caller so that it
 * can run under its own deadline.
 */
export class McpConnector implements ProviderConnector {
  private readonly bindingContext: Omit<BindingContext, 'proxyUrl'>;

  constructor(bindingContext: Omit<BindingContext, 'proxyUrl'> = {}) {
    this.bindingContext = bindingContext;
  }

  async connect(providerName: string, config: ToolProviderConfig, opts: ConnectOptions): Promise<ProviderConnection> {
    let transport: Transport;
    try {
      const binding = resolveTransportBinding(providerName, config, { ...this.bindingContext, proxyUrl: opts.proxyUrl });
      if (binding.kind !== 'stdio') {
        log(opts.onLog, 'TRC', `binding ${binding.kind} url=${binding.url.toString()} headers=[${binding.headerNames.join(',')}] proxied=${String(binding.proxied)}`, providerName);
      } else {
        log(opts.onLog, 'TRC', `binding stdio command=${binding.command} args=${String(binding.args.length)} proxied=${String(binding.proxied)}`, providerName);
      }
      transport = createTransport(providerName, binding, opts.onLog);
    } catch (e) {
      throw new ProviderConnectError(providerName, 'transport', e);
    }

    const client = new Client(CLIENT_INFO, { capabilities: {} });
    const started = Date.now();
    try {
      await withTimeout(client.connect(transport), opts.timeoutMs, `connect '${providerName}'`);
    } catch (e) {
      await closeQuietly(providerName, client, transport);
      throw new ProviderConnectError(providerName, 'connect', e);
    }
    const pid = transport instanceof StdioClientTransport ? transport.pid : null;
    log(opts.onLog, 'VRB', `connected in ${String(Date.now() - started)}ms`, providerName);
    return new McpConnection(providerName, config.type, client, transport, pid, opts.onLog);
  }
}

export class McpConnection implements ProviderConnection {
  readonly transport: ToolTransportType;
  readonly pid: number | null;
  private readonly providerName: string;
  private readonly client: Client;
  private readonly channel: Transport;
  private readonly onLog?: LogSink;
  private closing?: Promise<void>;

  constructor(providerName: string, transport: ToolTransportType, client: Client, channel: Transport, pid: number | null, onLog?: LogSink) {
    this.providerName = providerName;
    this.transport = transport;
    this.client = client;
    this.channel = channel;
    this.pid = pid;
    this.onLog = onLog;
  }

  async listTools(deadline: RequestDeadline): Promise<ToolDefinition[]> {
    const tools: ToolDefinition[] = [];
    let cursor: string | undefined;
    let pages = 0;
    // eslint-disable-next-line functional/no-loop-statements -- cursor pagination
    do {
      const page = await this.client.listTools(cursor !== undefined ? { cursor } : undefined, { timeout: deadline.timeoutMs, signal: deadline.signal });
      page.tools.forEach((t) => {
        tools.push({
          name: t.name,
          description: t.description ?? '',
          parameterSchema: normalizeSchema(t.inputSchema),
        });
      });
      cursor = typeof page.nextCursor === 'string' && page.nextCursor.length > 0 ? page.nextCursor : undefined;
      pages += 1;
    } while (cursor !== undefined && pages < MAX_DISCOVERY_PAGES);
    log(this.onLog, 'TRC', `listTools -> ${String(tools.length)} tools [${tools.map((t) => t.name).join(', ')}]`, this.providerName);
    return tools;
  }

  async callTool(name: string, args: Record<string, unknown>, deadline: RequestDeadline): Promise<ToolCallOutcome> {
    const res = await this.client.callTool({ name, arguments: args }, undefined, { timeout: deadline.timeoutMs, signal: deadline.signal });
    return normalizeToolResult(res);
  }

  close(): Promise<void> {
    this.closing ??= this.doClose();
    return this.closing;
  }

  private async doClose(): Promise<void> {
    await closeQuietly(this.providerName, this.client, this.channel);
    if (this.pid !== null && isProcessAlive(this.pid)) {
      const result = await terminateProcessTree(this.pid, { logger: (message) => { warn(`[mcp:${this.providerName}] ${message}`); } });
      log(this.onLog, 'VRB', `terminated process tree pid=${String(this.pid)} signalled=${String(result.signalled.length)} remaining=${String(result.stillRunning.length)}`, this.providerName);
    }
  }
}

export function normalizeSchema(schema: unknown): Record<string, unknown> {
  if (!isPlainObject(schema)) return { ...EMPTY_SCHEMA };
  const normalized: Record<string, unknown> = { ...schema };
  if (normalized.type === undefined) normalized.type = 'object';
  if (normalized.type === 'object' && !isPlainObject(normalized.properties)) normalized.properties = {};
  return normalized;
}

// Text parts are concatenated; anything else is reported as JSON so the model still sees it
export function normalizeToolResult(res: unknown): ToolCallOutcome {
  const isError = isPlainObject(res) && res.isError === true;
  const content = isPlainObject(res) ? res.content : undefined;
  if (typeof content === 'string') return { text: content, isError };
  if (Array.isArray(content)) {
    const texts = content
      .map((part: unknown) => (isPlainObject(part) && typeof part.text === 'string' ? part.text : undefined))
      .filter((t): t is string => typeof t === 'string');
    if (texts.length > 0) return { text: texts.join(''), isError };
  }
  if (isPlainObject(res) && res.toolResult !== undefined) {
    return { text: safeStringify(res.toolResult), isError };
  }
  return { text: safeStringify(content ?? res), isError };
}

function safeStringify(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? '';
  } catch {
    return '';
  }
}

async function closeQuietly(providerName: string, client: Client, transport: Transport): Promise<void> {
  try {
    await client.close();
  } catch (e) {
    warn(`[mcp:${providerName}] client close failed: ${errorMessage(e)}`);
    try {
      await transport.close();
    } catch (inner) {
      warn(`[mcp:${providerName}] transport close failed: ${errorMessage(inner)}`);
    }
  }
}

function log(onLog: LogSink | undefined, severity: LogEntry['severity'], message: string, providerName: string): void {
  if (onLog === undefined) return;
  try {
    onLog({ timestamp: Date.now(), severity, type: 'tool', remoteIdentifier: `mcp:${providerName}`, fatal: false, message });
  } catch (e) {
    warn(`log sink failed: ${errorMessage(e)}`);
  }
}
