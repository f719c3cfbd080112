import { Mutex } from 'async-mutex';

import type { LogEntry, LogSink, ToolDefinition, ToolProviderConfig } from '../types.js';
import type { InvocationOptions } from './invocation-pipeline.js';
import type { ProviderSessionSnapshot } from './provider-session.js';
import type { ProviderConnector } from './types.js';

import { errorMessage, warn, withTimeout } from '../utils.js';

import { invokeWithRetry } from './invocation-pipeline.js';
import { ProviderSession, UNHEALTHY_FAILURE_THRESHOLD } from './provider-session.js';
import { ProviderConnectError, ToolInvocationError } from './tool-errors.js';

export const DEFAULT_CONNECT_TIMEOUT_MS = 15_000;
export const DEFAULT_DISCOVERY_TIMEOUT_MS = 10_000;

export interface SessionRegistryOptions {
  proxyUrl?: string;
  onLog?: LogSink;
  connectTimeoutMs?: number;
  discoveryTimeoutMs?: number;
  healthThreshold?: number;
  invocation?: Omit<InvocationOptions, 'signal' | 'onLog'>;
  now?: () => number;
}

export interface ConnectSummary {
  connected: string[];
  failed: Record<string, string>;
}

interface CatalogSnapshot {
  tools: readonly ToolDefinition[];
  index: ReadonlyMap<string, ProviderSession>;
}

const EMPTY_CATALOG: CatalogSnapshot = { tools: Object.freeze([]), index: new Map() };

/**
 * Owns every provider session and the merged tool catalog. Readers work off
 * immutable snapshots and never wait; `connectAll`/`closeAll` are serialised
 * and publish a fresh snapshot when they are done.
 */
export class SessionRegistry {
  private readonly connector: ProviderConnector;
  private readonly opts: SessionRegistryOptions;
  private readonly writeLock = new Mutex();
  // Discovery order; later entries win on tool name collisions
  private sessions: readonly ProviderSession[] = [];
  private catalog: CatalogSnapshot = EMPTY_CATALOG;
  // tool name -> provider, for names whose session has been shut down
  private retired = new Map<string, string>();
  private failedProviders = new Map<string, string>();

  constructor(connector: ProviderConnector, opts: SessionRegistryOptions = {}) {
    this.connector = connector;
    this.opts = opts;
  }

  async connectAll(configs: Record<string, ToolProviderConfig>): Promise<ConnectSummary> {
    return await this.writeLock.runExclusive(async () => {
      const enabled = Object.entries(configs).filter(([name, cfg]) => {
        if (!cfg.enabled) this.log('VRB', `skipping disabled provider`, `mcp:${name}`);
        return cfg.enabled;
      });

      const replaced = this.sessions.filter((s) => enabled.some(([name]) => name === s.providerName));
      if (replaced.length > 0) {
        this.retire(replaced);
        await this.closeConnections(replaced);
      }

      const summary: ConnectSummary = { connected: [], failed: {} };
      const discovered: ProviderSession[] = [];
      await Promise.all(enabled.map(async ([name, cfg]) => {
        try {
          const session = await this.connectOne(name, cfg);
          discovered.push(session);
          summary.connected.push(name);
          this.failedProviders.delete(name);
        } catch (e) {
          const message = errorMessage(e);
          summary.failed[name] = message;
          this.failedProviders.set(name, message);
          this.log('ERR', message, `mcp:${name}`);
        }
      }));

      this.sessions = [...this.sessions, ...discovered];
      discovered.forEach((session) => {
        session.tools.forEach((tool) => { this.retired.delete(tool.name); });
      });
      this.publish(new Set(discovered));
      this.log('VRB', `catalog ready: ${String(this.catalog.tools.length)} tools from ${String(this.sessions.length)} providers (${String(Object.keys(summary.failed).length)} failed)`, 'mcp:registry');
      return summary;
    });
  }

  listTools(): readonly ToolDefinition[] {
    return this.catalog.tools;
  }

  async callTool(name: string, args: Record<string, unknown>, opts: { signal?: AbortSignal } = {}): Promise<string> {
    const session = this.catalog.index.get(name);
    if (session === undefined) {
      const provider = this.retired.get(name);
      if (provider !== undefined) {
        throw new ToolInvocationError('session_closed', name, `provider '${provider}' is closed`, { providerName: provider });
      }
      throw new ToolInvocationError('unknown_tool', name, `unknown tool '${name}'`);
    }
    return await invokeWithRetry(session, name, args, { ...this.opts.invocation, signal: opts.signal, onLog: this.opts.onLog });
  }

  async healthCheck(): Promise<Record<string, boolean>> {
    const threshold = this.opts.healthThreshold ?? UNHEALTHY_FAILURE_THRESHOLD;
    const report: Record<string, boolean> = {};
    this.failedProviders.forEach((_message, name) => { report[name] = false; });
    const sessions = this.sessions;
    const states = await Promise.all(sessions.map(async (s) => await s.isHealthy(threshold)));
    sessions.forEach((s, i) => { report[s.providerName] = states[i] ?? false; });
    return report;
  }

  sessionSnapshots(): ProviderSessionSnapshot[] {
    return this.sessions.map((s) => s.snapshot());
  }

  connectFailures(): Record<string, string> {
    return Object.fromEntries(this.failedProviders);
  }

  async closeAll(): Promise<void> {
    await this.writeLock.runExclusive(async () => {
      const closing = this.sessions;
      if (closing.length === 0) return;
      this.retire(closing);
      await this.closeConnections(closing);
      this.log('VRB', `closed ${String(closing.length)} providers`, 'mcp:registry');
    });
  }

  private async connectOne(name: string, cfg: ToolProviderConfig): Promise<ProviderSession> {
    const connection = await this.connector.connect(name, cfg, {
      timeoutMs: this.opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      proxyUrl: this.opts.proxyUrl,
      onLog: this.opts.onLog,
    });
    const discoveryTimeoutMs = this.opts.discoveryTimeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
    let tools: ToolDefinition[];
    try {
      tools = await withTimeout(connection.listTools({ timeoutMs: discoveryTimeoutMs }), discoveryTimeoutMs, `discovery '${name}'`);
    } catch (e) {
      try {
        await connection.close();
      } catch (closeErr) {
        warn(`[mcp:${name}] close after failed discovery: ${errorMessage(closeErr)}`);
      }
      throw new ProviderConnectError(name, 'discovery', e);
    }
    this.log('VRB', `discovered ${String(tools.length)} tools over ${connection.transport}`, `mcp:${name}`);
    return new ProviderSession(name, cfg, connection, Object.freeze([...tools]), this.opts.now);
  }

  // Flips `closed` and drops the sessions from the index in one synchronous step
  private retire(targets: readonly ProviderSession[]): void {
    targets.forEach((session) => {
      session.markClosed();
      session.tools.forEach((tool) => {
        if (this.catalog.index.get(tool.name) === session) this.retired.set(tool.name, session.providerName);
      });
    });
    this.sessions = this.sessions.filter((s) => !targets.includes(s));
    this.publish();
  }

  private async closeConnections(targets: readonly ProviderSession[]): Promise<void> {
    const results = await Promise.allSettled(targets.map(async (s) => { await s.close(); }));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        this.log('WRN', `close failed: ${errorMessage(r.reason)}`, `mcp:${targets[i]?.providerName ?? 'unknown'}`);
      }
    });
  }

  private publish(fresh: ReadonlySet<ProviderSession> = new Set()): void {
    const index = new Map<string, ProviderSession>();
    const byName = new Map<string, ToolDefinition>();
    this.sessions.forEach((session) => {
      session.tools.forEach((tool) => {
        const previous = index.get(tool.name);
        if (previous !== undefined && previous !== session && fresh.has(session)) {
          this.log('WRN', `tool '${tool.name}' from '${session.providerName}' replaces the one from '${previous.providerName}'`, `mcp:${session.providerName}`);
        }
        index.set(tool.name, session);
        byName.set(tool.name, tool);
      });
    });
    this.catalog = { tools: Object.freeze([...byName.values()]), index };
  }

  private log(severity: LogEntry['severity'], message: string, remoteIdentifier: string): void {
    const sink = this.opts.onLog;
    if (sink === undefined) return;
    try {
      sink({ timestamp: Date.now(), severity, type: 'tool', remoteIdentifier, fatal: false, message });
    } catch (e) {
      warn(`log sink failed: ${errorMessage(e)}`);
    }
  }
}
