import { Mutex } from 'async-mutex';

import type { ToolDefinition, ToolProviderConfig } from '../types.js';
import type { ProviderConnection } from './types.js';

export const UNHEALTHY_FAILURE_THRESHOLD = 5;

export interface ProviderSessionSnapshot {
  providerName: string;
  transport: ToolProviderConfig['type'];
  lastUsedAt: number;
  consecutiveFailures: number;
  closed: boolean;
  toolCount: number;
}

/**
 * One live connection to one provider. Health fields are only ever mutated
 * under {@link ProviderSession.lock}; `closed` is terminal, a reconnect builds
 * a fresh session.
 */
export class ProviderSession {
  readonly providerName: string;
  readonly config: ToolProviderConfig;
  readonly connection: ProviderConnection;
  readonly tools: readonly ToolDefinition[];
  private readonly lock = new Mutex();
  private readonly now: () => number;
  private _lastUsedAt: number;
  private _consecutiveFailures = 0;
  private _closed = false;

  constructor(
    providerName: string,
    config: ToolProviderConfig,
    connection: ProviderConnection,
    tools: readonly ToolDefinition[],
    now: () => number = Date.now
  ) {
    this.providerName = providerName;
    this.config = config;
    this.connection = connection;
    this.tools = tools;
    this.now = now;
    this._lastUsedAt = now();
  }

  get closed(): boolean { return this._closed; }
  get lastUsedAt(): number { return this._lastUsedAt; }
  get consecutiveFailures(): number { return this._consecutiveFailures; }

  async recordSuccess(): Promise<void> {
    await this.lock.runExclusive(() => {
      this._consecutiveFailures = 0;
      this._lastUsedAt = this.now();
    });
  }

  // One call per exhausted invocation, never per attempt
  async recordFailure(): Promise<number> {
    return await this.lock.runExclusive(() => {
      this._consecutiveFailures += 1;
      return this._consecutiveFailures;
    });
  }

  async isHealthy(threshold = UNHEALTHY_FAILURE_THRESHOLD): Promise<boolean> {
    return await this.lock.runExclusive(() => !this._closed && this._consecutiveFailures < threshold);
  }

  /**
   * Flip the session to closed. Synchronous so the registry can drop index
   * entries in the same step; the connection teardown runs afterwards.
   * Returns false when the session was already closed.
   */
  markClosed(): boolean {
    if (this._closed) return false;
    this._closed = true;
    return true;
  }

  async close(): Promise<void> {
    this.markClosed();
    await this.connection.close();
  }

  snapshot(): ProviderSessionSnapshot {
    return {
      providerName: this.providerName,
      transport: this.config.type,
      lastUsedAt: this._lastUsedAt,
      consecutiveFailures: this._consecutiveFailures,
      closed: this._closed,
      toolCount: this.tools.length,
    };
  }
}
