import os from 'node:os';
import path from 'node:path';

import type { UserConfigStore } from './user-config-store.js';
import type { Configuration, LogSink } from './types.js';
import type { ProviderConnector } from './tools/types.js';
import type { ModelEndpoint } from './llm-providers/base.js';

import { BroadcastDriver } from './broadcast/broadcast-driver.js';
import { ChatCommandRouter } from './chat-command-router.js';
import { ConversationEngine } from './conversation-loop.js';
import { ConsoleSender, DeliveryRouter } from './delivery.js';
import { OpenAICompatibleEndpoint } from './llm-providers/openai-compatible.js';
import { ShutdownController } from './shutdown-controller.js';
import { McpConnector } from './tools/mcp-connector.js';
import { SessionRegistry } from './tools/session-registry.js';
import { JsonFileUserConfigStore } from './user-config-store.js';

export interface Runtime {
  config: Configuration;
  registry: SessionRegistry;
  engine: ConversationEngine;
  delivery: DeliveryRouter;
  store: UserConfigStore;
  router: ChatCommandRouter;
  broadcast?: BroadcastDriver;
  shutdown: ShutdownController;
}

export interface RuntimeOverrides {
  connector?: ProviderConnector;
  endpoint?: ModelEndpoint;
  store?: UserConfigStore;
  write?: (s: string) => void;
}

export const defaultUserConfigPath = (): string => path.join(os.homedir(), '.tool-engine', 'users.json');

/**
 * Wire the engine together from a loaded configuration. Nothing connects
 * until `registry.connectAll` is called.
 */
export function createRuntime(config: Configuration, onLog: LogSink, overrides: RuntimeOverrides = {}): Runtime {
  const registry = new SessionRegistry(overrides.connector ?? new McpConnector(), {
    proxyUrl: config.proxy.url,
    onLog,
  });
  const endpoint = overrides.endpoint ?? new OpenAICompatibleEndpoint({ onLog });
  const engine = new ConversationEngine(endpoint, registry, {
    onLog,
    maxIterations: config.engine.maxIterations,
    runTimeoutMs: config.engine.runTimeoutMs,
  });
  const delivery = new DeliveryRouter({ onLog }).register('console', new ConsoleSender(overrides.write));
  const store = overrides.store ?? new JsonFileUserConfigStore(config.storage.userConfigFile ?? defaultUserConfigPath());
  const router = new ChatCommandRouter({ config, engine, store, onLog });
  const broadcast = config.broadcast !== undefined
    ? new BroadcastDriver({ engine, delivery, config: config.broadcast, modelConfig: config.ai, onLog })
    : undefined;

  const shutdown = new ShutdownController();
  // tasks run newest first: the broadcast loop stops before providers go away
  shutdown.register('registry', async () => { await registry.closeAll(); });
  if (broadcast !== undefined) shutdown.register('broadcast', () => { broadcast.stop(); });

  return { config, registry, engine, delivery, store, router, broadcast, shutdown };
}
