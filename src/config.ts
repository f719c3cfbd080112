import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import yaml from 'js-yaml';
import { z } from 'zod';

import type { Configuration, PersonaConfig, ToolProviderConfig } from './types.js';

import { DEFAULT_MAX_ITERATIONS, DEFAULT_RUN_TIMEOUT_MS } from './conversation-loop.js';
import { isPlainObject } from './utils.js';

const AIConfigSchema = z.object({
  provider: z.string().optional(),
  baseUrl: z.string().min(1),
  apiKey: z.string().optional(),
  model: z.string().min(1),
  defaultPrompt: z.string().optional(),
});

const MCPServerConfigSchema = z.object({
  type: z.enum(['http', 'sse', 'stdio']),
  url: z.string().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
  useProxy: z.boolean().default(false),
  enabled: z.boolean().default(true),
}).superRefine((srv, ctx) => {
  if (srv.type === 'stdio' && (srv.command === undefined || srv.command.length === 0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: 'stdio servers require a command' });
  }
  if (srv.type !== 'stdio' && (srv.url === undefined || srv.url.length === 0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: `${srv.type} servers require a url` });
  }
});

const BroadcastConfigSchema = z.object({
  enabled: z.boolean().default(false),
  time: z.string().default('08:00'),
  targets: z.array(z.string()).default([]),
  prompt: z.string().default(''),
  systemPrompt: z.string().default(''),
});

const ConfigurationSchema = z.object({
  ai: AIConfigSchema,
  proxy: z.object({ url: z.string().optional() }).default({}),
  mcpServers: z.record(z.string(), MCPServerConfigSchema).default({}),
  allowed: z.object({
    // numeric ids from YAML are compared as strings
    users: z.array(z.coerce.string()).default([]),
    platforms: z.record(z.string(), z.array(z.coerce.string())).default({}),
    allowAllPlatforms: z.array(z.string()).default([]),
  }).default({}),
  platformPrompts: z.record(z.string(), z.string()).default({}),
  personas: z.record(z.string(), z.object({ name: z.string().default(''), prompt: z.string() })).default({}),
  broadcast: BroadcastConfigSchema.optional(),
  engine: z.object({
    maxIterations: z.number().int().default(DEFAULT_MAX_ITERATIONS),
    runTimeoutMs: z.number().int().nonnegative().default(DEFAULT_RUN_TIMEOUT_MS),
  }).default({}),
  storage: z.object({ userConfigFile: z.string().optional() }).default({}),
  logging: z.object({
    format: z.enum(['logfmt', 'json', 'console']).optional(),
    verbose: z.boolean().default(false),
  }).default({}),
});

// Older YAML files used snake_case keys and different section names
const KEY_ALIASES: Record<string, string> = {
  base_url: 'baseUrl',
  api_key: 'apiKey',
  default_prompt: 'defaultPrompt',
  platform_prompts: 'platformPrompts',
  mcp_servers: 'mcpServers',
  use_proxy: 'useProxy',
  system_prompt: 'systemPrompt',
  user_config_file: 'userConfigFile',
  max_iterations: 'maxIterations',
  run_timeout_ms: 'runTimeoutMs',
  allow_all_platforms: 'allowAllPlatforms',
  push: 'broadcast',
  girlfriend: 'personas',
};

const CONFIG_CANDIDATES = ['.tool-engine.json', '.tool-engine.yaml', '.tool-engine.yml'];

function expandEnv(str: string, env: NodeJS.ProcessEnv): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (env[name] ?? ''));
}

// headers and env of MCP servers stay literal here; they are expanded at use time
export function expandDeep(obj: unknown, env: NodeJS.ProcessEnv = process.env, chain: string[] = []): unknown {
  if (typeof obj === 'string') {
    if (chain.includes('mcpServers') && (chain.includes('env') || chain.includes('headers'))) return obj;
    return expandEnv(obj, env);
  }
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env, chain));
  if (isPlainObject(obj)) {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env, [...chain, k]);
      return acc;
    }, {});
  }
  return obj;
}

function renameKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map((v) => renameKeys(v));
  if (!isPlainObject(obj)) return obj;
  return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
    // record keys (server names, header names, env names) are user data, not schema keys
    const isDataMap = ['headers', 'env', 'mcpServers', 'mcp_servers', 'platformPrompts', 'platform_prompts', 'personas', 'girlfriend', 'platforms'].includes(k);
    const key = KEY_ALIASES[k] ?? k;
    acc[key] = isDataMap && isPlainObject(v)
      ? Object.fromEntries(Object.entries(v).map(([name, inner]) => [name, renameKeys(inner)]))
      : renameKeys(v);
    return acc;
  }, {});
}

export function normalizeMcpServer(srv: unknown): unknown {
  if (!isPlainObject(srv)) return srv;
  const out: Record<string, unknown> = { ...srv };
  const typeVal = typeof srv.type === 'string' ? srv.type.toLowerCase() : undefined;
  if (typeVal === 'streamable_http' || typeVal === 'streamablehttp' || typeVal === 'streamable-http') out.type = 'http';
  else if (typeVal !== undefined) out.type = typeVal;
  if (out.type === undefined) {
    const url = srv.url;
    if (typeof url === 'string' && url.length > 0) out.type = url.includes('/sse') ? 'sse' : 'http';
    else out.type = 'stdio';
  }
  const cmd = srv.command;
  if (Array.isArray(cmd) && cmd.length > 0) {
    const existingArgs = Array.isArray(srv.args) ? srv.args.map((a: unknown) => String(a)) : [];
    out.command = String(cmd[0]);
    out.args = [...cmd.slice(1).map((a: unknown) => String(a)), ...existingArgs];
  }
  if (srv.environment !== undefined && srv.env === undefined) {
    out.env = srv.environment;
    delete out.environment;
  }
  return out;
}

// Legacy flat allow-lists: allowed_users, allowed_<platform>
function normalizeAllowLists(root: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...root };
  const allowed: Record<string, unknown> = isPlainObject(root.allowed) ? { ...root.allowed } : {};
  const platforms: Record<string, unknown> = isPlainObject(allowed.platforms) ? { ...allowed.platforms } : {};
  let touched = root.allowed !== undefined;
  Object.entries(root).forEach(([key, value]) => {
    if (key === 'allowed_users' || key === 'allowedUsers') {
      allowed.users = value;
      delete out[key];
      touched = true;
      return;
    }
    const match = /^allowed_(\w+)$/.exec(key);
    if (match !== null) {
      platforms[match[1].toLowerCase()] = value;
      delete out[key];
      touched = true;
    }
  });
  if (touched) out.allowed = { ...allowed, platforms };
  return out;
}

export function normalizeRawConfig(raw: unknown): unknown {
  const renamed = renameKeys(raw);
  if (!isPlainObject(renamed)) return renamed;
  const root = normalizeAllowLists(renamed);
  if (isPlainObject(root.mcpServers)) {
    root.mcpServers = Object.fromEntries(Object.entries(root.mcpServers).map(([name, srv]) => [name, normalizeMcpServer(srv)]));
  }
  if (isPlainObject(root.platformPrompts)) {
    root.platformPrompts = Object.fromEntries(Object.entries(root.platformPrompts).map(([platform, prompt]) => [platform.toLowerCase(), prompt]));
  }
  if (isPlainObject(root.personas)) {
    root.personas = Object.fromEntries(Object.entries(root.personas).map(([key, persona]) => [normalizeUserKey(key), persona]));
  }
  return root;
}

// 'Telegram:42' -> 'telegram:42'; only the platform part is case-insensitive
function normalizeUserKey(key: string): string {
  const idx = key.indexOf(':');
  return idx === -1 ? key : userKeyOf(key.slice(0, idx), key.slice(idx + 1));
}

export function buildConfiguration(raw: unknown, opts: { env?: NodeJS.ProcessEnv; source?: string } = {}): Configuration {
  const source = opts.source ?? '<inline>';
  // aliases resolved before expansion
  const normalized = normalizeRawConfig(expandDeep(renameKeys(raw), opts.env ?? process.env));
  const parsed = ConfigurationSchema.safeParse(normalized);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  const cfg = parsed.data;
  const mcpServers: Record<string, ToolProviderConfig> = Object.fromEntries(
    Object.entries(cfg.mcpServers).map(([name, srv]) => [name, { ...srv }])
  );
  const platforms: Record<string, string[]> = Object.fromEntries(
    Object.entries(cfg.allowed.platforms).map(([platform, ids]) => [platform.toLowerCase(), ids])
  );
  return {
    ai: cfg.ai,
    proxy: cfg.proxy,
    mcpServers,
    allowed: {
      users: cfg.allowed.users,
      platforms,
      openPlatforms: cfg.allowed.allowAllPlatforms.map((p) => p.toLowerCase()),
    },
    platformPrompts: cfg.platformPrompts,
    personas: cfg.personas,
    broadcast: cfg.broadcast,
    engine: cfg.engine,
    storage: cfg.storage,
    logging: cfg.logging,
  };
}

export function parseConfigText(raw: string, source: string): unknown {
  const ext = path.extname(source).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    try {
      return yaml.load(raw);
    } catch (e) {
      throw new Error(`Invalid YAML in configuration file ${source}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in configuration file ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function resolveConfigPath(configPath?: string, opts: { cwd?: string; home?: string } = {}): string {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new Error(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const cwd = opts.cwd ?? process.cwd();
  const local = CONFIG_CANDIDATES.map((name) => path.join(cwd, name)).find((candidate) => fs.existsSync(candidate));
  if (local !== undefined) return local;
  const home = path.join(opts.home ?? os.homedir(), '.tool-engine.json');
  if (fs.existsSync(home)) return home;
  throw new Error('Configuration file not found. Create .tool-engine.json or .tool-engine.yaml, or pass --config');
}

export function loadConfiguration(configPath?: string, opts: { env?: NodeJS.ProcessEnv; cwd?: string; home?: string } = {}): Configuration {
  const resolved = resolveConfigPath(configPath, opts);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new Error(`Failed to read configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return buildConfiguration(parseConfigText(raw, resolved), { env: opts.env, source: resolved });
}

/**
 * Whether a sender may talk to the bot: the platform's own list first, then
 * platforms open to everyone, then the legacy global list.
 */
export function isAllowed(cfg: Configuration, platform: string, userId: string): boolean {
  const key = platform.toLowerCase();
  if ((cfg.allowed.platforms[key] ?? []).includes(userId)) return true;
  if (cfg.allowed.openPlatforms.includes(key)) return true;
  return cfg.allowed.users.includes(userId);
}

export function platformPrompt(cfg: Configuration, platform: string): string | undefined {
  const prompt = cfg.platformPrompts[platform.toLowerCase()];
  return typeof prompt === 'string' && prompt.length > 0 ? prompt : undefined;
}

export function personaFor(cfg: Configuration, userKey: string): PersonaConfig | undefined {
  return cfg.personas[userKey];
}

export const userKeyOf = (platform: string, userId: string): string => `${platform.toLowerCase()}:${userId}`;
