import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import {
  buildConfiguration,
  isAllowed,
  loadConfiguration,
  normalizeMcpServer,
  parseConfigText,
  personaFor,
  platformPrompt,
  resolveConfigPath,
  userKeyOf,
} from '../../config.js';

const LEGACY_YAML = `
ai:
  base_url: https://llm.example.invalid/v1
  api_key: \${API_KEY}
  model: test-model
mcp_servers:
  search:
    type: streamable_http
    url: https://tools.example.invalid/mcp
    headers:
      Authorization: Bearer \${TOKEN}
    use_proxy: true
  files:
    command: [files-server, --root]
    environment:
      ROOT: /srv/files
allowed_users: ['7']
allowed_telegram: [42]
platform_prompts:
  Telegram: use Markdown
girlfriend:
  "telegram:42":
    name: Mia
    prompt: You are cheerful.
push:
  enabled: true
  time: "07:30"
  targets: ["telegram:42"]
  prompt: news please
`;

describe('buildConfiguration', () => {
  it('fills defaults for a minimal document', () => {
    const cfg = buildConfiguration({ ai: { baseUrl: 'http://llm.invalid/v1', model: 'm' } });
    expect(cfg.engine).toEqual({ maxIterations: 5, runTimeoutMs: 120_000 });
    expect(cfg.mcpServers).toEqual({});
    expect(cfg.allowed).toEqual({ users: [], platforms: {}, openPlatforms: [] });
    expect(cfg.broadcast).toBeUndefined();
    expect(cfg.logging.verbose).toBe(false);
  });

  it('reads the legacy snake_case layout', () => {
    const cfg = buildConfiguration(parseConfigText(LEGACY_YAML, 'legacy.yaml'), { env: { API_KEY: 'test-secret', TOKEN: 'test-token' } });

    expect(cfg.ai).toEqual({ baseUrl: 'https://llm.example.invalid/v1', apiKey: 'test-secret', model: 'test-model' });
    expect(cfg.mcpServers.search).toEqual({
      type: 'http',
      url: 'https://tools.example.invalid/mcp',
      headers: { Authorization: 'Bearer ${TOKEN}' },
      useProxy: true,
      enabled: true,
    });
    expect(cfg.mcpServers.files).toEqual({
      type: 'stdio',
      command: 'files-server',
      args: ['--root'],
      env: { ROOT: '/srv/files' },
      useProxy: false,
      enabled: true,
    });
    expect(cfg.allowed).toEqual({ users: ['7'], platforms: { telegram: ['42'] }, openPlatforms: [] });
    expect(cfg.platformPrompts).toEqual({ telegram: 'use Markdown' });
    expect(cfg.personas).toEqual({ 'telegram:42': { name: 'Mia', prompt: 'You are cheerful.' } });
    expect(cfg.broadcast).toEqual({ enabled: true, time: '07:30', targets: ['telegram:42'], prompt: 'news please', systemPrompt: '' });
  });

  it('reports every invalid provider with its path', () => {
    const build = () => buildConfiguration({
      ai: { baseUrl: 'http://llm.invalid/v1', model: 'm' },
      mcpServers: { local: { type: 'stdio' }, remote: { type: 'sse' } },
    }, { source: 'bad.json' });
    expect(build).toThrow('Configuration validation failed in bad.json:\n  mcpServers.local.command: stdio servers require a command\n  mcpServers.remote.url: sse servers require a url');
  });

  it('expands ${VAR} references outside provider headers and env', () => {
    const cfg = buildConfiguration(
      { ai: { baseUrl: '${BASE}/v1', model: 'm' }, proxy: { url: '${PROXY}' } },
      { env: { BASE: 'http://llm.invalid', PROXY: 'http://proxy.invalid:3128' } }
    );
    expect(cfg.ai.baseUrl).toBe('http://llm.invalid/v1');
    expect(cfg.proxy.url).toBe('http://proxy.invalid:3128');
  });
});

describe('normalizeMcpServer', () => {
  it('infers the transport from the url', () => {
    expect(normalizeMcpServer({ url: 'http://x.invalid/sse' })).toEqual({ url: 'http://x.invalid/sse', type: 'sse' });
    expect(normalizeMcpServer({ url: 'http://x.invalid/mcp' })).toEqual({ url: 'http://x.invalid/mcp', type: 'http' });
    expect(normalizeMcpServer({ command: 'srv' })).toEqual({ command: 'srv', type: 'stdio' });
  });

  it('puts command array tail ahead of explicit args', () => {
    expect(normalizeMcpServer({ type: 'STDIO', command: ['srv', '-v'], args: ['--port', 9] })).toEqual({
      type: 'stdio',
      command: 'srv',
      args: ['-v', '--port', '9'],
    });
  });
});

describe('access helpers', () => {
  const cfg = buildConfiguration({
    ai: { baseUrl: 'http://llm.invalid/v1', model: 'm' },
    allowed: { users: ['legacy'], platforms: { QQ: ['100'] }, allowAllPlatforms: ['Console'] },
    platformPrompts: { telegram: 'plain text only', qq: '' },
    personas: { 'qq:100': { name: 'Ana', prompt: 'Be warm.' } },
  });

  it('checks the platform list, then open platforms, then global users', () => {
    expect(isAllowed(cfg, 'qq', '100')).toBe(true);
    expect(isAllowed(cfg, 'QQ', '100')).toBe(true);
    expect(isAllowed(cfg, 'qq', '101')).toBe(false);
    expect(isAllowed(cfg, 'console', 'anyone')).toBe(true);
    expect(isAllowed(cfg, 'telegram', 'legacy')).toBe(true);
    expect(isAllowed(cfg, 'telegram', 'stranger')).toBe(false);
  });

  it('looks up platform prompts case-insensitively and ignores empty ones', () => {
    expect(platformPrompt(cfg, 'Telegram')).toBe('plain text only');
    expect(platformPrompt(cfg, 'qq')).toBeUndefined();
    expect(platformPrompt(cfg, 'discord')).toBeUndefined();
  });

  it('finds personas by platform:user key', () => {
    expect(userKeyOf('QQ', '100')).toBe('qq:100');
    expect(personaFor(cfg, userKeyOf('QQ', '100'))).toEqual({ name: 'Ana', prompt: 'Be warm.' });
    expect(personaFor(cfg, 'qq:101')).toBeUndefined();
  });

  it('matches personas whose configured platform is capitalised', () => {
    const mixed = buildConfiguration({
      ai: { baseUrl: 'http://llm.invalid/v1', model: 'm' },
      personas: { 'Telegram:42': { name: 'Mia', prompt: 'You are Mia.' }, 'QQ:Group:7': { name: 'Ana', prompt: 'Be warm.' } },
    });
    expect(Object.keys(mixed.personas)).toEqual(['telegram:42', 'qq:Group:7']);
    expect(personaFor(mixed, userKeyOf('telegram', '42'))?.name).toBe('Mia');
  });
});

describe('loadConfiguration', () => {
  const dirs: string[] = [];
  const tempDir = (): string => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tool-engine-config-'));
    dirs.push(dir);
    return dir;
  };

  afterEach(() => {
    dirs.splice(0).forEach((dir) => { fs.rmSync(dir, { recursive: true, force: true }); });
  });

  it('prefers a project file over the home file', () => {
    const cwd = tempDir();
    const home = tempDir();
    fs.writeFileSync(path.join(cwd, '.tool-engine.yaml'), 'ai:\n  base_url: http://project.invalid\n  model: p\n');
    fs.writeFileSync(path.join(home, '.tool-engine.json'), JSON.stringify({ ai: { baseUrl: 'http://home.invalid', model: 'h' } }));

    expect(resolveConfigPath(undefined, { cwd, home })).toBe(path.join(cwd, '.tool-engine.yaml'));
    expect(loadConfiguration(undefined, { cwd, home, env: {} }).ai.model).toBe('p');
  });

  it('falls back to the home file', () => {
    const cwd = tempDir();
    const home = tempDir();
    fs.writeFileSync(path.join(home, '.tool-engine.json'), JSON.stringify({ ai: { baseUrl: 'http://home.invalid', model: 'h' } }));
    expect(loadConfiguration(undefined, { cwd, home, env: {} }).ai.baseUrl).toBe('http://home.invalid');
  });

  it('fails when no file exists anywhere', () => {
    expect(() => resolveConfigPath(undefined, { cwd: tempDir(), home: tempDir() })).toThrow('Configuration file not found');
  });

  it('names the file when its JSON is broken', () => {
    const cwd = tempDir();
    const file = path.join(cwd, 'broken.json');
    fs.writeFileSync(file, '{ "ai": ');
    expect(() => loadConfiguration(file)).toThrow(`Invalid JSON in configuration file ${file}`);
  });
});
