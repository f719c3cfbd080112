import fs from 'node:fs';
import path from 'node:path';

import { Mutex } from 'async-mutex';
import { z } from 'zod';

import type { AIConfig } from './types.js';

// Keyed by `platform:userId`
export interface UserConfigStore {
  getOverride(key: string): Promise<AIConfig | undefined>;
  setOverride(key: string, cfg: AIConfig): Promise<void>;
  clearOverride(key: string): Promise<void>;
}

const StoredAIConfigSchema = z.object({
  provider: z.string().optional(),
  baseUrl: z.string(),
  apiKey: z.string().optional(),
  model: z.string(),
  defaultPrompt: z.string().optional(),
});

const StoreFileSchema = z.object({
  version: z.literal(1).default(1),
  users: z.record(z.string(), z.object({ overrideAi: StoredAIConfigSchema.optional() })).default({}),
});

type StoreFile = z.infer<typeof StoreFileSchema>;

export class MemoryUserConfigStore implements UserConfigStore {
  private readonly overrides = new Map<string, AIConfig>();

  getOverride(key: string): Promise<AIConfig | undefined> {
    const cfg = this.overrides.get(key);
    return Promise.resolve(cfg !== undefined ? { ...cfg } : undefined);
  }

  setOverride(key: string, cfg: AIConfig): Promise<void> {
    this.overrides.set(key, { ...cfg });
    return Promise.resolve();
  }

  clearOverride(key: string): Promise<void> {
    this.overrides.delete(key);
    return Promise.resolve();
  }
}

/**
 * Overrides persisted as one JSON document. Every mutation rewrites the whole
 * file through a temp file and a rename, so readers never see a torn write.
 */
export class JsonFileUserConfigStore implements UserConfigStore {
  private readonly filePath: string;
  private readonly lock = new Mutex();
  private cache?: StoreFile;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async getOverride(key: string): Promise<AIConfig | undefined> {
    const data = await this.lock.runExclusive(async () => await this.load());
    const cfg = data.users[key]?.overrideAi;
    return cfg !== undefined ? { ...cfg } : undefined;
  }

  async setOverride(key: string, cfg: AIConfig): Promise<void> {
    await this.lock.runExclusive(async () => {
      const data = await this.load();
      const next: StoreFile = { ...data, users: { ...data.users, [key]: { overrideAi: { ...cfg } } } };
      await this.persist(next);
    });
  }

  async clearOverride(key: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      const data = await this.load();
      if (data.users[key] === undefined) return;
      const users = { ...data.users };
      delete users[key];
      await this.persist({ ...data, users });
    });
  }

  private async load(): Promise<StoreFile> {
    if (this.cache !== undefined) return this.cache;
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
        this.cache = { version: 1, users: {} };
        return this.cache;
      }
      throw e;
    }
    if (raw.trim().length === 0) {
      this.cache = { version: 1, users: {} };
      return this.cache;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new Error(`Invalid JSON in user config store ${this.filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
    const parsed = StoreFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`User config store ${this.filePath} is malformed: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    this.cache = parsed.data;
    return this.cache;
  }

  private async persist(data: StoreFile): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.promises.mkdir(dir, { recursive: true });
    const tmp = `${this.filePath}.tmp-${String(process.pid)}-${String(Date.now())}`;
    try {
      await fs.promises.writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
      await fs.promises.rename(tmp, this.filePath);
    } catch (e) {
      await fs.promises.rm(tmp, { force: true });
      throw e;
    }
    this.cache = data;
  }
}
