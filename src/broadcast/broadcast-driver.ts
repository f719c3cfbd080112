import type { ConversationEngine } from '../conversation-loop.js';
import type { MessageDelivery } from '../delivery.js';
import type { AIConfig, BroadcastConfig, LogEntry, LogSink } from '../types.js';
import type { FireTime } from './schedule.js';

import { seedTranscript } from '../conversation-loop.js';
import { BROADCAST_SYSTEM_PROMPT } from '../prompts.js';
import { delay, errorMessage, warn } from '../utils.js';

import { nextFireTime, parseFireTime } from './schedule.js';

export const DEFAULT_GUARD_DELAY_MS = 60_000;

export interface BroadcastDriverOptions {
  engine: Pick<ConversationEngine, 'run'>;
  delivery: MessageDelivery;
  config: BroadcastConfig;
  modelConfig: AIConfig;
  onLog?: LogSink;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  guardDelayMs?: number;
  runTimeoutMs?: number;
}

export interface BroadcastOutcome {
  text: string;
  delivered: string[];
  failed: Record<string, string>;
}

/**
 * Daily broadcast loop: compute the next fire instant, wait for it, run one
 * conversation, deliver the answer, wait out the guard delay, repeat.
 */
export class BroadcastDriver {
  private readonly opts: BroadcastDriverOptions;
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private controller?: AbortController;
  private loopPromise?: Promise<void>;

  constructor(opts: BroadcastDriverOptions) {
    this.opts = opts;
    this.now = opts.now ?? (() => new Date());
    this.sleep = opts.sleep ?? delay;
  }

  get running(): boolean {
    return this.loopPromise !== undefined;
  }

  // Resolves when the loop ends: after stop(), or straight away on a bad fire time
  start(): Promise<void> {
    if (this.loopPromise !== undefined) return this.loopPromise;
    const controller = new AbortController();
    this.controller = controller;
    this.loopPromise = this.loop(controller.signal).finally(() => {
      this.loopPromise = undefined;
      this.controller = undefined;
    });
    return this.loopPromise;
  }

  stop(): void {
    this.controller?.abort(new Error('broadcast stopped'));
  }

  async runOnce(signal?: AbortSignal): Promise<BroadcastOutcome> {
    const { config } = this.opts;
    this.log('VRB', `firing broadcast to ${String(config.targets.length)} target(s)`);
    const result = await this.opts.engine.run(
      seedTranscript(config.systemPrompt.length > 0 ? config.systemPrompt : BROADCAST_SYSTEM_PROMPT, config.prompt),
      { modelConfig: this.opts.modelConfig, label: 'broadcast', signal, timeoutMs: this.opts.runTimeoutMs }
    );
    const outcome: BroadcastOutcome = { text: result.text, delivered: [], failed: {} };
    if (result.text.trim().length === 0) {
      this.log('WRN', 'broadcast produced no content; nothing delivered');
      return outcome;
    }
    // eslint-disable-next-line functional/no-loop-statements -- one target at a time
    for (const target of config.targets) {
      try {
        await this.opts.delivery.deliver(target, result.text);
        outcome.delivered.push(target);
      } catch (e) {
        outcome.failed[target] = errorMessage(e);
        this.log('ERR', `delivery to '${target}' failed: ${errorMessage(e)}`);
      }
    }
    this.log('VRB', `broadcast delivered to ${String(outcome.delivered.length)}/${String(config.targets.length)} target(s)`);
    return outcome;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    let fireTime: FireTime;
    try {
      fireTime = parseFireTime(this.opts.config.time);
    } catch (e) {
      this.log('ERR', `${errorMessage(e)}; broadcast driver not started`, true);
      return;
    }
    const guardDelayMs = this.opts.guardDelayMs ?? DEFAULT_GUARD_DELAY_MS;

    // eslint-disable-next-line functional/no-loop-statements -- compute, wait, fire, repeat
    while (!signal.aborted) {
      const now = this.now();
      const next = nextFireTime(now, fireTime);
      const waitMs = next.getTime() - now.getTime();
      this.log('VRB', `next broadcast at ${next.toISOString()} (in ${String(Math.round(waitMs / 1000))}s)`);
      if (!(await this.wait(waitMs, signal))) break;

      try {
        await this.runOnce(signal);
      } catch (e) {
        if (signal.aborted) break;
        this.log('ERR', `broadcast run failed: ${errorMessage(e)}`);
      }

      if (!(await this.wait(guardDelayMs, signal))) break;
    }
    this.log('VRB', 'broadcast driver stopped');
  }

  // false when the wait was cut short by stop()
  private async wait(ms: number, signal: AbortSignal): Promise<boolean> {
    try {
      await this.sleep(ms, signal);
    } catch (e) {
      if (signal.aborted) return false;
      throw e;
    }
    return !signal.aborted;
  }

  private log(severity: LogEntry['severity'], message: string, fatal = false): void {
    const sink = this.opts.onLog;
    if (sink === undefined) return;
    try {
      sink({ timestamp: Date.now(), severity, type: 'broadcast', remoteIdentifier: 'broadcast:daily', fatal, message });
    } catch (e) {
      warn(`log sink failed: ${errorMessage(e)}`);
    }
  }
}
