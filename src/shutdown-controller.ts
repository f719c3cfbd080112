import type { LogSink } from './types.js';

import { errorMessage } from './utils.js';

export type ShutdownTask = () => Promise<void> | void;

/**
 * Collects cleanup tasks (registry teardown, broadcast stop, ...) and runs them
 * once, newest first, when the process is asked to stop.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private stopping = false;
  private shutdownPromise?: Promise<void>;

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public isStopping(): boolean {
    return this.stopping;
  }

  public register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  public async shutdown(opts: { onLog?: LogSink } = {}): Promise<void> {
    this.shutdownPromise ??= this.performShutdown(opts);
    await this.shutdownPromise;
  }

  private async performShutdown(opts: { onLog?: LogSink }): Promise<void> {
    this.stopping = true;
    this.abortController.abort(new Error('shutting down'));
    const entries = Array.from(this.tasks.entries()).reverse();
    // eslint-disable-next-line functional/no-loop-statements -- ordered cleanup matters
    for (const [name, task] of entries) {
      try {
        await task();
      } catch (error) {
        opts.onLog?.({
          timestamp: Date.now(),
          severity: 'WRN',
          type: 'engine',
          remoteIdentifier: 'engine:shutdown',
          fatal: false,
          message: `shutdown task '${name}' failed: ${errorMessage(error)}`,
        });
      }
    }
  }
}
