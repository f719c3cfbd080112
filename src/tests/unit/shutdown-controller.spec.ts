import { describe, expect, it } from 'vitest';

import { ShutdownController } from '../../shutdown-controller.js';
import { collectLogs } from '../fixtures/fakes.js';

describe('ShutdownController', () => {
  it('runs tasks newest first and keeps going past a failing one', async () => {
    const order: string[] = [];
    const { entries, onLog } = collectLogs();
    const controller = new ShutdownController();
    controller.register('registry', () => { order.push('registry'); });
    controller.register('broken', () => Promise.reject(new Error('already gone')));
    controller.register('broadcast', async () => { await Promise.resolve(); order.push('broadcast'); });

    await controller.shutdown({ onLog });

    expect(order).toEqual(['broadcast', 'registry']);
    expect(entries.map((e) => [e.severity, e.remoteIdentifier, e.message])).toEqual([
      ['WRN', 'engine:shutdown', "shutdown task 'broken' failed: already gone"],
    ]);
  });

  it('runs only once and aborts its signal', async () => {
    let runs = 0;
    const controller = new ShutdownController();
    controller.register('count', () => { runs += 1; });

    expect(controller.isStopping()).toBe(false);
    await Promise.all([controller.shutdown(), controller.shutdown()]);
    await controller.shutdown();

    expect(runs).toBe(1);
    expect(controller.isStopping()).toBe(true);
    expect(controller.signal.aborted).toBe(true);
  });

  it('skips tasks that were unregistered', async () => {
    let ran = false;
    const controller = new ShutdownController();
    const unregister = controller.register('gone', () => { ran = true; });
    unregister();

    await controller.shutdown();

    expect(ran).toBe(false);
  });
});
