import { describe, expect, it } from 'vitest';

import type { PlatformSender } from '../../delivery.js';

import { ConsoleSender, DeliveryError, DeliveryRouter, parseDeliveryTarget } from '../../delivery.js';

class RecordingSender implements PlatformSender {
  readonly sent: [string, string][] = [];

  send(recipient: string, text: string): Promise<void> {
    this.sent.push([recipient, text]);
    return Promise.resolve();
  }
}

describe('parseDeliveryTarget', () => {
  it('splits on the first colon only', () => {
    expect(parseDeliveryTarget('qq:group:456')).toEqual({ platform: 'qq', recipient: 'group:456' });
    expect(parseDeliveryTarget('Telegram:123')).toEqual({ platform: 'telegram', recipient: '123' });
  });

  it('rejects targets without a platform or recipient', () => {
    expect(() => parseDeliveryTarget('123')).toThrow(DeliveryError);
    expect(() => parseDeliveryTarget(':123')).toThrow("invalid delivery target ':123', expected platform:recipient");
    expect(() => parseDeliveryTarget('qq:')).toThrow("invalid delivery target 'qq:', expected platform:recipient");
  });
});

describe('DeliveryRouter', () => {
  it('hands the recipient to the sender registered for the platform', async () => {
    const telegram = new RecordingSender();
    const router = new DeliveryRouter().register('Telegram', telegram);

    await router.deliver('telegram:123', 'hello');

    expect(telegram.sent).toEqual([['123', 'hello']]);
    expect(router.platforms()).toEqual(['telegram']);
  });

  it('fails for a platform nobody registered', async () => {
    const router = new DeliveryRouter();
    await expect(router.deliver('discord:1', 'x')).rejects.toThrow("no sender registered for platform 'discord'");
  });

  it('wraps sender failures with the target', async () => {
    const router = new DeliveryRouter().register('qq', { send: () => Promise.reject(new Error('429 too many requests')) });

    let caught: unknown;
    try {
      await router.deliver('qq:group:9', 'x');
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(DeliveryError);
    if (!(caught instanceof DeliveryError)) return;
    expect(caught.target).toBe('qq:group:9');
    expect(caught.message).toBe("delivery to 'qq:group:9' failed: 429 too many requests");
  });
});

describe('ConsoleSender', () => {
  it('prints the recipient header and the text', async () => {
    const out: string[] = [];
    await new ConsoleSender((s) => { out.push(s); }).send('ops', 'all good');
    expect(out).toEqual(['--- ops ---\nall good\n']);
  });
});
