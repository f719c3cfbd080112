import type { LogEntry, LogSink } from './types.js';

import { errorMessage, warn } from './utils.js';

export interface DeliveryTarget {
  platform: string;
  recipient: string;
}

export interface PlatformSender {
  send(recipient: string, text: string): Promise<void>;
}

// `target` is `platform:recipient`
export interface MessageDelivery {
  deliver(target: string, text: string): Promise<void>;
}

export class DeliveryError extends Error {
  readonly target: string;

  constructor(target: string, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'DeliveryError';
    this.target = target;
  }
}

// Splits on the first colon only: 'qq:group:456' is platform 'qq', recipient 'group:456'
export function parseDeliveryTarget(target: string): DeliveryTarget {
  const idx = target.indexOf(':');
  const platform = idx > 0 ? target.slice(0, idx).trim().toLowerCase() : '';
  const recipient = idx > 0 ? target.slice(idx + 1).trim() : '';
  if (platform.length === 0 || recipient.length === 0) {
    throw new DeliveryError(target, `invalid delivery target '${target}', expected platform:recipient`);
  }
  return { platform, recipient };
}

export class DeliveryRouter implements MessageDelivery {
  private readonly senders = new Map<string, PlatformSender>();
  private readonly onLog?: LogSink;

  constructor(opts: { onLog?: LogSink } = {}) {
    this.onLog = opts.onLog;
  }

  register(platform: string, sender: PlatformSender): this {
    this.senders.set(platform.toLowerCase(), sender);
    return this;
  }

  platforms(): string[] {
    return [...this.senders.keys()];
  }

  async deliver(target: string, text: string): Promise<void> {
    const { platform, recipient } = parseDeliveryTarget(target);
    const sender = this.senders.get(platform);
    if (sender === undefined) {
      throw new DeliveryError(target, `no sender registered for platform '${platform}'`);
    }
    try {
      await sender.send(recipient, text);
    } catch (e) {
      throw new DeliveryError(target, `delivery to '${target}' failed: ${errorMessage(e)}`, e);
    }
    this.log('VRB', `delivered ${String(text.length)} chars`, target);
  }

  private log(severity: LogEntry['severity'], message: string, target: string): void {
    if (this.onLog === undefined) return;
    try {
      this.onLog({ timestamp: Date.now(), severity, type: 'broadcast', remoteIdentifier: `deliver:${target}`, fatal: false, message });
    } catch (e) {
      warn(`log sink failed: ${errorMessage(e)}`);
    }
  }
}

export class ConsoleSender implements PlatformSender {
  private readonly write: (s: string) => void;

  constructor(write?: (s: string) => void) {
    this.write = write ?? ((s: string) => { process.stdout.write(s); });
  }

  send(recipient: string, text: string): Promise<void> {
    this.write(`--- ${recipient} ---\n${text}\n`);
    return Promise.resolve();
  }
}
