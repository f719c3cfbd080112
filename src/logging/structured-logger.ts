import type { LogEntry, LogFormat } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  writer?: (line: string) => void;
}

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sink: (event: StructuredLogEvent) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    const color = options.color ?? false;
    const verbose = options.verbose ?? false;
    const writer = options.writer ?? defaultWriter;
    switch (options.format ?? 'logfmt') {
      case 'json':
        this.sink = (event) => { writer(`${JSON.stringify(buildJsonPayload(event))}\n`); };
        break;
      case 'console':
        this.sink = (event) => { writer(`${formatConsole(event, { color, verbose })}\n`); };
        break;
      default:
        this.sink = (event) => { writer(`${formatLogfmt(event, { color })}\n`); };
        break;
    }
  }

  emit(entry: LogEntry): void {
    this.sink(buildStructuredLogEvent(entry, { labels: this.labels }));
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr closed; nothing left to report to
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('iteration', event.iteration);
  push('tool_call_id', event.toolCallId);
  push('remote', event.remoteIdentifier);
  push('provider', event.provider);
  push('model', event.model);
  push('tool', event.tool);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
