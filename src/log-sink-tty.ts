import type { LogEntry, LogFormat, LogSink } from './types.js';

import { createStructuredLogger } from './logging/structured-logger.js';

export function makeTTYLogCallbacks(
  opts: {
    color?: boolean;
    verbose?: boolean;
    trace?: boolean;
    explicitFormat?: LogFormat;
    labels?: Record<string, string>;
  },
  write?: (s: string) => void
): { onLog: LogSink } {
  const writer = typeof write === 'function'
    ? write
    : (s: string) => {
        try {
          process.stderr.write(s);
        } catch {
          // stderr gone; drop the line
        }
      };

  // Interactive terminals get the compact console layout unless a format was requested
  const format: LogFormat = opts.explicitFormat ?? (process.stderr.isTTY ? 'console' : 'logfmt');

  const logger = createStructuredLogger({
    format,
    color: opts.color ?? process.stderr.isTTY,
    verbose: opts.verbose === true,
    writer,
    labels: opts.labels,
  });

  return {
    onLog: (entry: LogEntry) => {
      if (entry.severity === 'VRB' && opts.verbose !== true) return;
      if (entry.severity === 'TRC' && opts.trace !== true) return;
      logger.emit(entry);
    },
  };
}
