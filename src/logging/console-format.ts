import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_GREEN = '\u001B[32m';
const ANSI_BLUE = '\u001B[34m';

function colorFor(event: StructuredLogEvent): string | undefined {
  if (event.severity === 'ERR') return ANSI_RED;
  if (event.severity === 'WRN') return ANSI_YELLOW;
  if (event.type === 'llm') return ANSI_BLUE;
  if (event.type === 'tool') return ANSI_GREEN;
  return undefined;
}

// [WRN] mcp:search (iter 2) message  key=value ...
export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const context = event.remoteIdentifier ?? event.type;
  const iteration = event.iteration !== undefined ? ` (iter ${String(event.iteration)})` : '';
  const head = `[${event.severity}] ${context}${iteration}`;
  const coloredHead = (() => {
    if (options.color !== true) return head;
    const ansi = colorFor(event);
    return ansi === undefined ? head : `${ansi}${head}${ANSI_RESET}`;
  })();
  let output = `${coloredHead} ${event.message}`;
  if (options.verbose === true) {
    const labels = Object.entries(event.labels).map(([k, v]) => `${k}=${v}`);
    if (labels.length > 0) output += `  ${labels.join(' ')}`;
  }

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
