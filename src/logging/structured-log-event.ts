import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  iteration?: number;
  toolCallId?: string;
  remoteIdentifier?: string;
  provider?: string;
  model?: string;
  tool?: string;
  labels: Record<string, string>;
  stack?: string;
}

const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'severity',
  'type',
  'iteration',
  'tool_call_id',
  'remote',
  'provider',
  'model',
  'tool',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0) labels[key] = value;
  });
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      if (Object.prototype.hasOwnProperty.call(labels, key)) return;
      if (typeof value === 'string') {
        if (value.length > 0) labels[key] = value;
        return;
      }
      if (typeof value === 'number') {
        if (Number.isFinite(value)) labels[key] = String(value);
        return;
      }
      labels[key] = value ? 'true' : 'false';
    });
  }
  const filteredLabels = Object.entries(labels).reduce<Record<string, string>>((acc, [key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key)) return acc;
    acc[key] = value;
    return acc;
  }, {});

  const parsed = entry.remoteIdentifier.length > 0
    ? parseRemoteIdentifier(entry.remoteIdentifier, entry.type)
    : {};

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    iteration: entry.iteration,
    toolCallId: entry.toolCallId,
    remoteIdentifier: entry.remoteIdentifier.length > 0 ? entry.remoteIdentifier : undefined,
    provider: parsed.provider,
    model: parsed.model,
    tool: parsed.tool,
    labels: filteredLabels,
    stack: entry.stack,
  };
}

// 'provider:model' for llm entries, 'mcp:server[:tool]' for tool entries
function parseRemoteIdentifier(
  identifier: string,
  type: LogEntry['type'],
): { provider?: string; model?: string; tool?: string } {
  if (type === 'llm') {
    const idx = identifier.indexOf(':');
    if (idx === -1) return { provider: identifier };
    return { provider: identifier.slice(0, idx), model: identifier.slice(idx + 1) };
  }
  if (type !== 'tool') return {};
  const parts = identifier.split(':');
  if (parts.length >= 3) {
    const [protocol, server, ...toolParts] = parts;
    return { provider: `${protocol}:${server}`, tool: toolParts.join(':') };
  }
  return { provider: identifier };
}
