import { errorMessage } from '../utils.js';

export type ToolErrorKind =
  | 'unknown_tool'
  | 'session_closed'
  | 'invocation_failed'
  | 'canceled';

export interface ToolErrorMeaning {
  executed: boolean;
  summary: string;
}

export const TOOL_ERROR_KIND_MEANINGS: Record<ToolErrorKind, ToolErrorMeaning> = {
  unknown_tool: {
    executed: false,
    summary: 'No connected provider ever registered this tool name.',
  },
  session_closed: {
    executed: false,
    summary: 'The provider owning this tool has been shut down.',
  },
  invocation_failed: {
    executed: true,
    summary: 'Every attempt failed; the last transport or tool error is attached as cause.',
  },
  canceled: {
    executed: false,
    summary: 'Tool call aborted by the caller before it completed.',
  },
};

export class ToolInvocationError extends Error {
  readonly kind: ToolErrorKind;
  readonly toolName: string;
  readonly providerName?: string;
  readonly attempts: number;

  constructor(
    kind: ToolErrorKind,
    toolName: string,
    message: string,
    opts?: { providerName?: string; attempts?: number; cause?: unknown }
  ) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ToolInvocationError';
    this.kind = kind;
    this.toolName = toolName;
    this.providerName = opts?.providerName;
    this.attempts = opts?.attempts ?? 0;
  }
}

export const isToolInvocationError = (value: unknown): value is ToolInvocationError =>
  value instanceof ToolInvocationError;

export class ProviderConnectError extends Error {
  readonly providerName: string;
  readonly stage: 'transport' | 'connect' | 'discovery';

  constructor(providerName: string, stage: 'transport' | 'connect' | 'discovery', cause: unknown) {
    super(`provider '${providerName}' ${stage} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'ProviderConnectError';
    this.providerName = providerName;
    this.stage = stage;
  }
}

// Error raised by a provider for a result it flagged with isError
export class ToolResultError extends Error {
  constructor(toolName: string, detail: string) {
    super(detail.length > 0 ? `tool '${toolName}' reported an error: ${detail}` : `tool '${toolName}' reported an error`);
    this.name = 'ToolResultError';
  }
}
