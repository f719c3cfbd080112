import type { LogEntry, LogSink } from '../types.js';
import type { ProviderSession } from './provider-session.js';

import { delay, errorMessage, warn, withTimeout } from '../utils.js';

import { ToolInvocationError, ToolResultError } from './tool-errors.js';

export const DEFAULT_MAX_ATTEMPTS = 2;
export const DEFAULT_BACKOFF_STEP_MS = 500;
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 60_000;

export interface InvocationOptions {
  signal?: AbortSignal;
  maxAttempts?: number;
  backoffStepMs?: number;
  attemptTimeoutMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onLog?: LogSink;
}

// Delay before attempt `index` (0-based); the first attempt never waits
export const backoffDelay = (index: number, stepMs: number = DEFAULT_BACKOFF_STEP_MS): number => (index <= 0 ? 0 : index * stepMs);

/**
 * Run one tool call against its owning session with bounded retries.
 * Success resets the session's failure counter; running out of attempts bumps
 * it by exactly one and throws `invocation_failed` with the last error as cause.
 */
export async function invokeWithRetry(
  session: ProviderSession,
  toolName: string,
  args: Record<string, unknown>,
  opts: InvocationOptions = {}
): Promise<string> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const stepMs = opts.backoffStepMs ?? DEFAULT_BACKOFF_STEP_MS;
  const attemptTimeoutMs = opts.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
  const sleep = opts.sleep ?? delay;
  const remote = `mcp:${session.providerName}:${toolName}`;
  let lastError: unknown;

  // eslint-disable-next-line functional/no-loop-statements -- explicit bounded attempt loop
  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    const wait = backoffDelay(attempt, stepMs);
    if (wait > 0) {
      try {
        await sleep(wait, opts.signal);
      } catch (e) {
        if (opts.signal?.aborted === true) throw canceled(session, toolName, attempt, e);
        throw e;
      }
    }
    if (opts.signal?.aborted === true) throw canceled(session, toolName, attempt, opts.signal.reason);
    if (session.closed) {
      throw new ToolInvocationError('session_closed', toolName, `provider '${session.providerName}' is closed`, {
        providerName: session.providerName,
        attempts: attempt,
        cause: lastError,
      });
    }

    const started = Date.now();
    try {
      const outcome = await runAttempt(session, toolName, args, attemptTimeoutMs, opts.signal);
      if (outcome.isError) throw new ToolResultError(toolName, outcome.text);
      await session.recordSuccess();
      const durationMs = Date.now() - started;
      log(opts.onLog, 'VRB', `ok attempt=${String(attempt + 1)} in ${String(durationMs)}ms (${String(outcome.text.length)} chars)`, remote, {
        attempt: attempt + 1,
        duration_ms: durationMs,
        chars: outcome.text.length,
      });
      return outcome.text;
    } catch (e) {
      lastError = e;
      if (opts.signal?.aborted === true) throw canceled(session, toolName, attempt + 1, e);
      const durationMs = Date.now() - started;
      log(opts.onLog, 'WRN', `attempt ${String(attempt + 1)}/${String(maxAttempts)} failed after ${String(durationMs)}ms: ${errorMessage(e)}`, remote, {
        attempt: attempt + 1,
        duration_ms: durationMs,
      });
    }
  }

  const failures = await session.recordFailure();
  log(opts.onLog, 'ERR', `giving up after ${String(maxAttempts)} attempts (consecutive failures: ${String(failures)})`, remote, {
    attempts: maxAttempts,
    consecutive_failures: failures,
  });
  throw new ToolInvocationError('invocation_failed', toolName, `tool '${toolName}' failed after ${String(maxAttempts)} attempts: ${errorMessage(lastError)}`, {
    providerName: session.providerName,
    attempts: maxAttempts,
    cause: lastError,
  });
}

async function runAttempt(
  session: ProviderSession,
  toolName: string,
  args: Record<string, unknown>,
  timeoutMs: number,
  callerSignal: AbortSignal | undefined
) {
  const controller = new AbortController();
  const forward = (): void => { controller.abort(callerSignal?.reason); };
  callerSignal?.addEventListener('abort', forward, { once: true });
  try {
    return await withTimeout(
      session.connection.callTool(toolName, args, { timeoutMs, signal: controller.signal }),
      timeoutMs,
      `tool '${toolName}'`
    );
  } catch (e) {
    // stop the provider-side request as well once we stop waiting for it
    if (!controller.signal.aborted) controller.abort(e);
    throw e;
  } finally {
    callerSignal?.removeEventListener('abort', forward);
  }
}

function canceled(session: ProviderSession, toolName: string, attempts: number, cause: unknown): ToolInvocationError {
  return new ToolInvocationError('canceled', toolName, `tool '${toolName}' canceled`, {
    providerName: session.providerName,
    attempts,
    cause,
  });
}

function log(
  onLog: LogSink | undefined,
  severity: LogEntry['severity'],
  message: string,
  remote: string,
  details: LogEntry['details']
): void {
  if (onLog === undefined) return;
  try {
    onLog({ timestamp: Date.now(), severity, type: 'tool', remoteIdentifier: remote, fatal: severity === 'ERR', message, details });
  } catch (e) {
    warn(`log sink failed: ${errorMessage(e)}`);
  }
}
