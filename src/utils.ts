export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const errorMessage = (value: unknown): string => {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

// Expands ${NAME} and $NAME references; unset variables become empty strings.
export function expandEnvReferences(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{([^}]+)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g, (_m: string, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    return env[name] ?? '';
  });
}

export class DeadlineExceededError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${String(timeoutMs)}ms`);
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

export const delay = (ms: number, signal?: AbortSignal): Promise<void> => new Promise((resolve, reject) => {
  if (signal?.aborted === true) {
    reject(abortReason(signal));
    return;
  }
  if (ms <= 0) {
    resolve();
    return;
  }
  const onAbort = (): void => {
    clearTimeout(timer);
    reject(abortReason(signal));
  };
  const timer = setTimeout(() => {
    signal?.removeEventListener('abort', onAbort);
    resolve();
  }, ms);
  signal?.addEventListener('abort', onAbort, { once: true });
});

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeout: NodeJS.Timeout | undefined;
  const timerPromise = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      reject(new DeadlineExceededError(label, timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timerPromise]);
  } finally {
    if (timeout !== undefined) clearTimeout(timeout);
  }
}

export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const err = new Error(typeof reason === 'string' ? reason : 'operation aborted');
  err.name = 'AbortError';
  return err;
}

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Consistent warning logger routed through injectable sink to keep core silent
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* sink failures must not propagate into the engine */
  }
}
