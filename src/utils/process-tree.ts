import { spawnSync } from 'node:child_process';
import { readFile } from 'node:fs/promises';

export interface TerminateOptions {
  gracefulMs?: number;
  logger?: (message: string) => void;
}

export interface TerminateResult {
  signalled: number[];
  stillRunning: number[];
}

const DEFAULT_GRACE_MS = 1000;
const POLL_INTERVAL_MS = 100;

/**
 * SIGTERM a subprocess and everything it spawned (children first), then
 * SIGKILL whatever survives the grace period.
 */
export async function terminateProcessTree(pid: number, opts?: TerminateOptions): Promise<TerminateResult> {
  if (!Number.isInteger(pid) || pid <= 0) return { signalled: [], stillRunning: [] };
  const gracefulMs = opts?.gracefulMs ?? DEFAULT_GRACE_MS;
  const descendants = process.platform === 'win32' ? [] : await collectDescendants(pid);
  const ordered = [...descendants, pid];

  const signalled = ordered.filter((target) => sendSignal(target, 'SIGTERM', opts?.logger));
  await waitForExit(signalled, gracefulMs);
  signalled
    .filter((target) => isProcessAlive(target))
    .forEach((target) => { sendSignal(target, 'SIGKILL', opts?.logger); });

  return { signalled, stillRunning: signalled.filter((target) => isProcessAlive(target)) };
}

export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === 'EPERM';
  }
}

async function collectDescendants(rootPid: number): Promise<number[]> {
  const result: number[] = [];
  const seen = new Set<number>([rootPid]);
  const queue: number[] = [rootPid];
  let parentMap: Map<number, number[]> | undefined;
  // eslint-disable-next-line functional/no-loop-statements -- breadth-first walk over the process table
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    let children = process.platform === 'linux' ? await readProcChildren(current) : undefined;
    if (children === undefined) {
      parentMap = parentMap ?? readParentMapViaPs();
      children = parentMap.get(current) ?? [];
    }
    children.forEach((child) => {
      if (seen.has(child)) return;
      seen.add(child);
      result.push(child);
      queue.push(child);
    });
  }
  // deepest first so parents cannot respawn children we already signalled
  return result.reverse();
}

async function readProcChildren(pid: number): Promise<number[] | undefined> {
  const id = pid.toString();
  try {
    const raw = await readFile(`/proc/${id}/task/${id}/children`, 'utf8');
    return raw.split(' ').map((token) => Number.parseInt(token, 10)).filter((n) => Number.isInteger(n) && n > 0);
  } catch {
    return undefined;
  }
}

function readParentMapViaPs(): Map<number, number[]> {
  const map = new Map<number, number[]>();
  const listing = spawnSync('ps', ['-o', 'pid=', '-o', 'ppid=', '-ax'], { encoding: 'utf8' });
  if (listing.error !== undefined || typeof listing.stdout !== 'string') return map;
  listing.stdout.split('\n').forEach((line) => {
    const match = /^(\d+)\s+(\d+)$/.exec(line.trim());
    if (match === null) return;
    const child = Number.parseInt(match[1], 10);
    const parent = Number.parseInt(match[2], 10);
    const siblings = map.get(parent) ?? [];
    siblings.push(child);
    map.set(parent, siblings);
  });
  return map;
}

function sendSignal(pid: number, signal: NodeJS.Signals, logger?: (message: string) => void): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (err) {
    if (errnoCode(err) !== 'ESRCH') {
      logger?.(`failed to send ${signal} to pid=${pid.toString()}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return false;
  }
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function waitForExit(pids: number[], timeoutMs: number): Promise<void> {
  if (pids.length === 0 || timeoutMs <= 0) return Promise.resolve();
  const deadline = Date.now() + timeoutMs;
  return new Promise((resolve) => {
    const timer = setInterval(() => {
      if (!pids.some((pid) => isProcessAlive(pid)) || Date.now() >= deadline) {
        clearInterval(timer);
        resolve();
      }
    }, POLL_INTERVAL_MS);
  });
}
