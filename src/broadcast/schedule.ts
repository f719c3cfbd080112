export interface FireTime {
  hour: number;
  minute: number;
}

export class InvalidFireTimeError extends Error {
  constructor(value: string) {
    super(`invalid broadcast time '${value}', expected HH:MM`);
    this.name = 'InvalidFireTimeError';
  }
}

export function parseFireTime(value: string): FireTime {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (match === null) throw new InvalidFireTimeError(value);
  const hour = Number.parseInt(match[1], 10);
  const minute = Number.parseInt(match[2], 10);
  if (hour > 23 || minute > 59) throw new InvalidFireTimeError(value);
  return { hour, minute };
}

/**
 * Next instant (local time) at which the daily broadcast fires: today when that
 * moment is still strictly ahead of `now`, otherwise the same wall-clock time
 * tomorrow.
 */
export function nextFireTime(now: Date, time: string | FireTime): Date {
  const { hour, minute } = typeof time === 'string' ? parseFireTime(time) : time;
  const candidate = new Date(now.getFullYear(), now.getMonth(), now.getDate(), hour, minute, 0, 0);
  if (candidate.getTime() > now.getTime()) return candidate;
  // calendar arithmetic keeps the wall-clock time across DST changes
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1, hour, minute, 0, 0);
}
