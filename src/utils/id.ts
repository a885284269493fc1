import { randomBytes } from 'node:crypto';

/** YYYYMMDD in UTC. */
export function formatDateKey(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

export function generateRunId(now: Date = new Date()): string {
  const rand = randomBytes(3).toString('hex');
  return `run_${formatDateKey(now)}_${rand}`;
}
