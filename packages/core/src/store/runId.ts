import { randomBytes } from 'node:crypto';

const RUN_ID = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})Z-(\d{4})-([0-9a-f]{4})$/;

/**
 * `YYYYMMDDTHHmmssSSSZ-<sequence>-<suffix>`, UTC. Sorts chronologically as a string.
 */
export function formatRunId(date: Date, sequence: number, suffix: string = randomSuffix()): string {
  return `${compactTimestamp(date)}-${pad(sequence % 10_000, 4)}-${suffix}`;
}

/**
 * `YYYYMMDDTHHmmssSSSZ` in UTC.
 */
export function compactTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
    `${pad(date.getUTCMilliseconds(), 3)}Z`
  );
}

export function isRunId(value: string): boolean {
  return RUN_ID.test(value);
}

/**
 * The timestamp encoded in a run id, or `null` if it is not one.
 */
export function runIdTime(runId: string): Date | null {
  const match = RUN_ID.exec(runId);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, ms] = match.map(Number);
  if (y === undefined || mo === undefined || d === undefined) return null;
  return new Date(Date.UTC(y, mo - 1, d, h ?? 0, mi ?? 0, s ?? 0, ms ?? 0));
}

export function randomSuffix(): string {
  return randomBytes(2).toString('hex');
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}
