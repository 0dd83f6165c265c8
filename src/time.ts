import { REMINDER_OFFSETS } from './model.js';

const pad = (n: number) => String(n).padStart(2, '0');

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Adds to the local calendar fields, so "+1 day" keeps the wall-clock time across DST changes. */
export function addToWallClock(date: Date, delta: { hours?: number; days?: number }): Date {
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate() + (delta.days ?? 0),
    date.getHours() + (delta.hours ?? 0),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds(),
  );
}

/**
 * Reminder timestamp for one of the offered offset labels.
 * Any other input, "no reminder" included, yields null.
 */
export function reminderFromLabel(label: string, now: Date): string | null {
  const offset = REMINDER_OFFSETS.find((o) => o.label === label);
  if (!offset) return null;
  return formatTimestamp(addToWallClock(now, offset));
}
