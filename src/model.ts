export const PRIORITIES = ['🔴 Высокий', '🟡 Средний', '🟢 Низкий'] as const;

export type Priority = (typeof PRIORITIES)[number];

export const DEFAULT_PRIORITY: Priority = '🟡 Средний';

export function isPriority(value: string): value is Priority {
  return (PRIORITIES as readonly string[]).includes(value);
}

export interface ReminderOffset {
  label: string;
  hours?: number;
  days?: number;
}

/** Timed reminder choices, in the order they are offered. */
export const REMINDER_OFFSETS: readonly ReminderOffset[] = [
  { label: 'Через 1 час', hours: 1 },
  { label: 'Через 3 часа', hours: 3 },
  { label: 'Завтра', days: 1 },
  { label: 'Через неделю', days: 7 },
];

export const NO_REMINDER = 'Без напоминания';

export interface Task {
  /** Position-derived id, unique only within one user's list at creation time. */
  id: number;
  text: string;
  priority: Priority;
  /** Local time, `YYYY-MM-DD HH:MM:SS`. */
  createdAt: string;
  completed: boolean;
  /** Same format as createdAt. Descriptive only; nothing is scheduled. */
  reminder: string | null;
}

export const COMMANDS = ['start', 'help', 'add', 'list', 'complete', 'delete', 'cancel'] as const;

export type Command = (typeof COMMANDS)[number];

export function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export type UserId = number;
