import path from 'node:path';
import os from 'node:os';
import { mkdtemp } from 'node:fs/promises';
import type { Logger } from '../src/log.js';

export interface LogLine {
  level: 'error' | 'warn' | 'info' | 'debug';
  msg: string;
  meta?: unknown;
}

export function recordingLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger: Logger = {
    error: (msg, meta) => lines.push({ level: 'error', msg, meta }),
    warn: (msg, meta) => lines.push({ level: 'warn', msg, meta }),
    info: (msg, meta) => lines.push({ level: 'info', msg, meta }),
    debug: (msg, meta) => lines.push({ level: 'debug', msg, meta }),
    child: () => logger,
  };
  return { logger, lines };
}

export async function tempDataFile(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'task-bot-'));
  return path.join(dir, 'tasks_data.json');
}

/** 2026-01-15 09:30:00 local time. */
export const fixedClock = () => new Date(2026, 0, 15, 9, 30, 0);
