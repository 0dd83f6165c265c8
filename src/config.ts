import { z } from 'zod';
import { LOG_LEVELS } from './log.js';
import { DEFAULT_DATA_FILE } from './store/taskStore.js';

const str = z.string().min(1);

export const EnvSchema = z.object({
  // transport
  TELEGRAM_BOT_TOKEN: str.optional(),
  TASK_BOT_POLL_TIMEOUT_SECONDS: z.coerce.number().int().nonnegative().optional(),
  TASK_BOT_HTTP_RPS: z.coerce.number().positive().optional(),

  // storage
  TASK_BOT_DATA_FILE: str.optional(),

  // behavior
  TASK_BOT_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  // Empty values (e.g. `TELEGRAM_BOT_TOKEN=` in .env) count as unset.
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  return EnvSchema.parse(present);
}

export interface BotSettings {
  token: string;
  dataFile: string;
  logLevel: NonNullable<EnvConfig['TASK_BOT_LOG_LEVEL']>;
  pollTimeoutSeconds: number;
}

/** Settings needed to run the bot; a missing token is a ConfigError. */
export function botSettings(env: EnvConfig, overrides: { dataFile?: string } = {}): BotSettings {
  if (!env.TELEGRAM_BOT_TOKEN) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is not set. Add it to .env or the environment.');
  }
  return {
    token: env.TELEGRAM_BOT_TOKEN,
    dataFile: overrides.dataFile ?? env.TASK_BOT_DATA_FILE ?? DEFAULT_DATA_FILE,
    logLevel: env.TASK_BOT_LOG_LEVEL ?? 'info',
    pollTimeoutSeconds: env.TASK_BOT_POLL_TIMEOUT_SECONDS ?? 30,
  };
}

export function doctorReport(env = readEnv()) {
  const missing: string[] = [];
  const notes: string[] = [];

  if (!env.TELEGRAM_BOT_TOKEN) missing.push('TELEGRAM_BOT_TOKEN');

  notes.push(`Data file: ${env.TASK_BOT_DATA_FILE ?? DEFAULT_DATA_FILE}${env.TASK_BOT_DATA_FILE ? '' : ' (default)'}`);
  if (env.TASK_BOT_POLL_TIMEOUT_SECONDS === 0) {
    notes.push('TASK_BOT_POLL_TIMEOUT_SECONDS=0 disables long polling (one request per poll, no wait).');
  }

  return {
    tokenConfigured: Boolean(env.TELEGRAM_BOT_TOKEN),
    logLevel: env.TASK_BOT_LOG_LEVEL ?? 'info',
    missing,
    notes,
  };
}
