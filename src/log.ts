export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Logger whose lines carry `[scope]` after the level. */
  child(scope: string): Logger;
}

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

/** Error value as log meta. */
export function errorMeta(err: unknown): { error: string } {
  return { error: err instanceof Error ? err.message : String(err) };
}

export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  if (level === 'silent') {
    const silent: Logger = {
      error: () => {},
      warn: () => {},
      info: () => {},
      debug: () => {},
      child: () => silent,
    };
    return silent;
  }

  const threshold = ORDER[level];
  const tag = scope ? ` [${scope}]` : '';
  const prefix = (lvl: string) => `${new Date().toISOString()} ${lvl.toUpperCase()}${tag} `;

  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;

  return {
    error: (msg, meta) => {
      if (can('error')) console.error(prefix('error') + msg + fmtMeta(meta));
    },
    warn: (msg, meta) => {
      if (can('warn')) console.warn(prefix('warn') + msg + fmtMeta(meta));
    },
    info: (msg, meta) => {
      if (can('info')) console.log(prefix('info') + msg + fmtMeta(meta));
    },
    debug: (msg, meta) => {
      if (can('debug')) console.log(prefix('debug') + msg + fmtMeta(meta));
    },
    child: (name) => createLogger(level, scope ? `${scope}:${name}` : name),
  };
}
