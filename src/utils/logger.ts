export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function fmt(level: LogLevel, msg: string, extra?: unknown) {
  const time = new Date().toISOString();
  if (extra === undefined) { return `[regolith] ${time} ${level.toUpperCase()} ${msg}`; }
  return `[regolith] ${time} ${level.toUpperCase()} ${msg} ${JSON.stringify(extra)}`;
}

export interface Logger {
  readonly level: LogLevel;
  debug(msg: string, extra?: unknown): void;
  info(msg: string, extra?: unknown): void;
  warn(msg: string, extra?: unknown): void;
  error(msg: string, extra?: unknown): void;
}

/**
 * Creates a console logger filtered by `level`. Commands create one per
 * invocation and pass it along in the run context.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return {
    level,
    debug(msg, extra) {
      if (LEVELS[level] <= LEVELS.debug) { console.debug(fmt('debug', msg, extra)); }
    },
    info(msg, extra) {
      if (LEVELS[level] <= LEVELS.info) { console.info(fmt('info', msg, extra)); }
    },
    warn(msg, extra) {
      if (LEVELS[level] <= LEVELS.warn) { console.warn(fmt('warn', msg, extra)); }
    },
    error(msg, extra) {
      console.error(fmt('error', msg, extra));
    },
  };
}
