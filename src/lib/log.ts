export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function isLogLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function prefix(level: LogLevel): string {
  return `${new Date().toISOString()} | ${level.toUpperCase()} |`;
}

function emit(
  level: LogLevel,
  sink: (...args: unknown[]) => void,
  message: string,
  meta?: unknown
): void {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  if (meta === undefined) {
    sink(`${prefix(level)} ${message}`);
    return;
  }
  sink(`${prefix(level)} ${message}`, meta);
}

export const log = {
  debug: (message: string, meta?: unknown): void => {
    emit('debug', console.debug, message, meta);
  },
  info: (message: string, meta?: unknown): void => {
    emit('info', console.info, message, meta);
  },
  warn: (message: string, meta?: unknown): void => {
    emit('warn', console.warn, message, meta);
  },
  error: (message: string, meta?: unknown): void => {
    emit('error', console.error, message, meta);
  }
};
