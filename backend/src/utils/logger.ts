type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type Logger = {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return LEVEL_ORDER[isLogLevel(configured) ? configured : 'info'];
}

function describe(meta: unknown): unknown {
  if (meta instanceof Error) {
    return meta.stack ?? meta.message;
  }
  return meta;
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, message: string, meta?: unknown) => {
    if (LEVEL_ORDER[level] < threshold()) return;
    const line = `${new Date().toISOString()} [${tag}] ${level.toUpperCase()} ${message}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (meta === undefined) {
      sink(line);
    } else {
      sink(line, describe(meta));
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}
