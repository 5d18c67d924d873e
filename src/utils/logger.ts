type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

const activeLevel = resolveLevel();

function serializeMeta(meta: unknown): unknown {
  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message, stack: meta.stack };
  }
  return meta;
}

function write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) {
    return;
  }

  const entry: Record<string, unknown> = {
    time: new Date().toISOString(),
    level,
    message
  };
  if (meta !== undefined) {
    entry.meta = serializeMeta(meta);
  }

  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (message: string, meta?: unknown) => write('debug', message, meta),
  info: (message: string, meta?: unknown) => write('info', message, meta),
  warn: (message: string, meta?: unknown) => write('warn', message, meta),
  error: (message: string, meta?: unknown) => write('error', message, meta)
};
