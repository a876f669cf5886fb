import config from './config';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelOrder;
}

function shouldLog(level: LogLevel) {
  const target = isLogLevel(config.logLevel) ? levelOrder[config.logLevel] : levelOrder.info;
  return levelOrder[level] >= target;
}

// Error instances stringify to {} so pull out the useful fields first.
function serializeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error
      ? { name: value.name, message: value.message, stack: value.stack }
      : value;
  }
  return out;
}

function format(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  const safeMeta = meta ? serializeMeta(meta) : undefined;
  if (config.logPretty) {
    const timestamp = new Date().toISOString();
    const metaText = safeMeta ? ` ${JSON.stringify(safeMeta)}` : '';
    return `${timestamp} [${level}] ${message}${metaText}`;
  }

  return JSON.stringify({
    ts: new Date().toISOString(),
    level,
    message,
    service: 'windpark-cosim',
    ...safeMeta,
  });
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  if (!shouldLog(level)) return;
  const line = format(level, message, meta);
  // eslint-disable-next-line no-console
  console[level === 'debug' ? 'log' : level](line);
}

const logger = {
  debug: (message: string, meta?: Record<string, unknown>) =>
    log('debug', message, meta),
  info: (message: string, meta?: Record<string, unknown>) =>
    log('info', message, meta),
  warn: (message: string, meta?: Record<string, unknown>) =>
    log('warn', message, meta),
  error: (meta: Record<string, unknown> | Error, message?: string) => {
    if (meta instanceof Error) {
      log('error', message ?? meta.message, { err: meta });
      return;
    }
    log('error', message ?? 'error', meta);
  },
};

export default logger;
