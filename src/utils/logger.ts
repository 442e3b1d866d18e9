import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;
const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Error instances stringify to {}; flatten them before they reach JSON.stringify.
function serializeMeta(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function log(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const text = scope ? `${scope}: ${message}` : message;
  const fields = meta ? serializeMeta(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, scope, message, ...fields })
    : fields ? `[${ts}] [${level.toUpperCase()}] ${text} ${JSON.stringify(fields)}`
             : `[${ts}] [${level.toUpperCase()}] ${text}`;
  level === 'error' ? process.stderr.write(out + '\n') : process.stdout.write(out + '\n');
}

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  return {
    debug: (msg, meta) => log('debug', scope, msg, meta),
    info:  (msg, meta) => log('info',  scope, msg, meta),
    warn:  (msg, meta) => log('warn',  scope, msg, meta),
    error: (msg, meta) => log('error', scope, msg, meta),
    child: (name) => createLogger(scope ? `${scope}.${name}` : name),
  };
}

export const logger = createLogger();
