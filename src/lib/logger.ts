/**
 * Structured line logger: `[ts] [LEVEL] [Tag] message {meta}`.
 * Level comes from LOG_LEVEL; the sink can be swapped (tests capture lines).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

let minLevel: LogLevel = levelFromEnv();
let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

/** Replace the output sink; returns a function restoring the previous one. */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

function serializeMeta(meta?: LogMeta): string {
  if (!meta) return '';
  const plain: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    plain[key] = value instanceof Error ? value.message : value;
  }
  return ` ${JSON.stringify(plain)}`;
}

function write(level: LogLevel, tag: string, message: string, meta?: LogMeta): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const ts = new Date().toISOString();
  sink(level, `[${ts}] [${level.toUpperCase()}] [${tag}] ${message}${serializeMeta(meta)}`);
}

export interface TaggedLogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export function createLogger(tag: string): TaggedLogger {
  return {
    debug: (message, meta) => write('debug', tag, message, meta),
    info: (message, meta) => write('info', tag, message, meta),
    warn: (message, meta) => write('warn', tag, message, meta),
    error: (message, meta) => write('error', tag, message, meta)
  };
}

export const logger = {
  debug(tag: string, msg: string, meta?: LogMeta) {
    write('debug', tag, msg, meta);
  },
  info(tag: string, msg: string, meta?: LogMeta) {
    write('info', tag, msg, meta);
  },
  warn(tag: string, msg: string, meta?: LogMeta) {
    write('warn', tag, msg, meta);
  },
  error(tag: string, msg: string, meta?: LogMeta) {
    write('error', tag, msg, meta);
  }
};
