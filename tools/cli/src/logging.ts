type LogValue = Record<string, unknown> | unknown[] | string | number | boolean | null | undefined;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let currentLevel: LogLevel = 'info';

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export const isLevelEnabled = (level: LogLevel): boolean => {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
};

const sanitize = (value: unknown, seen = new WeakSet<object>()): LogValue => {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value !== 'object') {
    if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
      return String(value);
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
      return String(value);
    }
    return value as LogValue;
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((entry) => sanitize(entry, seen));
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = sanitize(entry, seen);
  }
  return result;
};

export const serialize = (value: unknown): string => {
  try {
    return JSON.stringify(sanitize(value));
  } catch {
    return '[unserializable]';
  }
};

// stdout carries the generated mirror list, so every level goes to stderr.
const write = (level: LogLevel, message: string, meta?: unknown): void => {
  if (!isLevelEnabled(level)) {
    return;
  }
  const sink = level === 'warn' ? console.warn : console.error;
  if (meta === undefined) {
    sink(message);
    return;
  }
  sink(message, serialize(meta));
};

export const logDebug = (message: string, meta?: unknown): void => write('debug', message, meta);

export const logInfo = (message: string, meta?: unknown): void => write('info', message, meta);

export const logWarn = (message: string, meta?: unknown): void => write('warn', message, meta);

export const logError = (message: string, meta?: unknown): void => write('error', message, meta);
