import {
  getEngineOptions,
  LOG_LEVELS,
  type LogLevel,
} from '../types/options.js';

type MessageLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  isEnabled(level: MessageLevel): boolean;
}

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

/**
 * Scoped logger writing `[graphsmith:<scope>] <level> <message>` lines to
 * the configured sink. Level and sink are read on every call so that
 * configureEngine() applies to loggers created earlier.
 */
export function createLogger(scope: string): Logger {
  const isEnabled = (level: MessageLevel): boolean => {
    const { logLevel } = getEngineOptions();
    return logLevel !== 'silent' && rank(level) <= rank(logLevel);
  };
  const write = (level: MessageLevel, message: string): void => {
    if (!isEnabled(level)) return;
    getEngineOptions().logSink(`[graphsmith:${scope}] ${level} ${message}`);
  };
  return {
    error: (message) => write('error', message),
    warn: (message) => write('warn', message),
    info: (message) => write('info', message),
    debug: (message) => write('debug', message),
    isEnabled,
  };
}

/**
 * Compact, cycle-safe rendering of a value for log lines
 */
export function describeValue(value: unknown, maxLength = 200): string {
  let text: string;
  if (typeof value === 'function') {
    text = `[Function ${value.name || 'anonymous'}]`;
  } else if (typeof value === 'string') {
    text = JSON.stringify(value);
  } else {
    const seen = new WeakSet<object>();
    try {
      text =
        JSON.stringify(value, (_key, val: unknown) => {
          if (typeof val === 'bigint') return `${val}n`;
          if (typeof val === 'function') return `[Function ${val.name || 'anonymous'}]`;
          if (val !== null && typeof val === 'object') {
            if (seen.has(val)) return '[Circular]';
            seen.add(val);
          }
          return val;
        }) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  return text.length > maxLength ? `${text.slice(0, maxLength - 1)}…` : text;
}
