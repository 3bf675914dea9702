/**
 * Engine-wide configuration
 *
 * All options are optional; the defaults keep the engine quiet apart from
 * warnings. Per-factory configuration lives in factory/options.ts.
 */

import { DefinitionError } from './errors.js';
import { ErrorCode } from '../errors/codes.js';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (line: string) => void;

export interface EngineOptions {
  /** Most verbose level written to the sink (default: GRAPHSMITH_LOG_LEVEL or 'warn') */
  logLevel?: LogLevel;
  /** Where formatted log lines go (default: process.stderr) */
  logSink?: LogSink;
}

export type ResolvedEngineOptions = Required<EngineOptions>;

function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === 'string' &&
    (LOG_LEVELS as readonly string[]).includes(value)
  );
}

function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.GRAPHSMITH_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

const writeToStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function defaultOptions(): ResolvedEngineOptions {
  return {
    logLevel: defaultLogLevel(),
    logSink: writeToStderr,
  };
}

let current: ResolvedEngineOptions = defaultOptions();

/**
 * Validate option combinations, throwing on the first invalid value
 */
export function validateEngineOptions(options: EngineOptions): void {
  if (options.logLevel !== undefined && !isLogLevel(options.logLevel)) {
    throw new DefinitionError({
      message: `Invalid logLevel ${JSON.stringify(options.logLevel)}; expected one of ${LOG_LEVELS.join(', ')}`,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { attributes: ['logLevel'], value: options.logLevel },
    });
  }
  if (options.logSink !== undefined && typeof options.logSink !== 'function') {
    throw new DefinitionError({
      message: 'logSink must be a function',
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { attributes: ['logSink'] },
    });
  }
}

/**
 * Merge user options over the current configuration
 */
export function configureEngine(
  userOptions: EngineOptions = {}
): ResolvedEngineOptions {
  validateEngineOptions(userOptions);
  current = {
    logLevel: userOptions.logLevel ?? current.logLevel,
    logSink: userOptions.logSink ?? current.logSink,
  };
  return current;
}

export function getEngineOptions(): ResolvedEngineOptions {
  return current;
}

/** Restore defaults (re-reading GRAPHSMITH_LOG_LEVEL) */
export function resetEngineOptions(): ResolvedEngineOptions {
  current = defaultOptions();
  return current;
}
