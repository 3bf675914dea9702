/**
 * Error hierarchy for graphsmith
 * Provides structured error handling with context for every failure the
 * engine raises itself. Errors thrown by user declarations and hooks are
 * never wrapped.
 */

import { ErrorCode, type Severity } from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  factory?: string; // Name of the factory at fault
  attribute?: string; // Attribute being resolved
  attributes?: string[]; // Offending attribute / option names
  value?: unknown; // Problematic value (may contain secrets)
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  factory?: string;
}

export interface FixtureErrorParams {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
]);

/**
 * Base error class for all graphsmith errors
 */
export abstract class FixtureError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  protected constructor(params: FixtureErrorParams, defaultCode: ErrorCode) {
    const { message, errorCode = defaultCode, severity = 'error' } = params;
    super(message, { cause: params.cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = params.context;
    this.cause = params.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and redacts sensitive keys in context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      factory: this.context?.factory,
    };
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;

    const redactValue = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactValue);
      if (val !== null && typeof val === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
        }
        return out;
      }
      return val;
    };

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    return redacted;
  }
}

/**
 * Definition-time errors: unknown or ill-typed options, malformed
 * declaration sets.
 */
export class DefinitionError extends FixtureError {
  constructor(params: FixtureErrorParams) {
    super(params, ErrorCode.INVALID_OPTION_VALUE);
  }
}

/**
 * A strategy name the engine does not know.
 */
export class UnknownStrategyError extends FixtureError {
  constructor(strategy: unknown, factory?: string) {
    super(
      {
        message: `Unknown strategy ${JSON.stringify(strategy)}${factory ? ` on ${factory}` : ''}; expected one of "build", "create", "stub"`,
        context: { factory, value: strategy },
      },
      ErrorCode.UNKNOWN_STRATEGY
    );
  }
}

/**
 * A known strategy that a factory refuses to run.
 */
export class UnsupportedStrategyError extends FixtureError {
  constructor(strategy: string, factory: string) {
    super(
      {
        message: `${factory} does not support the "${strategy}" strategy`,
        context: { factory, value: strategy },
      },
      ErrorCode.UNSUPPORTED_STRATEGY
    );
  }
}

/**
 * Cycles between parameters (definition time) or lazy attributes
 * (invocation time).
 */
export class CyclicDefinitionError extends FixtureError {
  constructor(params: FixtureErrorParams) {
    super(params, ErrorCode.CYCLIC_PARAMETERS);
  }

  get attributes(): string[] {
    return this.context?.attributes ?? [];
  }
}

export class AbstractFactoryError extends FixtureError {
  constructor(factory: string) {
    super(
      {
        message: `Cannot generate instances of abstract factory ${factory}; ensure ${factory} has options.model set and options.abstract is either not set or false`,
        context: { factory },
      },
      ErrorCode.ABSTRACT_FACTORY
    );
  }
}

export class SequenceOwnershipError extends FixtureError {
  constructor(factory: string, owner: string) {
    super(
      {
        message: `Can't reset a sequence on descendant factory ${factory}; reset sequence on ${owner} or use { force: true }`,
        context: { factory, owner },
      },
      ErrorCode.SEQUENCE_OWNERSHIP
    );
  }

  get owner(): string {
    return String(this.context?.owner);
  }
}

export class IntrospectorError extends FixtureError {
  constructor(params: FixtureErrorParams) {
    super(params, ErrorCode.INTROSPECTOR_MISSING_RECIPE);
  }
}

export class InvalidDeclarationError extends FixtureError {
  constructor(params: FixtureErrorParams) {
    super(params, ErrorCode.INVALID_DECLARATION);
  }
}

export class UnknownAttributeError extends FixtureError {
  constructor(params: FixtureErrorParams) {
    super(params, ErrorCode.UNKNOWN_ATTRIBUTE);
  }
}

/**
 * Utility functions for error handling
 */
export function isFixtureError(error: unknown): error is FixtureError {
  return error instanceof FixtureError;
}
