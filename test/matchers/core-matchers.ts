/**
 * ================================================================================
 * CORE MATCHERS
 *
 * Custom matchers for engine errors and generated values.
 * ================================================================================
 */

import type { ErrorCode } from '../../packages/core/src/errors/codes.js';
import { isFixtureError } from '../../packages/core/src/types/errors.js';

interface MatcherResult {
  pass: boolean;
  message: () => string;
  actual?: unknown;
  expected?: unknown;
}

// ================================================================================
// UTILITY FUNCTIONS
// ================================================================================

function describeThrown(error: unknown): string {
  if (isFixtureError(error)) return `${error.name} [${error.errorCode}]: ${error.message}`;
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

function messageMatches(actual: string, expected: string | RegExp): boolean {
  return typeof expected === 'string' ? actual.includes(expected) : expected.test(actual);
}

// ================================================================================
// CORE MATCHER FUNCTIONS
// ================================================================================

/**
 * Assert that calling `received` throws an engine error with the given code,
 * optionally with a message containing (or matching) `message`
 */
function toThrowFixtureError(
  received: unknown,
  code: ErrorCode,
  message?: string | RegExp
): MatcherResult {
  if (typeof received !== 'function') {
    return {
      pass: false,
      message: () => `Expected a function, but got ${typeof received}`,
    };
  }

  let thrown: unknown;
  let didThrow = false;
  try {
    received();
  } catch (error) {
    thrown = error;
    didThrow = true;
  }

  if (!didThrow) {
    return {
      pass: false,
      message: () => `Expected function to throw ${code}, but it returned normally`,
    };
  }

  const codeMatches = isFixtureError(thrown) && thrown.errorCode === code;
  const textMatches =
    message === undefined || (thrown instanceof Error && messageMatches(thrown.message, message));

  return {
    pass: codeMatches && textMatches,
    message: () =>
      codeMatches && textMatches
        ? `Expected function not to throw ${code}, but it threw ${describeThrown(thrown)}`
        : `Expected ${code}${message === undefined ? '' : ` with message ${String(message)}`}, but got ${describeThrown(thrown)}`,
    actual: describeThrown(thrown),
    expected: code,
  };
}

/**
 * Range validation matcher (inclusive)
 */
function toBeWithinRange(received: unknown, min: number, max: number): MatcherResult {
  const isNumber = typeof received === 'number' && !Number.isNaN(received);
  const isInRange = isNumber && received >= min && received <= max;

  return {
    pass: isInRange,
    message: () => {
      if (!isNumber) {
        return `Expected value to be a number, but got ${typeof received}`;
      }
      return `Expected ${received} to be within range [${min}, ${max}]`;
    },
    actual: received,
    expected: { min, max },
  };
}

export { toThrowFixtureError, toBeWithinRange };
