import { describe, it, expect } from 'vitest';
/**
 * Tests for the error hierarchy
 */

import {
  AbstractFactoryError,
  CyclicDefinitionError,
  DefinitionError,
  FixtureError,
  SequenceOwnershipError,
  UnknownStrategyError,
  UnsupportedStrategyError,
  isFixtureError,
} from '../errors.js';
import { ErrorCode } from '../../errors/codes.js';

describe('Error Hierarchy', () => {
  describe('FixtureError base class', () => {
    class TestError extends FixtureError {
      constructor(message: string, context?: Record<string, unknown>) {
        super({ message, context }, ErrorCode.INTERNAL_ERROR);
      }
    }

    it('creates error with default code and severity', () => {
      const error = new TestError('Test message');

      expect(error.message).toBe('Test message');
      expect(error.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.severity).toBe('error');
      expect(error.name).toBe('TestError');
      expect(error).toBeInstanceOf(Error);
    });

    it('keeps context and cause', () => {
      const cause = new Error('root cause');
      const error = new DefinitionError({
        message: 'Higher level',
        errorCode: ErrorCode.CONFIGURATION_ERROR,
        context: { factory: 'UserFactory', value: { password: 'test-secret' } },
        cause,
      });

      expect(error.context).toMatchObject({ factory: 'UserFactory' });
      expect(error.cause?.message).toBe('root cause');
      expect(error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
    });

    it('serializes differently for dev and prod', () => {
      const error = new DefinitionError({
        message: 'Serialize me',
        context: { value: { password: 'test-secret', nested: [{ token: 'x' }], safe: 'ok' } },
      });

      const devJson = error.toJSON('dev');
      const prodJson = error.toJSON('prod');

      expect(devJson.stack).toBeDefined();
      expect(devJson.context?.value).toEqual({
        password: 'test-secret',
        nested: [{ token: 'x' }],
        safe: 'ok',
      });

      expect(prodJson.stack).toBeUndefined();
      expect(prodJson.context?.value).toEqual({
        password: '[REDACTED]',
        nested: [{ token: '[REDACTED]' }],
        safe: 'ok',
      });
      expect(prodJson.errorCode).toBe(ErrorCode.INVALID_OPTION_VALUE);
    });

    it('exposes a minimal user view', () => {
      const error = new AbstractFactoryError('BaseFactory');

      expect(error.toUserError()).toEqual({
        message: error.message,
        code: ErrorCode.ABSTRACT_FACTORY,
        severity: 'error',
        factory: 'BaseFactory',
      });
    });
  });

  describe('specific errors', () => {
    it('UnknownStrategyError names the strategy and factory', () => {
      const error = new UnknownStrategyError('persist', 'UserFactory');

      expect(error.message).toBe(
        'Unknown strategy "persist" on UserFactory; expected one of "build", "create", "stub"'
      );
      expect(error.errorCode).toBe(ErrorCode.UNKNOWN_STRATEGY);
    });

    it('UnsupportedStrategyError', () => {
      const error = new UnsupportedStrategyError('create', 'StubFactory');

      expect(error.message).toBe('StubFactory does not support the "create" strategy');
      expect(error.errorCode).toBe(ErrorCode.UNSUPPORTED_STRATEGY);
    });

    it('CyclicDefinitionError exposes the offending attributes', () => {
      const error = new CyclicDefinitionError({
        message: 'cycle',
        context: { attributes: ['a', 'b'] },
      });

      expect(error.attributes).toEqual(['a', 'b']);
      expect(error.errorCode).toBe(ErrorCode.CYCLIC_PARAMETERS);
      expect(new CyclicDefinitionError({ message: 'empty' }).attributes).toEqual([]);
    });

    it('SequenceOwnershipError exposes the owner', () => {
      const error = new SequenceOwnershipError('AdminFactory', 'UserFactory');

      expect(error.owner).toBe('UserFactory');
      expect(error.message).toBe(
        "Can't reset a sequence on descendant factory AdminFactory; reset sequence on UserFactory or use { force: true }"
      );
    });
  });

  describe('isFixtureError', () => {
    it('recognizes engine errors only', () => {
      expect(isFixtureError(new AbstractFactoryError('F'))).toBe(true);
      expect(isFixtureError(new Error('plain'))).toBe(false);
      expect(isFixtureError('string')).toBe(false);
    });
  });
});
