/**
 * Factory options: validation and resolution along the inheritance chain.
 *
 * Each option resolves as the explicit value, else (for inheritable
 * options) the base factory's resolved value, else its default.
 */

import Ajv, { type ErrorObject } from 'ajv';
import { ErrorCode } from '../errors/codes.js';
import { STRATEGIES, type Strategy } from '../types/enums.js';
import {
  DefinitionError,
  UnknownStrategyError,
  type FixtureError,
} from '../types/errors.js';
import { err, ok, unwrap, type Result } from '../types/result.js';
import { BaseIntrospector, type IntrospectorConstructor } from './introspector.js';

/** Any class; arguments are whatever the build/create hooks pass */
export type ModelClass<T> = new (...args: never) => T;

export interface FactoryOptionsInput<T> {
  /** Class instantiated by build/create; leaving it out makes the factory abstract */
  model?: ModelClass<T>;
  abstract?: boolean;
  /** Strategy used by Factory.call() and by sub-factories (default 'create') */
  strategy?: Strategy;
  /** Attributes passed positionally, in this order */
  inlineArgs?: readonly string[];
  /** Attributes resolved but never passed to the model */
  exclude?: readonly string[];
  /** Declared name → argument name */
  rename?: Readonly<Record<string, string>>;
  introspector?: IntrospectorConstructor;
  defaultAutoFields?: boolean;
  includeAutoFields?: readonly string[];
  excludeAutoFields?: readonly string[];
}

export interface FactoryOptions<T> {
  readonly model: ModelClass<T> | undefined;
  readonly abstract: boolean;
  readonly strategy: Strategy;
  readonly inlineArgs: readonly string[];
  readonly exclude: readonly string[];
  readonly rename: Readonly<Record<string, string>>;
  readonly introspector: IntrospectorConstructor;
  readonly defaultAutoFields: boolean;
  readonly includeAutoFields: readonly string[];
  readonly excludeAutoFields: readonly string[];
}

export const DEFAULT_FACTORY_OPTIONS: Omit<FactoryOptions<unknown>, 'model'> = {
  abstract: false,
  strategy: 'create',
  inlineArgs: [],
  exclude: [],
  rename: {},
  introspector: BaseIntrospector,
  defaultAutoFields: false,
  includeAutoFields: [],
  excludeAutoFields: [],
};

const stringList = { type: 'array', items: { type: 'string' } } as const;

const OPTIONS_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    model: {},
    abstract: { type: 'boolean' },
    strategy: { type: 'string', enum: [...STRATEGIES] },
    inlineArgs: stringList,
    exclude: stringList,
    rename: { type: 'object', additionalProperties: { type: 'string' } },
    introspector: {},
    defaultAutoFields: { type: 'boolean' },
    includeAutoFields: stringList,
    excludeAutoFields: stringList,
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: true });
const validateSchema = ajv.compile<Record<string, unknown>>(OPTIONS_SCHEMA);

function toDefinitionError(factory: string, input: Record<string, unknown>, errors: ErrorObject[]): FixtureError {
  const unknown = errors
    .filter((error) => error.keyword === 'additionalProperties')
    .map((error) => String(error.params.additionalProperty))
    .sort();
  if (unknown.length > 0) {
    return new DefinitionError({
      message: `Options for ${factory} got unknown attribute(s) ${unknown.join(',')}`,
      errorCode: ErrorCode.UNKNOWN_OPTION,
      context: { factory, attributes: unknown },
    });
  }

  if (errors.some((error) => error.instancePath === '/strategy')) {
    return new UnknownStrategyError(input.strategy, factory);
  }

  const details = errors.map((error) => `${error.instancePath || 'options'} ${error.message ?? 'is invalid'}`);
  return new DefinitionError({
    message: `Invalid options for ${factory}: ${details.join('; ')}`,
    errorCode: ErrorCode.INVALID_OPTION_VALUE,
    context: { factory, attributes: errors.map((error) => error.instancePath) },
  });
}

/**
 * Check an options block; undefined entries count as absent
 */
export function validateFactoryOptions(factory: string, input: unknown): Result<void, FixtureError> {
  if (input === undefined) return ok(undefined);
  if (input === null || typeof input !== 'object' || Array.isArray(input)) {
    return err(
      new DefinitionError({
        message: `Options for ${factory} must be an object`,
        context: { factory, value: input },
      })
    );
  }

  const defined = Object.fromEntries(
    Object.entries(input).filter(([, value]) => value !== undefined)
  );
  if (!validateSchema(defined)) {
    return err(toDefinitionError(factory, defined, validateSchema.errors ?? []));
  }

  for (const key of ['model', 'introspector'] as const) {
    if (key in defined && typeof defined[key] !== 'function') {
      return err(
        new DefinitionError({
          message: `Option ${key} of ${factory} must be a class`,
          errorCode: ErrorCode.INVALID_OPTION_VALUE,
          context: { factory, attributes: [key] },
        })
      );
    }
  }
  return ok(undefined);
}

/**
 * Resolve options against the base factory's resolved options.
 * A factory without a model is always abstract.
 */
export function resolveFactoryOptions<T>(
  factory: string,
  input: FactoryOptionsInput<T> = {},
  base?: FactoryOptions<T>
): FactoryOptions<T> {
  unwrap(validateFactoryOptions(factory, input));

  const model = input.model ?? base?.model;
  return {
    model,
    abstract: model === undefined || (input.abstract ?? DEFAULT_FACTORY_OPTIONS.abstract),
    strategy: input.strategy ?? base?.strategy ?? DEFAULT_FACTORY_OPTIONS.strategy,
    inlineArgs: input.inlineArgs ?? base?.inlineArgs ?? DEFAULT_FACTORY_OPTIONS.inlineArgs,
    exclude: input.exclude ?? base?.exclude ?? DEFAULT_FACTORY_OPTIONS.exclude,
    rename: input.rename ?? base?.rename ?? DEFAULT_FACTORY_OPTIONS.rename,
    introspector: input.introspector ?? base?.introspector ?? DEFAULT_FACTORY_OPTIONS.introspector,
    defaultAutoFields:
      input.defaultAutoFields ?? base?.defaultAutoFields ?? DEFAULT_FACTORY_OPTIONS.defaultAutoFields,
    // Accumulated along the whole ancestry by the factory itself
    includeAutoFields: input.includeAutoFields ?? DEFAULT_FACTORY_OPTIONS.includeAutoFields,
    excludeAutoFields: input.excludeAutoFields ?? DEFAULT_FACTORY_OPTIONS.excludeAutoFields,
  };
}
