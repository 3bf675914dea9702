/**
 * Shortcuts around defineFactory
 */

import type { Strategy } from '../types/enums.js';
import {
  configureEngine,
  getEngineOptions,
  type LogSink,
} from '../types/options.js';
import { defineFactory, type Factory, type StubObject } from './factory.js';
import type { IntrospectorConstructor } from './introspector.js';
import type { ModelClass } from './options.js';

type Declarations = Readonly<Record<string, unknown>>;

/**
 * Factory named `<Model>Factory` with the given declarations
 */
export function makeFactory<T>(
  model: ModelClass<T>,
  declarations: Declarations = {},
  parents: readonly Factory<unknown>[] = []
): Factory<T> {
  return defineFactory<T>({
    name: `${model.name}Factory`,
    parents,
    options: { model },
    declarations,
  });
}

export function build<T>(model: ModelClass<T>, declarations?: Declarations): T {
  return makeFactory(model, declarations).build();
}

export function buildBatch<T>(model: ModelClass<T>, size: number, declarations?: Declarations): T[] {
  return makeFactory(model, declarations).buildBatch(size);
}

export function create<T>(model: ModelClass<T>, declarations?: Declarations): T {
  return makeFactory(model, declarations).create();
}

export function createBatch<T>(model: ModelClass<T>, size: number, declarations?: Declarations): T[] {
  return makeFactory(model, declarations).createBatch(size);
}

export function stub<T>(model: ModelClass<T>, declarations?: Declarations): StubObject {
  return makeFactory(model, declarations).stub();
}

export function stubBatch<T>(model: ModelClass<T>, size: number, declarations?: Declarations): StubObject[] {
  return makeFactory(model, declarations).stubBatch(size);
}

export function generate<T>(
  model: ModelClass<T>,
  strategy: Strategy,
  declarations?: Declarations
): T | StubObject {
  return makeFactory(model, declarations).generate(strategy);
}

export function generateBatch<T>(
  model: ModelClass<T>,
  strategy: Strategy,
  size: number,
  declarations?: Declarations
): Array<T | StubObject> {
  return makeFactory(model, declarations).generateBatch(strategy, size);
}

export function simpleGenerate<T>(model: ModelClass<T>, create: boolean, declarations?: Declarations): T {
  return makeFactory(model, declarations).simpleGenerate(create);
}

export function simpleGenerateBatch<T>(
  model: ModelClass<T>,
  create: boolean,
  size: number,
  declarations?: Declarations
): T[] {
  return makeFactory(model, declarations).simpleGenerateBatch(create, size);
}

/**
 * Child factory differing only by its default strategy; it shares the
 * parent's sequence counter
 */
export function useStrategy<T>(factory: Factory<T>, strategy: Strategy): Factory<T> {
  return defineFactory<T>({
    name: factory.name,
    parents: [factory],
    options: { strategy },
  });
}

export interface AutoFactoryOptions {
  defaultAutoFields?: boolean;
  includeAutoFields?: readonly string[];
  excludeAutoFields?: readonly string[];
  introspector?: IntrospectorConstructor;
  /** Explicit declarations; they take precedence over derived ones */
  declarations?: Declarations;
  parents?: readonly Factory<unknown>[];
}

/**
 * Factory named `<Model>AutoFactory` whose declarations come from the
 * introspector
 */
export function autoFactory<T>(model: ModelClass<T>, options: AutoFactoryOptions = {}): Factory<T> {
  const { defaultAutoFields = true, includeAutoFields = [], excludeAutoFields = [] } = options;
  return defineFactory<T>({
    name: `${model.name}AutoFactory`,
    parents: options.parents,
    options: {
      model,
      defaultAutoFields,
      includeAutoFields,
      excludeAutoFields,
      ...(options.introspector ? { introspector: options.introspector } : {}),
    },
    declarations: options.declarations,
  });
}

/**
 * Run `fn` with debug logging enabled, optionally into another sink
 */
export function debug<R>(fn: () => R, sink?: LogSink): R {
  const previous = getEngineOptions();
  configureEngine({ logLevel: 'debug', logSink: sink ?? previous.logSink });
  try {
    return fn();
  } finally {
    configureEngine({ logLevel: previous.logLevel, logSink: previous.logSink });
  }
}
