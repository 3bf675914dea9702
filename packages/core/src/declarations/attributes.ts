/**
 * Attribute declarations resolved before instantiation
 */

import type { BuildStep } from '../builder/step.js';
import { Resolver } from '../builder/resolver.js';
import {
  InvalidDeclarationError,
  UnknownAttributeError,
} from '../types/errors.js';
import { AttributeDeclaration, type DeclarationKind } from './base.js';

/**
 * Value of a zero-argument function, called once per generated object
 */
export class LazyFunction<R = unknown> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'lazy-function';

  constructor(private readonly fn: () => R) {
    super();
  }

  protected evaluate(): R {
    return this.fn();
  }
}

/**
 * Value computed from the object being built
 */
export class LazyAttribute<R = unknown> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'lazy-attribute';

  constructor(private readonly fn: (obj: Resolver) => R) {
    super();
  }

  protected evaluate(resolver: Resolver): R {
    return this.fn(resolver);
  }
}

const NO_DEFAULT: unique symbol = Symbol('graphsmith.no-default');

function readSegment(target: unknown, segment: string): unknown {
  if (target instanceof Resolver) return target.get(segment);
  if (target !== null && target !== undefined && segment in Object(target)) {
    return Reflect.get(Object(target), segment);
  }
  throw new UnknownAttributeError({
    message: `Cannot read "${segment}" from ${target === null ? 'null' : typeof target}`,
    context: { attribute: segment },
  });
}

/**
 * Walk a dotted path; an empty path returns the target itself
 */
export function deepGet(target: unknown, path: string): unknown {
  if (path === '') return target;
  return path.split('.').reduce<unknown>(readSegment, target);
}

export interface SelfAttributeOptions {
  default?: unknown;
}

/**
 * Copy of another attribute.
 *
 * Each leading dot beyond the first climbs to an enclosing factory:
 * `'name'` reads this object, `'..name'` the object whose sub-factory is
 * being built.
 */
export class SelfAttribute extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'self-attribute';
  readonly depth: number;
  readonly attributeName: string;
  readonly #default: unknown;

  constructor(path: string, options: SelfAttributeOptions = {}) {
    super();
    const name = path.replace(/^\.+/, '');
    this.depth = path.length - name.length;
    this.attributeName = name;
    this.#default = 'default' in options ? options.default : NO_DEFAULT;
  }

  protected evaluate(resolver: Resolver, step: BuildStep): unknown {
    let target: unknown = resolver;
    if (this.depth > 1) {
      target = step.chain[this.depth - 1];
      if (target === undefined) {
        if (this.#default !== NO_DEFAULT) return this.#default;
        throw new UnknownAttributeError({
          message: `No enclosing factory ${this.depth - 1} level(s) above ${resolver.factoryName} for "${this.attributeName}"`,
          context: { factory: resolver.factoryName, attribute: this.attributeName },
        });
      }
    }

    if (this.#default === NO_DEFAULT) return deepGet(target, this.attributeName);
    try {
      return deepGet(target, this.attributeName);
    } catch (error) {
      if (error instanceof UnknownAttributeError) return this.#default;
      throw error;
    }
  }
}

/**
 * Iterator that replays the values it has already produced after reset()
 */
class ResettableIterator<T> {
  readonly #past: T[] = [];
  #position = 0;

  constructor(private readonly source: Iterator<T>) {}

  next(): IteratorResult<T> {
    if (this.#position < this.#past.length) {
      const value = this.#past[this.#position];
      this.#position += 1;
      return { done: false, value };
    }
    const result = this.source.next();
    if (!result.done) {
      this.#past.push(result.value);
      this.#position += 1;
    }
    return result;
  }

  reset(): void {
    this.#position = 0;
  }
}

function* cycleOver<T>(iterable: Iterable<T>): Generator<T> {
  const saved: T[] = [];
  for (const value of iterable) {
    saved.push(value);
    yield value;
  }
  while (saved.length > 0) yield* saved;
}

export interface IteratorOptions<T, R> {
  /** Restart from the first value once exhausted (default true) */
  cycle?: boolean;
  getter?: (value: T) => R;
}

/**
 * Successive values of an iterable, one per generated object
 */
export class IteratorDeclaration<T = unknown, R = T> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'iterator';
  #iterator: ResettableIterator<T> | undefined;
  readonly #build: () => ResettableIterator<T>;
  readonly #getter: ((value: T) => R) | undefined;

  constructor(iterable: Iterable<T>, options: IteratorOptions<T, R> = {}) {
    super();
    const { cycle = true } = options;
    this.#getter = options.getter;
    this.#build = () =>
      new ResettableIterator(
        cycle ? cycleOver(iterable) : iterable[Symbol.iterator]()
      );
  }

  protected evaluate(): T | R {
    this.#iterator ??= this.#build();
    const result = this.#iterator.next();
    if (result.done) {
      throw new InvalidDeclarationError({
        message: 'Iterator declaration is exhausted',
        context: { kind: this.kind },
      });
    }
    return this.#getter ? this.#getter(result.value) : result.value;
  }

  /** Start again from the first value */
  reset(): void {
    this.#iterator?.reset();
  }
}

/**
 * Value derived from the factory's sequence number
 */
export class Sequence<R = unknown> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'sequence';

  constructor(private readonly fn: (n: number) => R) {
    super();
  }

  protected evaluate(_resolver: Resolver, step: BuildStep): R {
    return this.fn(step.sequence);
  }
}

export class LazyAttributeSequence<R = unknown> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'lazy-attribute-sequence';

  constructor(private readonly fn: (obj: Resolver, n: number) => R) {
    super();
  }

  protected evaluate(resolver: Resolver, step: BuildStep): R {
    return this.fn(resolver, step.sequence);
  }
}

export interface ContainerAttributeOptions {
  /** Fail when used outside a sub-factory (default true) */
  strict?: boolean;
}

/**
 * Value computed from the object and the chain of objects enclosing it,
 * nearest first
 */
export class ContainerAttribute<R = unknown> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'container-attribute';
  readonly strict: boolean;

  constructor(
    private readonly fn: (obj: Resolver, containers: readonly Resolver[]) => R,
    options: ContainerAttributeOptions = {}
  ) {
    super();
    this.strict = options.strict ?? true;
  }

  protected evaluate(resolver: Resolver, step: BuildStep): R {
    const containers = step.chain.slice(1);
    if (this.strict && containers.length === 0) {
      throw new InvalidDeclarationError({
        message: 'A strict containerAttribute can only be used within a subFactory',
        context: { factory: resolver.factoryName },
      });
    }
    return this.fn(resolver, containers);
  }
}

export const lazyFunction = <R>(fn: () => R): LazyFunction<R> => new LazyFunction(fn);

export const lazyAttribute = <R>(fn: (obj: Resolver) => R): LazyAttribute<R> =>
  new LazyAttribute(fn);

export const selfAttribute = (path: string, options?: SelfAttributeOptions): SelfAttribute =>
  new SelfAttribute(path, options);

export const iterator = <T, R = T>(
  iterable: Iterable<T>,
  options?: IteratorOptions<T, R>
): IteratorDeclaration<T, R> => new IteratorDeclaration(iterable, options);

export const sequence = <R>(fn: (n: number) => R): Sequence<R> => new Sequence(fn);

export const lazyAttributeSequence = <R>(
  fn: (obj: Resolver, n: number) => R
): LazyAttributeSequence<R> => new LazyAttributeSequence(fn);

export const containerAttribute = <R>(
  fn: (obj: Resolver, containers: readonly Resolver[]) => R,
  options?: ContainerAttributeOptions
): ContainerAttribute<R> => new ContainerAttribute(fn, options);
