/**
 * Declarations run once the object exists.
 *
 * Callers reach them through overrides: `name: value` is the extracted
 * value, `name__key: value` lands in the extra mapping.
 */

import type { BuildStep } from '../builder/step.js';
import { InvalidDeclarationError } from '../types/errors.js';
import { createLogger, describeValue } from '../util/logger.js';
import {
  PostGenerationDeclaration,
  type DeclarationKind,
  type PostGenerationContext,
} from './base.js';
import { resolveFactoryRef, type FactoryRef } from './sub-factory.js';

const logger = createLogger('declarations');

// Method-shaped so that a function typed for one model is accepted where
// the declaration only knows `unknown`
interface PostGenerationSignature<I, R> {
  call(instance: I, create: boolean, extracted: unknown, extra: Record<string, unknown>): R;
}

export type PostGenerationFunction<I = unknown, R = unknown> = PostGenerationSignature<I, R>['call'];

export class PostGeneration<R = unknown> extends PostGenerationDeclaration {
  readonly kind: DeclarationKind = 'post-generation';
  readonly #fn: PostGenerationFunction<unknown, R>;

  constructor(fn: PostGenerationFunction<never, R>) {
    super();
    this.#fn = fn;
  }

  call(instance: unknown, step: BuildStep, context: PostGenerationContext): R {
    return this.#fn(instance, step.create, context.value, context.extra);
  }
}

/**
 * Call a method on the generated object.
 *
 * The extracted value, when given, replaces the declared arguments; extra
 * overrides merge over the declared keyword object, which is passed as a
 * last argument when non-empty.
 */
export class PostGenerationMethodCall extends PostGenerationDeclaration {
  readonly kind: DeclarationKind = 'post-generation-method-call';

  constructor(
    readonly methodName: string,
    private readonly args: readonly unknown[] = [],
    kwargs: Readonly<Record<string, unknown>> = {}
  ) {
    super(kwargs);
  }

  call(instance: unknown, _step: BuildStep, context: PostGenerationContext): unknown {
    const method: unknown =
      instance !== null && typeof instance === 'object'
        ? Reflect.get(instance, this.methodName)
        : undefined;
    if (typeof method !== 'function') {
      throw new InvalidDeclarationError({
        message: `postGenerationMethodCall: "${this.methodName}" is not a method of the generated object`,
        context: { attribute: this.methodName },
      });
    }
    const args = context.valueProvided ? [context.value] : [...this.args];
    if (Object.keys(context.extra).length > 0) args.push(context.extra);
    return Reflect.apply(method, instance, args);
  }
}

/**
 * Another object built after this one, optionally receiving it under
 * `relatedName`. Its result is collected, never passed to the model.
 */
export class RelatedFactory<T = unknown> extends PostGenerationDeclaration {
  readonly kind: DeclarationKind = 'related-factory';
  readonly #ref: FactoryRef<T>;

  constructor(
    ref: FactoryRef<T>,
    readonly relatedName = '',
    defaults: Readonly<Record<string, unknown>> = {}
  ) {
    super(defaults);
    this.#ref = ref;
  }

  protected override get unrollsContext(): boolean {
    return false;
  }

  call(instance: unknown, step: BuildStep, context: PostGenerationContext): unknown {
    const factory = resolveFactoryRef(this.#ref);
    if (context.valueProvided) {
      logger.debug(
        `relatedFactory: using provided ${describeValue(context.value)} instead of generating ${factory.name}`
      );
      return context.value;
    }

    const passed: Record<string, unknown> = { ...context.extra };
    if (this.relatedName) passed[this.relatedName] = instance;
    logger.debug(`relatedFactory: generating ${factory.name}(${describeValue(Object.keys(passed))})`);
    return step.recurse(factory, passed);
  }
}

/**
 * `size` related objects; a function size is evaluated on every call
 */
export class RelatedFactoryList<T = unknown> extends RelatedFactory<T> {
  override readonly kind: DeclarationKind = 'related-factory-list';

  constructor(
    ref: FactoryRef<T>,
    relatedName = '',
    readonly size: number | (() => number) = 2,
    defaults: Readonly<Record<string, unknown>> = {}
  ) {
    super(ref, relatedName, defaults);
  }

  override call(instance: unknown, step: BuildStep, context: PostGenerationContext): unknown[] {
    const count = typeof this.size === 'number' ? this.size : this.size();
    return Array.from({ length: count }, () => super.call(instance, step, context));
  }
}

export const postGeneration = <I = unknown, R = unknown>(
  fn: PostGenerationFunction<I, R>
): PostGeneration<R> => new PostGeneration(fn);

export const postGenerationMethodCall = (
  methodName: string,
  ...args: unknown[]
): PostGenerationMethodCall => new PostGenerationMethodCall(methodName, args);

export const relatedFactory = <T>(
  ref: FactoryRef<T>,
  relatedName?: string,
  defaults?: Readonly<Record<string, unknown>>
): RelatedFactory<T> => new RelatedFactory(ref, relatedName, defaults);

export const relatedFactoryList = <T>(
  ref: FactoryRef<T>,
  relatedName?: string,
  size?: number | (() => number),
  defaults?: Readonly<Record<string, unknown>>
): RelatedFactoryList<T> => new RelatedFactoryList(ref, relatedName, size, defaults);
