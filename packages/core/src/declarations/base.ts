/**
 * Declaration base classes
 *
 * A declaration is any value of the BaseDeclaration hierarchy placed in a
 * factory's declarations; every other value is a constant. Declarations run
 * in one of two phases: attribute resolution (before the target is
 * instantiated) or post instantiation.
 */

import type { BuildStep } from '../builder/step.js';
import type { Resolver } from '../builder/resolver.js';
import { BuilderPhase } from '../types/enums.js';
import { InvalidDeclarationError } from '../types/errors.js';

/** Omit the attribute from the resolved keyword mapping */
export const SKIP: unique symbol = Symbol('graphsmith.skip');
export type Skip = typeof SKIP;

/**
 * Keep whatever the override carrying this value replaced: the
 * sub-factory default, else the declaration of the nested factory, else
 * nothing (read as SKIP)
 */
export const INHERIT: unique symbol = Symbol('graphsmith.inherit');

export type DeclarationKind =
  | 'lazy-function'
  | 'lazy-attribute'
  | 'self-attribute'
  | 'iterator'
  | 'sequence'
  | 'lazy-attribute-sequence'
  | 'container-attribute'
  | 'sub-factory'
  | 'dict'
  | 'list'
  | 'maybe'
  | 'fallback'
  | 'faker'
  | 'fuzzy'
  | 'post-generation'
  | 'post-generation-method-call'
  | 'related-factory'
  | 'related-factory-list';

// Declarations are ordered by creation, mirroring the order they were written
let creationCounter = 0;

export function nextCreationIndex(): number {
  creationCounter += 1;
  return creationCounter;
}

export abstract class BaseDeclaration {
  abstract readonly kind: DeclarationKind;
  readonly creationIndex: number = nextCreationIndex();

  /**
   * @param defaults - context entries merged beneath caller overrides
   */
  constructor(protected readonly defaults: Readonly<Record<string, unknown>> = {}) {}

  get phase(): BuilderPhase {
    return BuilderPhase.ATTRIBUTE_RESOLUTION;
  }

  /** Whether evaluating this declaration may yield INHERIT */
  get mayInherit(): boolean {
    return false;
  }

  /** Whether declarations inside the context are evaluated before use */
  protected get unrollsContext(): boolean {
    return true;
  }

  /**
   * Merge defaults and overrides; when any entry is itself a declaration,
   * evaluate the whole context as a plain object sharing the step's
   * sequence number.
   */
  unrollContext(
    step: BuildStep,
    context: Readonly<Record<string, unknown>>
  ): Record<string, unknown> {
    const fullContext: Record<string, unknown> = { ...this.defaults };
    for (const [key, value] of Object.entries(context)) {
      fullContext[key] = key in this.defaults ? withFallback(value, this.defaults[key]) : value;
    }
    if (!this.unrollsContext) return fullContext;
    if (!Object.values(fullContext).some(isDeclaration)) return fullContext;
    return step.unroll(fullContext);
  }

  evaluatePre(
    _resolver: Resolver,
    _step: BuildStep,
    _overrides: Readonly<Record<string, unknown>>
  ): unknown {
    throw new InvalidDeclarationError({
      message: `A ${this.kind} declaration cannot be evaluated before instantiation`,
      context: { kind: this.kind },
    });
  }

  evaluatePost(
    _instance: unknown,
    _step: BuildStep,
    _overrides: Readonly<Record<string, unknown>>
  ): unknown {
    throw new InvalidDeclarationError({
      message: `A ${this.kind} declaration cannot be evaluated after instantiation`,
      context: { kind: this.kind },
    });
  }
}

/**
 * Declarations computing an attribute value before instantiation
 */
export abstract class AttributeDeclaration extends BaseDeclaration {
  override evaluatePre(
    resolver: Resolver,
    step: BuildStep,
    overrides: Readonly<Record<string, unknown>>
  ): unknown {
    const context = this.unrollContext(step, overrides);
    return this.evaluate(resolver, step, context);
  }

  protected abstract evaluate(
    resolver: Resolver,
    step: BuildStep,
    extra: Record<string, unknown>
  ): unknown;
}

export interface PostGenerationContext {
  /** Whether the caller passed a value for the declaration itself */
  valueProvided: boolean;
  /** That value, undefined when nothing was extracted */
  value: unknown;
  /** Remaining `<name>__<key>` overrides */
  extra: Record<string, unknown>;
}

/**
 * Declarations run once the target object exists; their results are
 * collected and never passed to the constructor.
 */
export abstract class PostGenerationDeclaration extends BaseDeclaration {
  override get phase(): BuilderPhase {
    return BuilderPhase.POST_INSTANTIATION;
  }

  override evaluatePost(
    instance: unknown,
    step: BuildStep,
    overrides: Readonly<Record<string, unknown>>
  ): unknown {
    const context = this.unrollContext(step, overrides);
    const { '': value, ...extra } = context;
    return this.call(instance, step, {
      valueProvided: '' in context,
      value,
      extra,
    });
  }

  abstract call(
    instance: unknown,
    step: BuildStep,
    context: PostGenerationContext
  ): unknown;
}

export function isDeclaration(value: unknown): value is BaseDeclaration {
  return value instanceof BaseDeclaration;
}

/**
 * An override that falls back to the value it replaced when it evaluates
 * to INHERIT
 */
export class Fallback extends BaseDeclaration {
  readonly kind: DeclarationKind = 'fallback';

  constructor(
    readonly override: BaseDeclaration,
    readonly replaced: unknown
  ) {
    super();
  }

  override get mayInherit(): boolean {
    return isDeclaration(this.replaced) ? this.replaced.mayInherit : this.replaced === INHERIT;
  }

  override evaluatePre(
    resolver: Resolver,
    step: BuildStep,
    overrides: Readonly<Record<string, unknown>>
  ): unknown {
    const value = this.override.evaluatePre(resolver, step, overrides);
    if (value !== INHERIT) return value;
    return isDeclaration(this.replaced)
      ? this.replaced.evaluatePre(resolver, step, overrides)
      : this.replaced;
  }
}

/** Wrap `override` in a Fallback when it may yield INHERIT */
export function withFallback(override: unknown, replaced: unknown): unknown {
  return isDeclaration(override) && override.mayInherit ? new Fallback(override, replaced) : override;
}

/** Phase of a declaration, undefined for constants */
export function getBuilderPhase(value: unknown): BuilderPhase | undefined {
  return isDeclaration(value) ? value.phase : undefined;
}
