import type { BuildStep } from '../builder/step.js';
import type { Factory, StubObject } from '../factory/factory.js';
import { AttributeDeclaration, type DeclarationKind } from './base.js';

/**
 * A factory, or a function returning one for factories declared later
 * (self references, mutual references)
 */
export type FactoryRef<T> = Factory<T> | (() => Factory<T>);

export function resolveFactoryRef<T>(ref: FactoryRef<T>): Factory<T> {
  return typeof ref === 'function' ? ref() : ref;
}

/**
 * Nested object built by another factory.
 *
 * The declaration's defaults and the caller's `<name>__<key>` overrides
 * are forwarded as that factory's overrides.
 */
export class SubFactory<T = unknown> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'sub-factory';
  readonly #ref: FactoryRef<T>;

  constructor(
    ref: FactoryRef<T>,
    defaults: Readonly<Record<string, unknown>> = {},
    /** Reuse the parent's sequence number instead of drawing one */
    private readonly forceSequence = false
  ) {
    super(defaults);
    this.#ref = ref;
  }

  protected override get unrollsContext(): boolean {
    return false;
  }

  get factory(): Factory<T> {
    return resolveFactoryRef(this.#ref);
  }

  protected evaluate(
    _resolver: unknown,
    step: BuildStep,
    extra: Record<string, unknown>
  ): T | StubObject {
    return step.recurse(
      this.factory,
      extra,
      this.forceSequence ? step.sequence : undefined
    );
  }
}

export const subFactory = <T>(
  ref: FactoryRef<T>,
  defaults?: Readonly<Record<string, unknown>>
): SubFactory<T> => new SubFactory(ref, defaults);
