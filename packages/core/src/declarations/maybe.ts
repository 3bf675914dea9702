import type { BuildStep } from '../builder/step.js';
import type { Resolver } from '../builder/resolver.js';
import { BuilderPhase } from '../types/enums.js';
import { InvalidDeclarationError } from '../types/errors.js';
import { SelfAttribute } from './attributes.js';
import {
  BaseDeclaration,
  getBuilderPhase,
  INHERIT,
  isDeclaration,
  SKIP,
  type DeclarationKind,
} from './base.js';

// SKIP reads as false: a trait left off resolves to SKIP
const isChosen = (choice: unknown): boolean => choice !== SKIP && Boolean(choice);

/**
 * Pick one of two values depending on a decider.
 *
 * A string decider names an attribute of the object being built (missing
 * reads as undefined). Both branches must belong to the same phase; the
 * Maybe takes that phase.
 */
export class Maybe extends BaseDeclaration {
  readonly kind: DeclarationKind = 'maybe';
  readonly decider: BaseDeclaration;
  readonly #phase: BuilderPhase;

  constructor(
    decider: string | BaseDeclaration,
    readonly yes: unknown = SKIP,
    readonly no: unknown = SKIP
  ) {
    super();
    this.decider = isDeclaration(decider)
      ? decider
      : new SelfAttribute(decider, { default: undefined });

    const yesPhase = getBuilderPhase(yes);
    const noPhase = getBuilderPhase(no);
    if (yesPhase !== undefined && noPhase !== undefined && yesPhase !== noPhase) {
      throw new InvalidDeclarationError({
        message: `Inconsistent phases for maybe(): yes is ${yesPhase}, no is ${noPhase}`,
        context: { value: { yes: yesPhase, no: noPhase } },
      });
    }
    this.#phase = yesPhase ?? noPhase ?? BuilderPhase.ATTRIBUTE_RESOLUTION;
  }

  override get phase(): BuilderPhase {
    return this.#phase;
  }

  override get mayInherit(): boolean {
    return (
      this.#phase === BuilderPhase.ATTRIBUTE_RESOLUTION &&
      [this.yes, this.no].some((branch) =>
        isDeclaration(branch) ? branch.mayInherit : branch === INHERIT
      )
    );
  }

  override evaluatePre(
    resolver: Resolver,
    step: BuildStep,
    overrides: Readonly<Record<string, unknown>>
  ): unknown {
    const choice = this.decider.evaluatePre(resolver, step, {});
    const target = isChosen(choice) ? this.yes : this.no;
    return isDeclaration(target) ? target.evaluatePre(resolver, step, overrides) : target;
  }

  override evaluatePost(
    instance: unknown,
    step: BuildStep,
    overrides: Readonly<Record<string, unknown>>
  ): unknown {
    // Attribute-phase deciders read the resolver, where parameters are visible
    const choice =
      this.decider.phase === BuilderPhase.POST_INSTANTIATION
        ? this.decider.evaluatePost(instance, step, {})
        : this.decider.evaluatePre(step.stub, step, {});
    const target = isChosen(choice) ? this.yes : this.no;
    if (target === INHERIT) return SKIP;
    return isDeclaration(target) ? target.evaluatePost(instance, step, overrides) : target;
  }
}

export const maybe = (
  decider: string | BaseDeclaration,
  yes?: unknown,
  no?: unknown
): Maybe => new Maybe(decider, yes, no);
