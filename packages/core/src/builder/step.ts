/**
 * Per-invocation evaluation.
 *
 * A StepBuilder turns a factory plus caller overrides into one object:
 * 1. merge overrides into the factory's pre/post declaration sets
 * 2. pick the sequence number (forced, inherited from an unrolled parent,
 *    or drawn from the factory's counter)
 * 3. resolve every pre declaration through a BuildStep
 * 4. let the factory prepare arguments and instantiate
 * 5. run post declarations in order and hand their results to the factory;
 *    objects they build see this one as their factoryInstance
 */

import { isDeclaration } from '../declarations/base.js';
import { DictFactory, type Factory, type StubObject } from '../factory/factory.js';
import { InvalidDeclarationError } from '../types/errors.js';
import { CREATE_STRATEGY, FORCE_SEQUENCE_KEY, type Strategy } from '../types/enums.js';
import { createLogger, describeValue } from '../util/logger.js';
import { parseDeclarations, type DeclarationSet } from './declaration-set.js';
import { Resolver } from './resolver.js';

const logger = createLogger('generate');

/** What a step knows about the builder driving it */
export interface StepContext {
  readonly factory: { readonly name: string };
  readonly strategy: Strategy;
}

/**
 * The factory side of a build: declarations, counter, argument
 * preparation and instantiation of an `I`
 */
export interface StepTarget<I> {
  readonly name: string;
  readonly preDeclarations: DeclarationSet;
  readonly postDeclarations: DeclarationSet;
  nextSequence(): number;
  prepareArguments(attributes: Readonly<Record<string, unknown>>): [unknown[], Record<string, unknown>];
  instantiate(step: BuildStep, args: unknown[], kwargs: Record<string, unknown>): I;
  usePostGenerationResults(step: BuildStep, instance: I, results: Record<string, unknown>): void;
}

export class BuildStep {
  readonly attributes: Record<string, unknown> = {};
  readonly stub: Resolver;
  /** The object built by this step; undefined until instantiated */
  instance: unknown = undefined;
  readonly #declarations: DeclarationSet;

  constructor(
    readonly builder: StepContext,
    readonly sequence: number,
    declarations: DeclarationSet,
    readonly parentStep?: BuildStep
  ) {
    this.stub = new Resolver(declarations, this);
    this.#declarations = declarations;
  }

  /** Whether the step runs under the create strategy */
  get create(): boolean {
    return this.builder.strategy === CREATE_STRATEGY;
  }

  /** This object's resolver followed by those of its enclosing objects */
  get chain(): Resolver[] {
    return [this.stub, ...(this.parentStep?.chain ?? [])];
  }

  resolve(): void {
    for (const name of this.#declarations.sorted()) {
      this.attributes[name] = this.stub.get(name);
    }
  }

  /**
   * Build a nested object with its factory's own strategy, this step
   * becoming its parent
   */
  recurse<U>(
    factory: Factory<U>,
    extras: Readonly<Record<string, unknown>>,
    forceSequence?: number
  ): U | StubObject {
    return factory.generateWithin(this, extras, forceSequence);
  }

  /** Evaluate a context holding declarations, sharing this step's sequence */
  unroll(context: Readonly<Record<string, unknown>>): Record<string, unknown> {
    return this.recurse(DictFactory, context, this.sequence);
  }
}

function readForcedSequence(extras: Readonly<Record<string, unknown>>): number | undefined {
  const forced = extras[FORCE_SEQUENCE_KEY];
  if (forced === undefined) return undefined;
  if (typeof forced !== 'number' || !Number.isInteger(forced)) {
    throw new InvalidDeclarationError({
      message: `${FORCE_SEQUENCE_KEY} must be an integer, got ${describeValue(forced)}`,
      context: { attribute: FORCE_SEQUENCE_KEY, value: forced },
    });
  }
  return forced;
}

export class StepBuilder<I> implements StepContext {
  readonly extras: Readonly<Record<string, unknown>>;
  readonly #forcedSequence: number | undefined;

  constructor(
    readonly factory: StepTarget<I>,
    extras: Readonly<Record<string, unknown>>,
    readonly strategy: Strategy
  ) {
    this.#forcedSequence = readForcedSequence(extras);
    const { [FORCE_SEQUENCE_KEY]: _forced, ...rest } = extras;
    this.extras = rest;
  }

  build(parentStep?: BuildStep, forceSequence?: number): I {
    const [pre, post] = parseDeclarations(
      this.extras,
      this.factory.preDeclarations,
      this.factory.postDeclarations
    );

    const sequence =
      this.#forcedSequence ?? forceSequence ?? this.factory.nextSequence();

    if (logger.isEnabled('debug')) {
      logger.debug(
        `Preparing ${this.factory.name}(extra=${describeValue(this.extras)}) with sequence ${sequence}`
      );
    }

    const step = new BuildStep(this, sequence, pre, parentStep);
    step.resolve();

    const [args, kwargs] = this.factory.prepareArguments(step.attributes);
    const instance = this.factory.instantiate(step, args, kwargs);
    step.instance = instance;

    const results: Record<string, unknown> = {};
    for (const name of post.sorted()) {
      const entry = post.get(name);
      if (!entry) continue;
      results[name] = isDeclaration(entry.declaration)
        ? entry.declaration.evaluatePost(instance, step, entry.context)
        : entry.declaration;
    }

    this.factory.usePostGenerationResults(step, instance, results);
    return instance;
  }

  toString(): string {
    return `<StepBuilder(${this.factory.name}, strategy=${this.strategy})>`;
  }
}
