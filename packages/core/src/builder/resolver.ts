/**
 * Lazy view over the attributes of the object being built.
 *
 * Lazy declarations receive a Resolver and read sibling attributes through
 * it; each attribute is evaluated on first access and cached for the rest
 * of the step.
 */

import { INHERIT, isDeclaration, SKIP } from '../declarations/base.js';
import { ErrorCode } from '../errors/codes.js';
import {
  CyclicDefinitionError,
  UnknownAttributeError,
} from '../types/errors.js';
import type { DeclarationSet } from './declaration-set.js';
import type { BuildStep } from './step.js';

export class Resolver {
  readonly #declarations: DeclarationSet;
  readonly #step: BuildStep;
  readonly #values = new Map<string, unknown>();
  readonly #pending: string[] = [];

  constructor(declarations: DeclarationSet, step: BuildStep) {
    this.#declarations = declarations;
    this.#step = step;
  }

  get factoryName(): string {
    return this.#step.builder.factory.name;
  }

  /** Resolver of the object whose sub-factory is building this one */
  get factoryParent(): Resolver | undefined {
    return this.#step.parentStep?.stub;
  }

  /**
   * Object built by the enclosing step. Set for related factories, which
   * run once it exists; undefined inside a sub-factory.
   */
  get factoryInstance(): unknown {
    return this.#step.parentStep?.instance;
  }

  get sequence(): number {
    return this.#step.sequence;
  }

  has(name: string): boolean {
    return this.#values.has(name) || this.#declarations.has(name);
  }

  get(name: string): unknown {
    if (this.#values.has(name)) return this.#values.get(name);

    const entry = this.#declarations.get(name);
    if (!entry) {
      throw new UnknownAttributeError({
        message: `${this.factoryName} has no attribute "${name}" (declared: ${this.#declarations.names().join(', ') || 'none'})`,
        context: { factory: this.factoryName, attribute: name },
      });
    }

    if (this.#pending.includes(name)) {
      const cycle = [...this.#pending.slice(this.#pending.indexOf(name)), name];
      throw new CyclicDefinitionError({
        message: `Cyclic lazy attribute definition for "${name}" on ${this.factoryName}; cycle found in ${cycle.join(' -> ')}`,
        errorCode: ErrorCode.CYCLIC_ATTRIBUTE,
        context: { factory: this.factoryName, attribute: name, attributes: cycle },
      });
    }

    this.#pending.push(name);
    let value: unknown;
    try {
      value = isDeclaration(entry.declaration)
        ? entry.declaration.evaluatePre(this, this.#step, entry.context)
        : entry.declaration;
    } finally {
      this.#pending.pop();
    }
    // Nothing left to inherit from
    if (value === INHERIT) value = SKIP;
    this.#values.set(name, value);
    return value;
  }

  toString(): string {
    return `<Resolver for ${this.factoryName}>`;
  }
}
