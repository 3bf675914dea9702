/**
 * Parameters: named values consumed while resolving other attributes and
 * never passed to the model.
 */

import { SPLITTER } from '../types/enums.js';
import { SelfAttribute } from './attributes.js';
import { INHERIT, SKIP } from './base.js';
import { Maybe } from './maybe.js';

export abstract class Parameter {
  /** Declarations this parameter contributes under `name` */
  abstract asDeclarations(
    name: string,
    declarations: Readonly<Record<string, unknown>>
  ): Record<string, unknown>;

  /** Names among `parameters` that this one reads */
  getRevdeps(_parameters: Iterable<string>): string[] {
    return [];
  }
}

/**
 * A plain default value, overridable by the caller like any attribute
 */
export class SimpleParameter extends Parameter {
  constructor(readonly value: unknown) {
    super();
  }

  asDeclarations(name: string): Record<string, unknown> {
    return { [name]: this.value };
  }

  static wrap(value: unknown): Parameter {
    return value instanceof Parameter ? value : new SimpleParameter(value);
  }
}

/**
 * A bundle of overrides applied when its flag is true.
 *
 * Each overridden field becomes a maybe() reading the flag; nested fields
 * (`owner__name`) climb back up to the factory holding the flag. When the
 * flag is off a field keeps its declared value; an undeclared nested field
 * inherits from the nested factory.
 */
export class Trait extends Parameter {
  constructor(readonly overrides: Readonly<Record<string, unknown>>) {
    super();
  }

  asDeclarations(
    name: string,
    declarations: Readonly<Record<string, unknown>>
  ): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(this.overrides)) {
      const depth = field.split(SPLITTER).length - 1;
      result[field] = new Maybe(
        new SelfAttribute(`${'.'.repeat(depth)}.${name}`, { default: false }),
        value,
        field in declarations ? declarations[field] : depth > 0 ? INHERIT : SKIP
      );
    }
    return result;
  }

  override getRevdeps(parameters: Iterable<string>): string[] {
    return [...parameters].filter((parameter) => parameter in this.overrides);
  }
}

export const trait = (overrides: Readonly<Record<string, unknown>>): Trait => new Trait(overrides);
