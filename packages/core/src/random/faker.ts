import type { Faker } from '@faker-js/faker';
import { AttributeDeclaration, type DeclarationKind } from '../declarations/base.js';
import { randomSource } from './random.js';

/**
 * Value produced by faker, e.g. `faker((f) => f.person.fullName())`.
 *
 * Pass a localized instance (`fakerDE`, ...) to draw from another locale;
 * only the shared instance follows reseedRandom().
 */
export class FakerAttribute<R = unknown> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'faker';

  constructor(
    private readonly fn: (faker: Faker) => R,
    private readonly instance?: Faker
  ) {
    super();
  }

  protected evaluate(): R {
    return this.fn(this.instance ?? randomSource());
  }
}

export const faker = <R>(fn: (faker: Faker) => R, instance?: Faker): FakerAttribute<R> =>
  new FakerAttribute(fn, instance);
