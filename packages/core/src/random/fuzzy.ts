/**
 * Random attribute values drawn from the shared generator
 */

import { AttributeDeclaration, type DeclarationKind } from '../declarations/base.js';
import { InvalidDeclarationError } from '../types/errors.js';
import { randomSource } from './random.js';

const ASCII_LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DAY_MS = 24 * 60 * 60 * 1000;

export abstract class FuzzyAttribute<R = unknown> extends AttributeDeclaration {
  readonly kind: DeclarationKind = 'fuzzy';

  abstract fuzz(): R;

  protected evaluate(): R {
    return this.fuzz();
  }
}

function checkBounds(name: string, low: number, high: number): void {
  if (low > high) {
    throw new InvalidDeclarationError({
      message: `${name} boundaries should have low <= high; got ${low} > ${high}`,
      context: { value: { low, high } },
    });
  }
}

/** Any value-producing function; it should draw from randomSource() */
export class FuzzyFunction<R> extends FuzzyAttribute<R> {
  constructor(private readonly fuzzer: () => R) {
    super();
  }

  fuzz(): R {
    return this.fuzzer();
  }
}

export interface FuzzyTextOptions {
  prefix?: string;
  /** Length of the random part (default 12) */
  length?: number;
  suffix?: string;
  /** Characters to pick from (default ASCII letters) */
  chars?: string | readonly string[];
}

export class FuzzyText extends FuzzyAttribute<string> {
  readonly prefix: string;
  readonly length: number;
  readonly suffix: string;
  readonly chars: readonly string[];

  constructor({ prefix = '', length = 12, suffix = '', chars = ASCII_LETTERS }: FuzzyTextOptions = {}) {
    super();
    this.prefix = prefix;
    this.length = length;
    this.suffix = suffix;
    this.chars = [...chars];
  }

  fuzz(): string {
    return `${this.prefix}${randomSource().string.fromCharacters([...this.chars], this.length)}${this.suffix}`;
  }
}

/**
 * One element of `choices`, unrolled on first use
 */
export class FuzzyChoice<T> extends FuzzyAttribute<T> {
  #choices: T[] | undefined;

  constructor(private readonly source: Iterable<T>) {
    super();
  }

  fuzz(): T {
    this.#choices ??= [...this.source];
    if (this.#choices.length === 0) {
      throw new InvalidDeclarationError({
        message: 'fuzzyChoice needs at least one choice',
        context: { kind: this.kind },
      });
    }
    return randomSource().helpers.arrayElement(this.#choices);
  }
}

/**
 * Integer in [low, high] reachable from low by `step`; a single bound is
 * the high end, low being 0
 */
export class FuzzyInteger extends FuzzyAttribute<number> {
  readonly low: number;
  readonly high: number;

  constructor(low: number, high?: number, readonly step = 1) {
    super();
    this.low = high === undefined ? 0 : low;
    this.high = high ?? low;
    checkBounds('fuzzyInteger', this.low, this.high);
    if (!(step > 0)) {
      throw new InvalidDeclarationError({
        message: `fuzzyInteger step should be positive; got ${step}`,
        context: { value: { step } },
      });
    }
  }

  fuzz(): number {
    const steps = Math.floor((this.high - this.low) / this.step);
    return this.low + randomSource().number.int({ min: 0, max: steps }) * this.step;
  }
}

export class FuzzyFloat extends FuzzyAttribute<number> {
  readonly low: number;
  readonly high: number;

  constructor(low: number, high?: number) {
    super();
    this.low = high === undefined ? 0 : low;
    this.high = high ?? low;
    checkBounds('fuzzyFloat', this.low, this.high);
  }

  fuzz(): number {
    return randomSource().number.float({ min: this.low, max: this.high });
  }
}

/** Float rounded to `precision` decimal places */
export class FuzzyDecimal extends FuzzyFloat {
  constructor(low: number, high?: number, readonly precision = 2) {
    super(low, high);
  }

  override fuzz(): number {
    return Number(super.fuzz().toFixed(this.precision));
  }
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Day (UTC midnight) between two dates, inclusive; defaults to the last
 * 100 days
 */
export class FuzzyDate extends FuzzyAttribute<Date> {
  readonly start: Date;
  readonly end: Date;

  constructor(start?: Date, end?: Date) {
    super();
    const today = startOfUtcDay(new Date());
    this.start = startOfUtcDay(start ?? new Date(today.getTime() - 100 * DAY_MS));
    this.end = startOfUtcDay(end ?? today);
    if (this.start > this.end) {
      throw new InvalidDeclarationError({
        message: `fuzzyDate boundaries should have start <= end; got ${this.start.toISOString()} > ${this.end.toISOString()}`,
        context: { value: { start: this.start, end: this.end } },
      });
    }
  }

  fuzz(): Date {
    const days = Math.round((this.end.getTime() - this.start.getTime()) / DAY_MS);
    return new Date(this.start.getTime() + randomSource().number.int({ min: 0, max: days }) * DAY_MS);
  }
}

export const fuzzy = <R>(fuzzer: () => R): FuzzyFunction<R> => new FuzzyFunction(fuzzer);
export const fuzzyText = (options?: FuzzyTextOptions): FuzzyText => new FuzzyText(options);
export const fuzzyChoice = <T>(choices: Iterable<T>): FuzzyChoice<T> => new FuzzyChoice(choices);
export const fuzzyInteger = (low: number, high?: number, step?: number): FuzzyInteger =>
  new FuzzyInteger(low, high, step);
export const fuzzyFloat = (low: number, high?: number): FuzzyFloat => new FuzzyFloat(low, high);
export const fuzzyDecimal = (low: number, high?: number, precision?: number): FuzzyDecimal =>
  new FuzzyDecimal(low, high, precision);
export const fuzzyDate = (start?: Date, end?: Date): FuzzyDate => new FuzzyDate(start, end);
