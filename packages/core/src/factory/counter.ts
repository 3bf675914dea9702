/**
 * Sequence counters.
 *
 * A factory either owns its counter or points at an ancestor's; the
 * counter itself is created on first use.
 */

export class SequenceCounter {
  #next: number;

  constructor(start = 0) {
    this.#next = start;
  }

  /** Return the current value and advance */
  next(): number {
    const value = this.#next;
    this.#next += 1;
    return value;
  }

  reset(nextValue = 0): void {
    this.#next = nextValue;
  }
}

/**
 * Lazily created counter seeded by its owner
 */
export class LazyCounter {
  #counter: SequenceCounter | undefined;

  constructor(private readonly seed: () => number) {}

  get counter(): SequenceCounter {
    this.#counter ??= new SequenceCounter(this.seed());
    return this.#counter;
  }
}
