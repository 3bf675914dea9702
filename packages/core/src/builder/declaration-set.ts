/**
 * Ordered declaration mapping with deep contexts.
 *
 * Keys of the form `owner__name` are split once on entry: `owner` keeps
 * its declaration and `name` lands in the context forwarded to it.
 */

import { getBuilderPhase, isDeclaration, withFallback } from '../declarations/base.js';
import { ErrorCode } from '../errors/codes.js';
import { BuilderPhase, SPLITTER } from '../types/enums.js';
import { DefinitionError } from '../types/errors.js';

export interface DeclarationWithContext {
  name: string;
  declaration: unknown;
  context: Record<string, unknown>;
}

export type Entries = Iterable<readonly [string, unknown]> | Readonly<Record<string, unknown>>;

function toEntries(values: Entries): Iterable<readonly [string, unknown]> {
  return Symbol.iterator in values ? values : Object.entries(values);
}

export class DeclarationSet {
  readonly #declarations = new Map<string, unknown>();
  readonly #contexts = new Map<string, Map<string, unknown>>();

  constructor(initial?: Entries) {
    if (initial) this.update(initial);
  }

  /** Split `root__rest` into its root and the remainder (undefined when flat) */
  static split(entry: string): [string, string | undefined] {
    const index = entry.indexOf(SPLITTER);
    if (index === -1) return [entry, undefined];
    return [entry.slice(0, index), entry.slice(index + SPLITTER.length)];
  }

  static join(root: string, subkey: string | undefined): string {
    return subkey === undefined ? root : `${root}${SPLITTER}${subkey}`;
  }

  copy(): DeclarationSet {
    return new DeclarationSet(this.entries());
  }

  update(values: Entries): void {
    for (const [key, value] of toEntries(values)) {
      const [root, sub] = DeclarationSet.split(key);
      if (sub === undefined) {
        this.#declarations.set(root, value);
      } else {
        let context = this.#contexts.get(root);
        if (!context) {
          context = new Map();
          this.#contexts.set(root, context);
        }
        context.set(sub, value);
      }
    }

    const unknownRoots = [...this.#contexts.keys()].filter(
      (root) => !this.#declarations.has(root)
    );
    if (unknownRoots.length > 0) {
      const received = unknownRoots.flatMap((root) =>
        [...(this.#contexts.get(root)?.keys() ?? [])].map((sub) =>
          DeclarationSet.join(root, sub)
        )
      );
      throw new DefinitionError({
        message: `Received deep context for unknown fields: ${received.join(', ')} (known: ${[...this.#declarations.keys()].sort().join(', ')})`,
        errorCode: ErrorCode.UNKNOWN_DEEP_CONTEXT,
        context: { attributes: received },
      });
    }
  }

  remove(name: string): void {
    this.#declarations.delete(name);
    this.#contexts.delete(name);
  }

  /** Keep the entries whose root is declared here */
  filter(entries: Iterable<string>): string[] {
    return [...entries].filter((entry) =>
      this.#declarations.has(DeclarationSet.split(entry)[0])
    );
  }

  /** Names ordered by declaration creation; constants come first */
  sorted(): string[] {
    const order = (name: string): number => {
      const declaration = this.#declarations.get(name);
      return isDeclaration(declaration) ? declaration.creationIndex : -1;
    };
    return [...this.#declarations.keys()].sort((a, b) => order(a) - order(b));
  }

  has(name: string): boolean {
    return this.#declarations.has(name);
  }

  get(name: string): DeclarationWithContext | undefined {
    if (!this.#declarations.has(name)) return undefined;
    return {
      name,
      declaration: this.#declarations.get(name),
      context: Object.fromEntries(this.#contexts.get(name) ?? []),
    };
  }

  names(): string[] {
    return [...this.#declarations.keys()];
  }

  get size(): number {
    return this.#declarations.size;
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this.#declarations.keys();
  }

  /** Flat `[key, value]` pairs, deep contexts joined back with the splitter */
  *entries(): IterableIterator<[string, unknown]> {
    for (const [name, declaration] of this.#declarations) {
      yield [name, declaration];
      for (const [sub, value] of this.#contexts.get(name) ?? []) {
        yield [DeclarationSet.join(name, sub), value];
      }
    }
  }

  asRecord(): Record<string, unknown> {
    return Object.fromEntries(this.entries());
  }
}

/**
 * Split a declaration mapping (plus optional inherited sets) into the
 * declarations resolved before instantiation and those run afterwards.
 *
 * A scalar passed for a post-instantiation name becomes its extracted
 * value (`name__`), and a post declaration replaces a pre one of the same
 * name. An override that may yield INHERIT keeps the declaration it
 * replaces as its fallback.
 */
export function parseDeclarations(
  declarations: Entries,
  basePre?: DeclarationSet,
  basePost?: DeclarationSet
): [DeclarationSet, DeclarationSet] {
  const pre = basePre ? basePre.copy() : new DeclarationSet();
  const post = basePost ? basePost.copy() : new DeclarationSet();

  const extraPost: Array<[string, unknown]> = [];
  const extraMaybeNonPost: Array<[string, unknown]> = [];
  for (const [key, value] of toEntries(declarations)) {
    if (getBuilderPhase(value) === BuilderPhase.POST_INSTANTIATION) {
      if (pre.has(key)) pre.remove(key);
      extraPost.push([key, value]);
    } else if (post.has(key)) {
      extraPost.push([DeclarationSet.join(key, ''), value]);
    } else {
      extraMaybeNonPost.push([key, value]);
    }
  }

  post.update(extraPost);

  const postOverrides = new Set(
    post.filter(extraMaybeNonPost.map(([key]) => key))
  );
  post.update(extraMaybeNonPost.filter(([key]) => postOverrides.has(key)));
  pre.update(
    extraMaybeNonPost
      .filter(([key]) => !postOverrides.has(key))
      .map(([key, value]): [string, unknown] => [
        key,
        pre.has(key) ? withFallback(value, pre.get(key)?.declaration) : value,
      ])
  );

  return [pre, post];
}
