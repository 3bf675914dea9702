/**
 * Factory definitions.
 *
 * A factory is defined once from its declarations, parameters, options and
 * an explicit list of parents. Definition merges everything the ancestry
 * declares into immutable pre/post declaration sets; every generate call
 * then runs a fresh StepBuilder over them.
 */

import { DeclarationSet, parseDeclarations } from '../builder/declaration-set.js';
import { StepBuilder, type BuildStep, type StepTarget } from '../builder/step.js';
import { SKIP } from '../declarations/base.js';
import { SimpleParameter, type Parameter } from '../declarations/parameters.js';
import { ErrorCode } from '../errors/codes.js';
import {
  BUILD_STRATEGY,
  CREATE_STRATEGY,
  STUB_STRATEGY,
  isStrategy,
  type Strategy,
} from '../types/enums.js';
import {
  AbstractFactoryError,
  DefinitionError,
  IntrospectorError,
  InvalidDeclarationError,
  SequenceOwnershipError,
  UnknownStrategyError,
  UnsupportedStrategyError,
} from '../types/errors.js';
import { LazyCounter } from './counter.js';
import {
  resolveFactoryOptions,
  type FactoryOptions,
  type FactoryOptionsInput,
  type ModelClass,
} from './options.js';
import { resolveParameterOrder } from './parameter-order.js';

type Attributes = Record<string, unknown>;

/**
 * Plain attribute container returned by the stub strategy
 */
export class StubObject {
  [key: string]: unknown;

  constructor(attributes: Readonly<Attributes> = {}) {
    Object.assign(this, attributes);
  }
}

/**
 * Extension points; a factory inherits each hook from its nearest
 * ancestor defining it.
 */
export interface FactoryHooks<T> {
  /** Instantiate for the build strategy (default: `new model(...args, kwargs)`) */
  build?(model: ModelClass<T>, args: unknown[], kwargs: Attributes): T;
  /** Instantiate for the create strategy; persistence adapters hook in here */
  create?(model: ModelClass<T>, args: unknown[], kwargs: Attributes): T;
  adjustKwargs?(kwargs: Attributes): Attributes;
  afterPostGeneration?(instance: T | StubObject, create: boolean, results: Attributes): void;
  /** First sequence number of a counter this factory owns (default 0) */
  setupNextSequence?(): number;
}

export interface FactoryDefinition<T> {
  name: string;
  /** Nearest first; the first parent is the base factory options inherit from */
  parents?: readonly Factory<unknown>[];
  options?: FactoryOptionsInput<T>;
  declarations?: Readonly<Attributes>;
  /** Parameters: raw values or trait() bundles */
  params?: Readonly<Attributes>;
  hooks?: FactoryHooks<T>;
}

export interface ResetSequenceOptions {
  /** Reset a counter shared with an ancestor from this descendant */
  force?: boolean;
}

/**
 * Ancestors, furthest first; a factory reached through several parents
 * keeps its furthest position.
 */
function linearize(parents: readonly Factory<unknown>[]): Factory<unknown>[] {
  const lineage: Factory<unknown>[] = [];
  for (const parent of [...parents].reverse()) {
    for (const factory of [...parent.ancestors, parent]) {
      if (!lineage.includes(factory)) lineage.push(factory);
    }
  }
  return lineage;
}

// Parents build supertypes of T: the definition's type argument is what
// states that their model and hooks apply to T.
function narrowLineage<T>(factories: readonly Factory<unknown>[]): readonly Factory<T>[] {
  return factories as readonly Factory<T>[];
}

function isSameOrSubclass(child: unknown, parent: unknown): boolean {
  return (
    typeof child === 'function' &&
    typeof parent === 'function' &&
    (child === parent || child.prototype instanceof parent)
  );
}

export class Factory<T> {
  readonly name: string;
  readonly options: FactoryOptions<T>;
  readonly parents: readonly Factory<unknown>[];
  /** Furthest first, parents last */
  readonly ancestors: readonly Factory<unknown>[];
  /** Own, inherited and auto-derived declarations, before parameters */
  readonly baseDeclarations: Readonly<Attributes>;
  readonly parameters: ReadonlyMap<string, Parameter>;
  readonly parameterOrder: readonly string[];
  /** Base declarations with every parameter expanded */
  readonly declarations: Readonly<Attributes>;
  readonly preDeclarations: DeclarationSet;
  readonly postDeclarations: DeclarationSet;
  /** Factory whose counter this one draws from */
  readonly counterReference: Factory<unknown>;

  readonly #hooks: FactoryHooks<T>;
  readonly #counter = new LazyCounter(() => this.#seed());

  constructor(definition: FactoryDefinition<T>) {
    const { name, parents = [] } = definition;
    if (!name) {
      throw new DefinitionError({
        message: 'A factory definition needs a name',
        context: { value: definition },
      });
    }

    this.name = name;
    this.parents = parents;
    this.ancestors = linearize(parents);

    const lineage = narrowLineage<T>(this.ancestors);
    const base: Factory<T> | undefined = narrowLineage<T>(parents)[0];

    this.options = resolveFactoryOptions(name, definition.options, base?.options);
    this.#hooks = {
      ...lineage.reduce<FactoryHooks<T>>((hooks, ancestor) => ({ ...hooks, ...ancestor.#hooks }), {}),
      ...definition.hooks,
    };

    const baseModel = base?.options.model;
    this.counterReference =
      base && this.options.model && baseModel && isSameOrSubclass(this.options.model, baseModel)
        ? base.counterReference
        : this;

    const baseDeclarations: Attributes = {};
    const parameters = new Map<string, Parameter>();
    for (const ancestor of this.ancestors) {
      Object.assign(baseDeclarations, ancestor.baseDeclarations);
      for (const [param, value] of ancestor.parameters) parameters.set(param, value);
    }
    Object.assign(baseDeclarations, definition.declarations);
    Object.assign(baseDeclarations, this.#autoDeclarations(baseDeclarations));
    this.baseDeclarations = baseDeclarations;

    for (const [param, value] of Object.entries(definition.params ?? {})) {
      parameters.set(param, SimpleParameter.wrap(value));
    }
    this.parameters = parameters;
    this.parameterOrder = resolveParameterOrder(name, parameters);

    const declarations: Attributes = { ...baseDeclarations };
    for (const param of this.parameterOrder) {
      const parameter = parameters.get(param);
      if (parameter) Object.assign(declarations, parameter.asDeclarations(param, declarations));
    }
    this.declarations = declarations;
    const [pre, post] = parseDeclarations(declarations);
    this.preDeclarations = pre;
    this.postDeclarations = post;
  }

  #autoDeclarations(declared: Readonly<Attributes>): Attributes {
    const { options } = this;
    if (options.abstract) return {};
    if (!options.defaultAutoFields && options.includeAutoFields.length === 0) return {};

    const introspector = new options.introspector({ name: this.name, model: options.model });
    const fieldNames = new Set<string>(
      options.defaultAutoFields ? introspector.defaultFieldNames(options.model) : []
    );
    for (const ancestor of this.ancestors) {
      for (const field of ancestor.options.includeAutoFields) fieldNames.add(field);
      for (const field of ancestor.options.excludeAutoFields) fieldNames.delete(field);
    }
    for (const field of options.includeAutoFields) fieldNames.add(field);

    const skipped = new Set([...Object.keys(declared), ...options.excludeAutoFields]);
    for (const field of skipped) fieldNames.delete(field);

    const auto: Attributes = {};
    for (const [field, declaration] of introspector.buildDeclarations(fieldNames, skipped)) {
      if (!fieldNames.has(field)) {
        throw new IntrospectorError({
          message: `Introspector ${introspector} returned a field (${field}) that it was not asked for`,
          errorCode: ErrorCode.INTROSPECTOR_UNREQUESTED_FIELD,
          context: { factory: this.name, attribute: field },
        });
      }
      auto[field] = declaration;
    }
    return auto;
  }

  // Sequences

  #seed(): number {
    return this.#hooks.setupNextSequence?.() ?? 0;
  }

  nextSequence(): number {
    return this.counterReference.#counter.counter.next();
  }

  /**
   * Set the next sequence number; without a value, re-seed from the
   * owning factory. Only the owner may reset a shared counter unless
   * forced.
   */
  resetSequence(value?: number, { force = false }: ResetSequenceOptions = {}): void {
    const owner = this.counterReference;
    if (owner !== this && !force) {
      throw new SequenceOwnershipError(this.name, owner.name);
    }
    owner.#counter.counter.reset(value ?? owner.#seed());
  }

  // Arguments and instantiation

  /**
   * Turn resolved attributes into constructor arguments: adjust, drop
   * excluded names, parameters and skipped values, rename, then extract
   * positional arguments.
   */
  prepareArguments(attributes: Readonly<Attributes>): [unknown[], Attributes] {
    const adjusted = this.#hooks.adjustKwargs?.({ ...attributes }) ?? { ...attributes };

    const kwargs: Attributes = {};
    for (const [key, value] of Object.entries(adjusted)) {
      if (this.options.exclude.includes(key) || this.parameters.has(key) || value === SKIP) continue;
      kwargs[key] = value;
    }

    for (const [from, to] of Object.entries(this.options.rename)) {
      if (!(from in kwargs)) continue;
      const value = kwargs[from];
      delete kwargs[from];
      kwargs[to] = value;
    }

    const args = this.options.inlineArgs.map((argName) => {
      if (!(argName in kwargs)) {
        throw new InvalidDeclarationError({
          message: `${this.name} passes "${argName}" positionally but no such attribute was resolved`,
          context: { factory: this.name, attribute: argName },
        });
      }
      const value = kwargs[argName];
      delete kwargs[argName];
      return value;
    });

    return [args, kwargs];
  }

  #instantiate(strategy: typeof BUILD_STRATEGY | typeof CREATE_STRATEGY, args: unknown[], kwargs: Attributes): T {
    const { model } = this.options;
    if (!model) throw new AbstractFactoryError(this.name);

    const hook = strategy === BUILD_STRATEGY ? this.#hooks.build : this.#hooks.create;
    if (hook) return hook.call(this.#hooks, model, args, kwargs);
    return Reflect.construct(model, [...args, kwargs]);
  }

  #target<I extends T | StubObject>(
    instantiate: (args: unknown[], kwargs: Attributes) => I
  ): StepTarget<I> {
    return {
      name: this.name,
      preDeclarations: this.preDeclarations,
      postDeclarations: this.postDeclarations,
      nextSequence: () => this.nextSequence(),
      prepareArguments: (attributes) => this.prepareArguments(attributes),
      instantiate: (_step, args, kwargs) => instantiate(args, kwargs),
      usePostGenerationResults: (step, instance, results) => {
        this.#hooks.afterPostGeneration?.(instance, step.create, results);
      },
    };
  }

  #run(
    strategy: typeof BUILD_STRATEGY | typeof CREATE_STRATEGY,
    overrides: Readonly<Attributes>,
    parentStep?: BuildStep,
    forceSequence?: number
  ): T {
    if (this.options.abstract) throw new AbstractFactoryError(this.name);
    const target = this.#target((args, kwargs) => this.#instantiate(strategy, args, kwargs));
    return new StepBuilder(target, overrides, strategy).build(parentStep, forceSequence);
  }

  #runStub(overrides: Readonly<Attributes>, parentStep?: BuildStep, forceSequence?: number): StubObject {
    if (this.options.abstract) throw new AbstractFactoryError(this.name);
    const target = this.#target((_args, kwargs) => new StubObject(kwargs));
    return new StepBuilder(target, overrides, STUB_STRATEGY).build(parentStep, forceSequence);
  }

  #dispatch(
    strategy: unknown,
    overrides: Readonly<Attributes>,
    parentStep?: BuildStep,
    forceSequence?: number
  ): T | StubObject {
    if (!isStrategy(strategy)) throw new UnknownStrategyError(strategy, this.name);
    return strategy === STUB_STRATEGY
      ? this.#runStub(overrides, parentStep, forceSequence)
      : this.#run(strategy, overrides, parentStep, forceSequence);
  }

  /**
   * Generate as a nested object of `parentStep`, with this factory's own
   * strategy
   */
  generateWithin(
    parentStep: BuildStep,
    overrides: Readonly<Attributes>,
    forceSequence?: number
  ): T | StubObject {
    return this.#dispatch(this.options.strategy, overrides, parentStep, forceSequence);
  }

  // Public generation API

  build(overrides: Readonly<Attributes> = {}): T {
    return this.#run(BUILD_STRATEGY, overrides);
  }

  create(overrides: Readonly<Attributes> = {}): T {
    return this.#run(CREATE_STRATEGY, overrides);
  }

  stub(overrides: Readonly<Attributes> = {}): StubObject {
    return this.#runStub(overrides);
  }

  /** Generate with the factory's default strategy */
  call(overrides: Readonly<Attributes> = {}): T | StubObject {
    return this.#dispatch(this.options.strategy, overrides);
  }

  buildBatch(size: number, overrides: Readonly<Attributes> = {}): T[] {
    return Array.from({ length: size }, () => this.build(overrides));
  }

  createBatch(size: number, overrides: Readonly<Attributes> = {}): T[] {
    return Array.from({ length: size }, () => this.create(overrides));
  }

  stubBatch(size: number, overrides: Readonly<Attributes> = {}): StubObject[] {
    return Array.from({ length: size }, () => this.stub(overrides));
  }

  generate(strategy: typeof STUB_STRATEGY, overrides?: Readonly<Attributes>): StubObject;
  generate(strategy: typeof BUILD_STRATEGY | typeof CREATE_STRATEGY, overrides?: Readonly<Attributes>): T;
  generate(strategy: Strategy, overrides?: Readonly<Attributes>): T | StubObject;
  generate(strategy: Strategy, overrides: Readonly<Attributes> = {}): T | StubObject {
    return this.#dispatch(strategy, overrides);
  }

  generateBatch(strategy: Strategy, size: number, overrides: Readonly<Attributes> = {}): Array<T | StubObject> {
    return Array.from({ length: size }, () => this.generate(strategy, overrides));
  }

  /** Build, or create when `create` is true */
  simpleGenerate(create: boolean, overrides: Readonly<Attributes> = {}): T {
    return create ? this.create(overrides) : this.build(overrides);
  }

  simpleGenerateBatch(create: boolean, size: number, overrides: Readonly<Attributes> = {}): T[] {
    return create ? this.createBatch(size, overrides) : this.buildBatch(size, overrides);
  }

  /** Hooks in effect, own and inherited */
  get hooks(): Readonly<FactoryHooks<T>> {
    return this.#hooks;
  }

  toString(): string {
    return this.options.abstract
      ? `<${this.name} (abstract)>`
      : `<${this.name} for ${this.options.model?.name ?? 'unknown model'}>`;
  }
}

export function defineFactory<T>(definition: FactoryDefinition<T>): Factory<T> {
  return new Factory(definition);
}

// Built-in factories

function rejectInlineArgs(factory: string, args: readonly unknown[]): void {
  if (args.length > 0) {
    throw new InvalidDeclarationError({
      message: `${factory} does not support inlineArgs`,
      context: { factory },
    });
  }
}

/** Instance type of DictFactory */
class PlainObject {
  [key: string]: unknown;
}

/**
 * Objects carrying only stub attributes; create is unsupported
 */
export const StubFactory = defineFactory<StubObject>({
  name: 'StubFactory',
  options: { model: StubObject, strategy: STUB_STRATEGY },
  hooks: {
    build: (_model, _args, kwargs) => new StubObject(kwargs),
    create: () => {
      throw new UnsupportedStrategyError(CREATE_STRATEGY, 'StubFactory');
    },
  },
});

const dictFromKwargs = (args: unknown[], kwargs: Attributes): PlainObject => {
  rejectInlineArgs('DictFactory', args);
  return { ...kwargs };
};

export const BaseDictFactory = defineFactory<PlainObject>({
  name: 'BaseDictFactory',
  options: { abstract: true },
  hooks: {
    build: (_model, args, kwargs) => dictFromKwargs(args, kwargs),
    create: (_model, args, kwargs) => dictFromKwargs(args, kwargs),
  },
});

export const DictFactory = defineFactory<PlainObject>({
  name: 'DictFactory',
  parents: [BaseDictFactory],
  options: { model: PlainObject },
});

const listFromKwargs = (args: unknown[], kwargs: Attributes): unknown[] => {
  rejectInlineArgs('ListFactory', args);
  return Object.entries(kwargs)
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([, value]) => value);
};

export const BaseListFactory = defineFactory<unknown[]>({
  name: 'BaseListFactory',
  options: { abstract: true },
  hooks: {
    build: (_model, args, kwargs) => listFromKwargs(args, kwargs),
    create: (_model, args, kwargs) => listFromKwargs(args, kwargs),
  },
});

export const ListFactory = defineFactory<unknown[]>({
  name: 'ListFactory',
  parents: [BaseListFactory],
  options: { model: Array },
});
