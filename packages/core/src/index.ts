// @graphsmith/core entry point
//
// Public API:
// - defineFactory() and the Factory class, with the built-in StubFactory,
//   DictFactory and ListFactory.
// - Declarations (lazy values, sequences, sub-factories, traits, post-generation).
// - Shortcut helpers (build/create/stub on a bare model, autoFactory, useStrategy).
// - Errors, engine configuration and the shared random source.

// Factories
export {
  Factory,
  StubObject,
  defineFactory,
  StubFactory,
  BaseDictFactory,
  DictFactory,
  BaseListFactory,
  ListFactory,
  type FactoryDefinition,
  type FactoryHooks,
  type ResetSequenceOptions,
} from './factory/factory.js';
export {
  DEFAULT_FACTORY_OPTIONS,
  validateFactoryOptions,
  type FactoryOptions,
  type FactoryOptionsInput,
  type ModelClass,
} from './factory/options.js';
export {
  BaseIntrospector,
  type DeclarationBuilder,
  type FieldClass,
  type FieldContext,
  type IntrospectionTarget,
  type Introspector,
  type IntrospectorConstructor,
} from './factory/introspector.js';
export {
  makeFactory,
  build,
  buildBatch,
  create,
  createBatch,
  stub,
  stubBatch,
  generate,
  generateBatch,
  simpleGenerate,
  simpleGenerateBatch,
  useStrategy,
  autoFactory,
  debug,
  type AutoFactoryOptions,
} from './factory/helpers.js';

// Declarations
export {
  SKIP,
  INHERIT,
  BaseDeclaration,
  Fallback,
  AttributeDeclaration,
  PostGenerationDeclaration,
  isDeclaration,
  type Skip,
  type DeclarationKind,
  type PostGenerationContext,
} from './declarations/base.js';
export {
  LazyFunction,
  LazyAttribute,
  SelfAttribute,
  IteratorDeclaration,
  Sequence,
  LazyAttributeSequence,
  ContainerAttribute,
  deepGet,
  lazyFunction,
  lazyAttribute,
  selfAttribute,
  iterator,
  sequence,
  lazyAttributeSequence,
  containerAttribute,
  type SelfAttributeOptions,
  type IteratorOptions,
  type ContainerAttributeOptions,
} from './declarations/attributes.js';
export { SubFactory, subFactory, type FactoryRef } from './declarations/sub-factory.js';
export { DictDeclaration, ListDeclaration, dict, list } from './declarations/containers.js';
export { Maybe, maybe } from './declarations/maybe.js';
export { Parameter, SimpleParameter, Trait, trait } from './declarations/parameters.js';
export {
  PostGeneration,
  PostGenerationMethodCall,
  RelatedFactory,
  RelatedFactoryList,
  postGeneration,
  postGenerationMethodCall,
  relatedFactory,
  relatedFactoryList,
  type PostGenerationFunction,
} from './declarations/post-generation.js';

// Random values
export { randomSource, reseedRandom } from './random/random.js';
export { FakerAttribute, faker } from './random/faker.js';
export {
  FuzzyAttribute,
  FuzzyFunction,
  FuzzyText,
  FuzzyChoice,
  FuzzyInteger,
  FuzzyFloat,
  FuzzyDecimal,
  FuzzyDate,
  fuzzy,
  fuzzyText,
  fuzzyChoice,
  fuzzyInteger,
  fuzzyFloat,
  fuzzyDecimal,
  fuzzyDate,
  type FuzzyTextOptions,
} from './random/fuzzy.js';

// Builder internals exposed to custom declarations
export type { BuildStep } from './builder/step.js';
export type { Resolver } from './builder/resolver.js';

// Errors
export {
  FixtureError,
  DefinitionError,
  UnknownStrategyError,
  UnsupportedStrategyError,
  CyclicDefinitionError,
  AbstractFactoryError,
  SequenceOwnershipError,
  IntrospectorError,
  InvalidDeclarationError,
  UnknownAttributeError,
  isFixtureError,
  type ErrorContext,
  type SerializedError,
  type UserError,
} from './types/errors.js';
export { ErrorCode, getErrorCategory, type ErrorCategory, type Severity } from './errors/codes.js';
export { ok, err, unwrap, type Result } from './types/result.js';

// Enums and engine configuration
export {
  BUILD_STRATEGY,
  CREATE_STRATEGY,
  STUB_STRATEGY,
  STRATEGIES,
  BuilderPhase,
  isStrategy,
  type Strategy,
} from './types/enums.js';
export {
  configureEngine,
  getEngineOptions,
  resetEngineOptions,
  LOG_LEVELS,
  type EngineOptions,
  type LogLevel,
  type LogSink,
} from './types/options.js';
export { createLogger, type Logger } from './util/logger.js';
