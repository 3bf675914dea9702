/**
 * Strategies, builder phases and reserved names shared by the engine.
 */

export const BUILD_STRATEGY = 'build';
export const CREATE_STRATEGY = 'create';
export const STUB_STRATEGY = 'stub';

export const STRATEGIES = [BUILD_STRATEGY, CREATE_STRATEGY, STUB_STRATEGY] as const;

export type Strategy = (typeof STRATEGIES)[number];

export function isStrategy(value: unknown): value is Strategy {
  return typeof value === 'string' && (STRATEGIES as readonly string[]).includes(value);
}

/** Separator between an attribute name and the overrides it forwards */
export const SPLITTER = '__';

/** Reserved override forcing the sequence number of a single call */
export const FORCE_SEQUENCE_KEY = '__sequence';

export enum BuilderPhase {
  ATTRIBUTE_RESOLUTION = 'attribute_resolution',
  POST_INSTANTIATION = 'post_instantiation',
}
