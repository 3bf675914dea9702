/**
 * Shared randomness for faker-backed and fuzzy declarations.
 */

import { faker as sharedFaker, type Faker } from '@faker-js/faker';

export function randomSource(): Faker {
  return sharedFaker;
}

/**
 * Seed the shared generator; returns the seed in use (a fresh one when
 * none is given)
 */
export function reseedRandom(seed?: number): number {
  return sharedFaker.seed(seed);
}
