/**
 * Trait Space
 *
 * The ordered set of identity dimensions every vector in the advisor is
 * expressed in, plus the vector arithmetic used by aggregation and ranking.
 * Vectors are plain readonly number arrays indexed by dimension position.
 */

import { AdvisorError, DimensionMismatchError, TraitSpaceMismatchError, UnknownTraitError } from '../errors.js';

export type TraitVector = readonly number[];

/** Sparse trait → weight mapping, as written in configuration files */
export type TraitWeights = Readonly<Record<string, number>>;

export interface TraitSpace {
  readonly dimensions: readonly string[];
  readonly size: number;
  indexOf(trait: string): number;
  has(trait: string): boolean;
}

const DIMENSION_NAME = /^[a-z][a-z0-9_-]*$/;

export function createTraitSpace(dimensions: readonly string[]): TraitSpace {
  if (dimensions.length === 0) {
    throw AdvisorError.invalidTraitSpace('at least one dimension is required');
  }

  const positions = new Map<string, number>();
  dimensions.forEach((name, index) => {
    if (!DIMENSION_NAME.test(name)) {
      throw AdvisorError.invalidTraitSpace(`'${name}' is not a valid dimension name`);
    }
    if (positions.has(name)) {
      throw AdvisorError.invalidTraitSpace(`duplicate dimension '${name}'`);
    }
    positions.set(name, index);
  });

  const frozen = Object.freeze([...dimensions]);

  return Object.freeze({
    dimensions: frozen,
    size: frozen.length,
    indexOf: (trait: string) => positions.get(trait) ?? -1,
    has: (trait: string) => positions.has(trait),
  });
}

export function assertDimension(space: TraitSpace, vector: TraitVector, context?: string): void {
  if (vector.length !== space.size) {
    throw new DimensionMismatchError(space.size, vector.length, context);
  }
}

/** Vectors built against `actual` are only meaningful in `expected` if both list the same dimensions in order. */
export function assertSameTraitSpace(expected: TraitSpace, actual: TraitSpace, context?: string): void {
  if (expected === actual) {
    return;
  }
  if (expected.size !== actual.size) {
    throw new DimensionMismatchError(expected.size, actual.size, context);
  }
  if (expected.dimensions.some((trait, index) => actual.dimensions[index] !== trait)) {
    throw new TraitSpaceMismatchError(expected.dimensions, actual.dimensions, context);
  }
}

function assertSameLength(a: TraitVector, b: TraitVector, context: string): void {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length, context);
  }
}

export function zeroVector(space: TraitSpace): TraitVector {
  return Object.freeze(new Array<number>(space.size).fill(0));
}

/**
 * Expand a sparse weight map into a dense vector. A key outside the trait
 * space is a configuration bug, not a user error.
 */
export function vectorFromWeights(space: TraitSpace, weights: TraitWeights): TraitVector {
  const vector = new Array<number>(space.size).fill(0);

  for (const [trait, weight] of Object.entries(weights)) {
    const index = space.indexOf(trait);
    if (index === -1) {
      throw new UnknownTraitError(trait, space.dimensions);
    }
    vector[index] += weight;
  }

  return Object.freeze(vector);
}

export function vectorToWeights(space: TraitSpace, vector: TraitVector): Record<string, number> {
  assertDimension(space, vector);
  const weights: Record<string, number> = {};
  space.dimensions.forEach((trait, index) => {
    weights[trait] = vector[index];
  });
  return weights;
}

export function addVectors(a: TraitVector, b: TraitVector): TraitVector {
  assertSameLength(a, b, 'addVectors');
  return Object.freeze(a.map((value, index) => value + b[index]));
}

export function sumVectors(space: TraitSpace, vectors: readonly TraitVector[]): TraitVector {
  return vectors.reduce<TraitVector>((total, vector) => {
    assertDimension(space, vector, 'sumVectors');
    return addVectors(total, vector);
  }, zeroVector(space));
}

export function scaleVector(vector: TraitVector, factor: number): TraitVector {
  return Object.freeze(vector.map((value) => value * factor));
}

export function dot(a: TraitVector, b: TraitVector): number {
  assertSameLength(a, b, 'dot');
  let total = 0;
  for (let i = 0; i < a.length; i++) {
    total += a[i] * b[i];
  }
  return total;
}

export function magnitude(vector: TraitVector): number {
  return Math.sqrt(vector.reduce((total, value) => total + value * value, 0));
}

/**
 * Cosine similarity in [-1, 1]. Zero-magnitude input yields 0 rather than
 * NaN so a profile with no signal still ranks.
 */
export function cosineSimilarity(a: TraitVector, b: TraitVector): number {
  const product = dot(a, b);
  const denominator = magnitude(a) * magnitude(b);
  if (denominator === 0) {
    return 0;
  }
  return Math.min(1, Math.max(-1, product / denominator));
}

export function isZeroVector(vector: TraitVector): boolean {
  return vector.every((value) => value === 0);
}
