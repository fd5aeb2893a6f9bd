import { assertDimension, type TraitSpace, type TraitVector } from '../profile/trait-space.js';

export interface SnapshotEntry {
  trait: string;
  value: number;
  /** Share of the profile total, rounded */
  percent: number;
}

export interface IdentitySnapshot {
  traits: SnapshotEntry[];
  text: string;
}

export const EMPTY_SNAPSHOT_TEXT = 'No clear work mode yet.';

export function buildIdentitySnapshot(
  space: TraitSpace,
  vector: TraitVector,
  limit = 3,
  label: (trait: string) => string = (trait) => trait
): IdentitySnapshot {
  assertDimension(space, vector, 'buildIdentitySnapshot');

  const total = vector.reduce((sum, value) => sum + value, 0);
  const traits = space.dimensions
    .map((trait, index) => ({
      trait,
      value: vector[index],
      percent: total > 0 ? Math.round((vector[index] / total) * 100) : 0,
    }))
    .sort((left, right) => right.value - left.value)
    .slice(0, limit);

  if (total <= 0) {
    return { traits, text: EMPTY_SNAPSHOT_TEXT };
  }

  const leaning = traits
    .filter((entry) => entry.value > 0)
    .map((entry) => `${label(entry.trait)} ${entry.percent}%`)
    .join(', ');

  return { traits, text: `You lean towards: ${leaning}.` };
}
