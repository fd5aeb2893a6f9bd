/**
 * Narrative Generator
 *
 * Maps the dominant trait(s) of a profile vector onto a closed set of text
 * templates. Dominance is a tagged variant; every variant the trait space can
 * produce has a template once the generator is constructed, so summarising
 * never falls through to a missing key.
 */

import { AdvisorError } from '../errors.js';
import { assertDimension, type TraitSpace, type TraitVector } from '../profile/trait-space.js';

export type Dominance =
  | { kind: 'none' }
  | { kind: 'single'; trait: string }
  | { kind: 'blend'; traits: readonly [string, string] }
  | { kind: 'rounded'; traits: readonly string[] };

/**
 * Template set as written in narratives.json.
 *
 * Placeholders: `{label}` in single templates, `{first}`/`{second}` in pair
 * and blend templates. The rounded and none messages name no traits.
 */
export interface NarrativeTemplates {
  $schema?: string;
  labels?: Record<string, string>;
  single: Record<string, string>;
  /** Explicit pair texts keyed "a+b"; key order does not matter */
  pairs?: Record<string, string>;
  /** Fallback for pairs without an explicit text */
  blend: string;
  /** Three or more traits tied for the top */
  rounded: string;
  /** All-zero profile */
  none: string;
}

export interface IdentitySummary {
  readonly dominance: Dominance;
  readonly text: string;
}

export interface NarrativeGenerator {
  readonly traitSpace: TraitSpace;
  label(trait: string): string;
  classify(vector: TraitVector): Dominance;
  summarize(vector: TraitVector): IdentitySummary;
}

export function classifyDominance(space: TraitSpace, vector: TraitVector): Dominance {
  assertDimension(space, vector, 'classifyDominance');

  const max = Math.max(...vector);
  if (max <= 0) {
    return { kind: 'none' };
  }

  const leaders = space.dimensions.filter((_, index) => vector[index] === max);
  if (leaders.length === 1) {
    return { kind: 'single', trait: leaders[0] };
  }
  if (leaders.length === 2) {
    return { kind: 'blend', traits: [leaders[0], leaders[1]] };
  }
  return { kind: 'rounded', traits: leaders };
}

export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => values[key] ?? placeholder);
}

function pairKey(space: TraitSpace, a: string, b: string): string {
  return space.indexOf(a) <= space.indexOf(b) ? `${a}+${b}` : `${b}+${a}`;
}

function resolvePairs(space: TraitSpace, pairs: Record<string, string>): Map<string, string> {
  const resolved = new Map<string, string>();

  for (const [key, text] of Object.entries(pairs)) {
    const parts = key.split('+').map((part) => part.trim());
    if (parts.length !== 2 || parts[0] === parts[1] || !parts.every((part) => space.has(part))) {
      throw AdvisorError.invalidNarratives(`pair key '${key}' must name two different traits as 'a+b'`);
    }
    resolved.set(pairKey(space, parts[0], parts[1]), text);
  }

  return resolved;
}

export function createNarrativeGenerator(space: TraitSpace, templates: NarrativeTemplates): NarrativeGenerator {
  const missing = space.dimensions.filter((trait) => !templates.single[trait]);
  if (missing.length > 0) {
    throw AdvisorError.invalidNarratives(`no single-trait template for: ${missing.join(', ')}`);
  }

  const unknown = Object.keys(templates.single).filter((trait) => !space.has(trait));
  if (unknown.length > 0) {
    throw AdvisorError.invalidNarratives(`templates for unknown traits: ${unknown.join(', ')}`);
  }

  for (const [key, template] of [['rounded', templates.rounded], ['none', templates.none]] as const) {
    if (/\{\w+\}/.test(template)) {
      throw AdvisorError.invalidNarratives(`the ${key} message takes no placeholders`);
    }
  }

  const pairs = resolvePairs(space, templates.pairs ?? {});
  const label = (trait: string): string => templates.labels?.[trait] ?? trait;

  const render = (dominance: Dominance): string => {
    switch (dominance.kind) {
      case 'none':
        return templates.none;
      case 'single':
        return fillTemplate(templates.single[dominance.trait], { label: label(dominance.trait) });
      case 'blend': {
        const [first, second] = dominance.traits;
        const template = pairs.get(pairKey(space, first, second)) ?? templates.blend;
        return fillTemplate(template, { first: label(first), second: label(second) });
      }
      case 'rounded':
        return templates.rounded;
    }
  };

  return Object.freeze({
    traitSpace: space,
    label,
    classify: (vector: TraitVector) => classifyDominance(space, vector),
    summarize: (vector: TraitVector): IdentitySummary => {
      const dominance = classifyDominance(space, vector);
      return Object.freeze({ dominance, text: render(dominance) });
    },
  });
}
