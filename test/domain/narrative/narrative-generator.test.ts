import {
  classifyDominance,
  createNarrativeGenerator,
  fillTemplate,
  type NarrativeTemplates,
} from '../../../src/domain/narrative/narrative-generator.js';
import { createTraitSpace } from '../../../src/domain/profile/trait-space.js';
import { AdvisorError, ErrorCodes } from '../../../src/domain/errors.js';

describe('NarrativeGenerator', () => {
  const space = createTraitSpace(['builder', 'analyst', 'creative']);

  const templates: NarrativeTemplates = {
    labels: { builder: 'Builder', analyst: 'Analyst' },
    single: {
      builder: 'You are a {label}.',
      analyst: 'You are an {label}.',
      creative: 'You are a {label} soul.',
    },
    pairs: { 'creative+builder': 'You make beautiful machines.' },
    blend: 'You blend {first} and {second}.',
    rounded: 'You are well-rounded.',
    none: 'Answer a few questions to see your identity.',
  };

  const generator = createNarrativeGenerator(space, templates);

  describe('classifyDominance', () => {
    it('should find a single leader', () => {
      expect(classifyDominance(space, [1, 4, 2])).toEqual({ kind: 'single', trait: 'analyst' });
    });

    it('should report a two-way tie in trait order', () => {
      expect(classifyDominance(space, [0, 2, 2])).toEqual({ kind: 'blend', traits: ['analyst', 'creative'] });
    });

    it('should report three or more tied leaders as rounded', () => {
      expect(classifyDominance(space, [1, 1, 1])).toEqual({
        kind: 'rounded',
        traits: ['builder', 'analyst', 'creative'],
      });
    });

    it('should report none for an all-zero profile', () => {
      expect(classifyDominance(space, [0, 0, 0])).toEqual({ kind: 'none' });
    });
  });

  describe('summarize', () => {
    it('should render the single-trait template with its label', () => {
      expect(generator.summarize([5, 1, 0])).toEqual({
        dominance: { kind: 'single', trait: 'builder' },
        text: 'You are a Builder.',
      });
    });

    it('should fall back to the trait name when no label is configured', () => {
      expect(generator.summarize([0, 0, 3]).text).toBe('You are a creative soul.');
      expect(generator.label('creative')).toBe('creative');
    });

    it('should use the blend template for pairs without an explicit text', () => {
      expect(generator.summarize([2, 2, 0]).text).toBe('You blend Builder and Analyst.');
    });

    it('should match explicit pair keys in either order', () => {
      expect(generator.summarize([3, 0, 3]).text).toBe('You make beautiful machines.');
    });

    it('should render the rounded and none messages', () => {
      expect(generator.summarize([1, 1, 1]).text).toBe('You are well-rounded.');
      expect(generator.summarize([0, 0, 0]).text).toBe('Answer a few questions to see your identity.');
    });

    it('should be deterministic', () => {
      expect(generator.summarize([2, 2, 0])).toEqual(generator.summarize([2, 2, 0]));
    });
  });

  describe('createNarrativeGenerator', () => {
    function expectInvalid(candidate: NarrativeTemplates, message: string): void {
      try {
        createNarrativeGenerator(space, candidate);
        throw new Error('expected createNarrativeGenerator to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(AdvisorError);
        expect((error as AdvisorError).code).toBe(ErrorCodes.INVALID_NARRATIVES);
        expect((error as AdvisorError).message).toBe(`Invalid narrative templates: ${message}`);
      }
    }

    it('should require a single template for every trait', () => {
      expectInvalid({ ...templates, single: { builder: 'x' } }, 'no single-trait template for: analyst, creative');
    });

    it('should reject templates for traits outside the space', () => {
      expectInvalid(
        { ...templates, single: { ...templates.single, pilot: 'x' } },
        'templates for unknown traits: pilot'
      );
    });

    it.each(['rounded', 'none'] as const)('should reject placeholders in the %s message', (key) => {
      const message = 'Balanced across {traits}.';
      expectInvalid(
        key === 'rounded' ? { ...templates, rounded: message } : { ...templates, none: message },
        `the ${key} message takes no placeholders`
      );
    });

    it.each(['builder', 'builder+builder', 'builder+pilot', 'a+b+c'])('should reject pair key %s', (key) => {
      expectInvalid(
        { ...templates, pairs: { [key]: 'x' } },
        `pair key '${key}' must name two different traits as 'a+b'`
      );
    });
  });

  describe('fillTemplate', () => {
    it('should leave unknown placeholders untouched', () => {
      expect(fillTemplate('{first} and {other}', { first: 'A' })).toBe('A and {other}');
    });
  });
});
