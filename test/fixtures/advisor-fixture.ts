import { AdvisorEngine, type AdvisorEngineOptions } from '../../src/app/advisor/advisor-engine.js';
import { CatalogIndex } from '../../src/domain/catalog/catalog-index.js';
import { createNarrativeGenerator } from '../../src/domain/narrative/narrative-generator.js';
import { compileQuestionnaire } from '../../src/domain/profile/questionnaire.js';
import { createTraitSpace } from '../../src/domain/profile/trait-space.js';

export const fixtureSpace = createTraitSpace(['builder', 'analyst', 'creative']);

export const fixtureCatalog = CatalogIndex.fromRecords(
  [
    { id: 'mech', program_name: 'Mechanical Engineering', institution: 'Engineering', builder: 3, analyst: 0, creative: 0 },
    { id: 'stats', program_name: 'Statistics', institution: 'Science', builder: 0, analyst: 3, creative: 0 },
    { id: 'design', program_name: 'Industrial Design', institution: 'Design', builder: 1, analyst: 0, creative: 2 },
  ],
  { idColumn: 'id', displayColumns: ['program_name', 'institution'], traitSpace: fixtureSpace }
);

export const fixtureQuestionnaire = compileQuestionnaire(fixtureSpace, {
  questions: [
    {
      id: 'q1',
      prompt: 'Which activity do you enjoy most?',
      options: [
        { id: 'make', label: 'Making things', weights: { builder: 2 } },
        { id: 'count', label: 'Counting things', weights: { analyst: 2 } },
        { id: 'draw', label: 'Drawing things', weights: { creative: 2 } },
      ],
    },
    {
      id: 'q2',
      prompt: 'A project goes wrong. You...',
      options: [
        { id: 'fix', label: 'Fix it by hand', weights: { builder: 1 } },
        { id: 'plan', label: 'Re-plan it', weights: { analyst: 1 } },
        { id: 'none', label: 'None of these', weights: {} },
      ],
    },
  ],
});

export const fixtureNarratives = createNarrativeGenerator(fixtureSpace, {
  labels: { builder: 'Builder', analyst: 'Analyst', creative: 'Creative' },
  single: {
    builder: 'You are a {label}.',
    analyst: 'You are an {label}.',
    creative: 'You are a {label}.',
  },
  blend: 'You blend {first} and {second}.',
  rounded: 'You are well-rounded.',
  none: 'No dominant work mode yet.',
});

export function createFixtureEngine(overrides: Partial<AdvisorEngineOptions> = {}): AdvisorEngine {
  return new AdvisorEngine({
    catalog: fixtureCatalog,
    questionnaire: fixtureQuestionnaire,
    narratives: fixtureNarratives,
    ...overrides,
  });
}
