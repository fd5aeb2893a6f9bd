/**
 * Programme Advisor - public API
 */

// Domain
export * from './domain/errors.js';
export * from './domain/profile/trait-space.js';
export * from './domain/profile/questionnaire.js';
export * from './domain/profile/answer-aggregator.js';
export * from './domain/profile/text-signal.js';
export * from './domain/catalog/catalog-index.js';
export * from './domain/matching/similarity-ranker.js';
export * from './domain/narrative/narrative-generator.js';
export * from './domain/narrative/identity-snapshot.js';

// Application
export * from './app/advisor/advisor-engine.js';
export * from './app/advisor/advisor-factory.js';
export * from './app/advisor/results-export.js';
export * from './app/advisor/fit-explainer.js';

// Infrastructure
export * from './infra/config/index.js';
export * from './infra/data/catalog-loader.js';
export * from './infra/data/definition-loader.js';
export * from './infra/llm/chat-client.js';
