export * from './validator.js';
export * from './parser.js';
export * from './analyzer.js';
export * from './ears.js';
export * from './gherkin.js';
export * from './transformer.js';
export * from './output.js';
export * from './loop-detector.js';
export * from './quality.js';
export * from './pipeline.js';
export { storyVocabulary } from './vocabulary.js';
