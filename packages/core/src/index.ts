export * from './types.js';
export * from './config.js';
export * from './normalize.js';
export * from './similarity.js';
export * from './aliasDirectory.js';
export * from './teams.js';
export * from './markets.js';
export * from './scores.js';
export * from './marketMapping.js';
export * from './classification.js';
export * from './directory.js';
export * from './parser.js';
export * from './selection.js';
export * from './pricing.js';
export * from './betInput.js';
export * from './evaluator.js';
