export * from './enums.js';
export * from './analysis.js';
export * from './responses.js';
