export * from './geo.js';
export * from './observation.js';
export * from './query.js';
export * from './results.js';
