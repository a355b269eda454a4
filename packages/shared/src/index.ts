export * from './constants.js';
export * from './flowchart.js';
export * from './id.js';
export * from './logger.js';
export * from './types.js';
