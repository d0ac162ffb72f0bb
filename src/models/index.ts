// Export all models

export * from './types.js';
export type * from './graph.js';
export type * from './evidence.js';
export type * from './impact.js';
