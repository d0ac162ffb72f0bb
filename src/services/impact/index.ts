/**
 * Impact traversal: change set -> entry nodes -> downstream nodes
 *
 * @module services/impact
 */

export * from './file-ownership.js';
export * from './impact-traversal.js';
