/**
 * Evidence retrieval: chunking, lexical and semantic scoring
 *
 * @module services/retrieval
 */

export * from './chunker.js';
export * from './tokenizer.js';
export * from './vector-index.js';
export * from './retrieval-service.js';
