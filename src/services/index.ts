// Export all services

export * from './config/analysis-config.js';
export * from './config/config-service.js';
export * from './graph/index.js';
export * from './impact/index.js';
export * from './retrieval/index.js';
export * from './risk/risk-aggregator.js';
export * from './providers/index.js';
export * from './storage/embedding-cache.js';
export * from './storage/artifact-store.js';
export * from './changes/change-set-service.js';
export * from './report/report-service.js';
export * from './analysis/impact-analysis-service.js';
