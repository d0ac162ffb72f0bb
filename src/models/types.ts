// Core type definitions for the service impact analyzer

// Node kinds produced by the discovery scanner
export type NodeKind = 'service' | 'api-gateway' | 'contract' | 'infra-config';

// Edge relation kinds
export type RelationKind = 'import' | 'http-call' | 'contract-reference';

// Severity labels attached to impacted nodes
export type SeverityLabel = 'low' | 'medium' | 'high';

// How evidence chunks were scored
export type RetrievalMode = 'semantic' | 'lexical';

// Confidence of an analysis run as a whole
export type AnalysisConfidence = 'low' | 'normal';

export const NODE_KINDS: readonly NodeKind[] = ['service', 'api-gateway', 'contract', 'infra-config'];
export const RELATION_KINDS: readonly RelationKind[] = ['import', 'http-call', 'contract-reference'];
export const SEVERITY_LABELS: readonly SeverityLabel[] = ['low', 'medium', 'high'];
