/**
 * End-to-end tests for the impact analysis pipeline
 */

import { describe, it, expect } from 'vitest';
import { ImpactAnalysisService, toRunArtifact } from './impact-analysis-service.js';
import { DeterministicModelProvider } from '../providers/deterministic-provider.js';
import { ConfigurationError, StructuralError, SecurityError } from '../../core/errors.js';
import { Logger, LogLevel } from '../../core/logger.js';
import type { TopologyInput } from '../../models/graph.js';
import type { AnalysisConfigOverrides } from '../config/analysis-config.js';

const quiet = new Logger({ level: LogLevel.SILENT });

function topology(): TopologyInput {
  return {
    nodes: [
      { id: 'gateway', kind: 'api-gateway', files: ['gateway/'] },
      { id: 'orders', files: ['orders/'] },
      { id: 'billing', files: ['billing/'] },
      { id: 'audit' }
    ],
    edges: [
      { source: 'orders', target: 'gateway', relation: 'http-call' },
      { source: 'orders', target: 'billing', relation: 'http-call' },
      { source: 'billing', target: 'audit', relation: 'import' }
    ],
    artifacts: [
      { nodeId: 'orders', filePath: 'orders/api.py', text: 'def create_order(payload):\n    pass' },
      { nodeId: 'billing', filePath: 'billing/charge.py', text: 'def charge_invoice(payload):\n    return gateway.post(payload)' }
    ]
  };
}

const DIFFS = { 'orders/api.py': '+def create_order(payload):\n+    charge_invoice(payload)' };

function lexicalService(overrides: AnalysisConfigOverrides = {}): ImpactAnalysisService {
  return new ImpactAnalysisService({ embeddingEnabled: false, ...overrides }, { logger: quiet });
}

describe('ImpactAnalysisService', () => {
  describe('analyze - unit tests', () => {
    it('should rank impacted services by risk', async () => {
      const result = await lexicalService().analyze({
        topology: topology(),
        changeSet: ['./orders/api.py'],
        diffs: DIFFS
      });

      expect(result.changeSet).toEqual(['orders/api.py']);
      expect(result.entryNodes).toEqual(['orders']);
      expect(result.confidence).toBe('normal');
      expect(result.degraded).toBe(true);
      expect(result.records.map(r => [r.nodeId, r.distance, r.riskEstimate, r.severity])).toEqual([
        ['orders', 0, 71, 'high'],
        ['billing', 1, 53, 'medium'],
        ['gateway', 1, 32, 'low'],
        ['audit', 2, 30, 'low']
      ]);
    });

    it('should carry path, evidence and retrieval status on each record', async () => {
      const result = await lexicalService().analyze({ topology: topology(), changeSet: ['orders/api.py'], diffs: DIFFS });
      const billing = result.records.find(r => r.nodeId === 'billing');
      const audit = result.records.find(r => r.nodeId === 'audit');

      expect(billing?.path).toEqual(['orders', 'billing']);
      expect(billing?.evidence.map(e => [e.chunk.filePath, e.chunk.lineStart, e.chunk.lineEnd, e.score])).toEqual([
        ['billing/charge.py', 1, 2, 3]
      ]);
      expect(billing?.signals.content).toBe(0.75);
      expect(billing?.retrieval).toEqual({ mode: 'lexical', degraded: true, reason: 'embeddings disabled' });
      expect(audit?.path).toEqual(['orders', 'billing', 'audit']);
      expect(audit?.evidence).toEqual([]);
      expect(audit?.signals).toEqual({ proximity: 1 / 3, centrality: 0.5, content: 0 });
    });

    it('should honour maxHops', async () => {
      const result = await lexicalService({ maxHops: 1 }).analyze({ topology: topology(), changeSet: ['orders/api.py'] });
      expect(result.records.map(r => r.nodeId).sort()).toEqual(['billing', 'gateway', 'orders']);
    });

    it('should report unmapped files and low confidence when nothing maps', async () => {
      const result = await lexicalService().analyze({ topology: topology(), changeSet: ['README.md'] });
      expect(result).toEqual({
        changeSet: ['README.md'],
        entryNodes: [],
        unmappedFiles: ['README.md'],
        confidence: 'low',
        degraded: false,
        records: []
      });
    });

    it('should analyze an empty graph without error', async () => {
      const result = await lexicalService().analyze({ topology: { nodes: [] }, changeSet: ['a.py'] });
      expect(result.records).toEqual([]);
      expect(result.confidence).toBe('low');
    });

    it('should score semantically with a working provider', async () => {
      const service = new ImpactAnalysisService({}, { provider: new DeterministicModelProvider(), logger: quiet });
      const result = await service.analyze({ topology: topology(), changeSet: ['orders/api.py'], diffs: DIFFS });
      expect(result.degraded).toBe(false);
      expect(result.records.every(r => r.retrieval.mode === 'semantic' && !r.retrieval.degraded)).toBe(true);
    });
  });

  describe('errors', () => {
    it('should reject invalid configuration before touching the graph', () => {
      expect(() => new ImpactAnalysisService({ topK: 0 })).toThrow(ConfigurationError);
    });

    it('should reject malformed topology', async () => {
      await expect(lexicalService().analyze({ topology: { nodes: 'x' }, changeSet: [] })).rejects.toThrow(StructuralError);
    });

    it('should reject edges to unknown nodes', async () => {
      const input = { nodes: [{ id: 'a' }], edges: [{ source: 'a', target: 'b' }] };
      await expect(lexicalService().analyze({ topology: input, changeSet: [] })).rejects.toThrow(
        'Edge a -> b references unknown node: b'
      );
    });

    it('should reject artifacts of unknown nodes', async () => {
      const input = { nodes: [{ id: 'a' }], artifacts: [{ nodeId: 'ghost', filePath: 'g.py', text: 'x' }] };
      await expect(lexicalService().analyze({ topology: input, changeSet: ['a/x.py'] })).rejects.toThrow(StructuralError);
    });

    it('should reject change sets escaping the root', async () => {
      await expect(lexicalService().analyze({ topology: topology(), changeSet: ['../etc/passwd'] })).rejects.toThrow(
        SecurityError
      );
    });
  });

  describe('Property: determinism', () => {
    it('should produce identical results across runs and input orderings', async () => {
      const service = lexicalService();
      const forward = await service.analyze({ topology: topology(), changeSet: ['orders/api.py'], diffs: DIFFS });

      const reordered = topology();
      reordered.nodes.reverse();
      reordered.edges.reverse();
      reordered.artifacts?.reverse();
      const backward = await service.analyze({ topology: reordered, changeSet: ['orders/api.py'], diffs: DIFFS });

      expect(JSON.stringify(backward)).toBe(JSON.stringify(forward));
    });
  });

  describe('toRunArtifact', () => {
    it('should produce the persisted shape with a stable key order', async () => {
      const result = await lexicalService({ topK: 1 }).analyze({
        topology: topology(),
        changeSet: ['orders/api.py'],
        diffs: DIFFS
      });
      const artifact = toRunArtifact(result, { title: '  Add order endpoint ', generatedAt: new Date('2024-05-01T00:00:00Z') });

      expect(Object.keys(artifact)).toEqual(['generatedAt', 'title', 'changeSet', 'confidence', 'degraded', 'records']);
      expect(artifact.generatedAt).toBe('2024-05-01T00:00:00.000Z');
      expect(artifact.title).toBe('Add order endpoint');
      expect(artifact.records[0]).toEqual({
        nodeId: 'orders',
        severity: 'high',
        riskEstimate: 71,
        distance: 0,
        evidence: [{ filePath: 'orders/api.py', lineStart: 1, lineEnd: 2, score: 3 }]
      });
      expect(Object.keys(artifact.records[0])).toEqual(['nodeId', 'severity', 'riskEstimate', 'distance', 'evidence']);
    });

    it('should default the title', () => {
      const artifact = toRunArtifact({
        changeSet: [],
        entryNodes: [],
        unmappedFiles: [],
        confidence: 'low',
        degraded: false,
        records: []
      });
      expect(artifact.title).toBe('(no title)');
    });
  });
});
