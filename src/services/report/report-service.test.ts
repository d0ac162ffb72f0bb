/**
 * Tests for markdown reports and narration fallback
 */

import { describe, it, expect, vi } from 'vitest';
import { ReportService, overallSeverity, NARRATIVE_SYSTEM_PROMPT } from './report-service.js';
import { DeterministicModelProvider } from '../providers/deterministic-provider.js';
import type { ModelProvider } from '../providers/model-provider.js';
import type { AnalysisResult, ImpactRecord } from '../../models/impact.js';
import { ProviderError } from '../../core/errors.js';
import { Logger, LogLevel } from '../../core/logger.js';

const quiet = new Logger({ level: LogLevel.SILENT });

const ORDERS: ImpactRecord = {
  nodeId: 'orders',
  kind: 'service',
  label: 'orders',
  distance: 0,
  path: ['orders'],
  metrics: { rank: 0.25, betweenness: 0.5, componentId: null },
  evidence: [
    {
      chunk: {
        nodeId: 'orders',
        filePath: 'orders/api.py',
        lineStart: 1,
        lineEnd: 2,
        text: 'def create_order(payload):\n    pass'
      },
      score: 3
    }
  ],
  retrieval: { mode: 'lexical', degraded: true, reason: 'embeddings disabled' },
  signals: { proximity: 1, centrality: 0.75, content: 1 },
  riskEstimate: 71,
  severity: 'high'
};

const AUDIT: ImpactRecord = {
  nodeId: 'audit',
  kind: 'service',
  label: 'Audit Log',
  distance: 2,
  path: ['orders', 'billing', 'audit'],
  metrics: { rank: 0.1, betweenness: 0, componentId: 'scc-0' },
  evidence: [],
  retrieval: { mode: 'semantic', degraded: false },
  signals: { proximity: 1 / 3, centrality: 0.5, content: 0 },
  riskEstimate: 30,
  severity: 'low'
};

const RESULT: AnalysisResult = {
  changeSet: ['orders/api.py', 'README.md'],
  entryNodes: ['orders'],
  unmappedFiles: ['README.md'],
  confidence: 'normal',
  degraded: true,
  records: [ORDERS, AUDIT]
};

const EXPECTED_REPORT = [
  '# Impact Analysis: Add order endpoint',
  '',
  '**Severity:** HIGH | **Impacted services:** orders, audit | **Changed files:** 2 | **Confidence:** normal',
  '',
  '> Evidence for 1 service(s) was ranked lexically; semantic retrieval was unavailable.',
  '>',
  '> Unmapped files: README.md',
  '',
  '## orders (HIGH, risk 71)',
  '',
  '- Kind: service',
  '- Distance: 0 (changed directly)',
  '- Structure: rank 0.2500, betweenness 0.5000',
  '- Retrieval: lexical (embeddings disabled)',
  '',
  'Evidence:',
  '- `orders/api.py:1-2` (score 3)',
  '',
  '## Audit Log (LOW, risk 30)',
  '',
  '- Kind: service',
  '- Distance: 2 via orders -> billing -> audit',
  '- Structure: rank 0.1000, betweenness 0.0000, cycle scc-0',
  '- Retrieval: semantic',
  ''
].join('\n');

function rejectingProvider(error: Error): ModelProvider {
  return {
    name: 'broken',
    embeddingModel: 'none',
    embed: vi.fn().mockResolvedValue([]),
    complete: vi.fn().mockRejectedValue(error)
  };
}

describe('ReportService', () => {
  describe('overallSeverity', () => {
    it('should pick the worst label', () => {
      expect(overallSeverity([AUDIT, ORDERS])).toBe('high');
      expect(overallSeverity([AUDIT])).toBe('low');
      expect(overallSeverity([])).toBe('low');
    });
  });

  describe('render', () => {
    it('should render the dashboard and one card per service', () => {
      const service = new ReportService();
      expect(service.render({ result: RESULT, title: 'Add order endpoint' })).toBe(EXPECTED_REPORT);
    });

    it('should prefix a generation comment when a timestamp is given', () => {
      const markdown = new ReportService().render({ result: RESULT, generatedAt: new Date('2024-05-01T12:00:00Z') });
      expect(markdown.split('\n').slice(0, 2)).toEqual([
        '<!-- generated: 2024-05-01T12:00:00.000Z -->',
        '# Impact Analysis: (no title)'
      ]);
    });

    it('should explain an empty low-confidence result', () => {
      const markdown = new ReportService().render({
        result: {
          changeSet: ['README.md'],
          entryNodes: [],
          unmappedFiles: ['README.md'],
          confidence: 'low',
          degraded: false,
          records: []
        },
        title: 'Docs'
      });
      expect(markdown).toBe(
        [
          '# Impact Analysis: Docs',
          '',
          '**Severity:** LOW | **Impacted services:** none | **Changed files:** 1 | **Confidence:** low',
          '',
          '> Unmapped files: README.md',
          '',
          'No changed file maps to a known service; impact could not be determined.',
          ''
        ].join('\n')
      );
    });

    it('should limit evidence per card and format fractional scores', () => {
      const evidence = [0.91234, 0.5, 0.25].map((score, i) => ({
        chunk: { nodeId: 'orders', filePath: `orders/f${i}.py`, lineStart: 1, lineEnd: 1, text: 'x' },
        score
      }));
      const markdown = new ReportService({ maxEvidencePerNode: 2 }).render({
        result: { ...RESULT, records: [{ ...ORDERS, evidence }] }
      });
      expect(markdown).toContain('- `orders/f0.py:1-1` (score 0.912)\n- `orders/f1.py:1-1` (score 0.500)\n');
      expect(markdown).not.toContain('orders/f2.py');
    });
  });

  describe('buildPrompt', () => {
    it('should list files, services and evidence excerpts in risk order', () => {
      const prompt = new ReportService().buildPrompt({ result: RESULT, title: 'Add order endpoint' });
      expect(prompt).toBe(
        [
          'Change title: Add order endpoint',
          'Overall severity: high',
          '',
          'Changed files:',
          '- orders/api.py',
          '- README.md',
          '',
          'Files not owned by any service:',
          '- README.md',
          '',
          'Impacted services (highest risk first):',
          '- orders (service): severity high, risk 71, distance 0, path orders',
          '  evidence orders/api.py:1-2',
          '    def create_order(payload):',
          '        pass',
          '- audit (service): severity low, risk 30, distance 2, path orders -> billing -> audit'
        ].join('\n')
      );
    });

    it('should truncate long excerpts', () => {
      const long: ImpactRecord = {
        ...ORDERS,
        evidence: [{ chunk: { ...ORDERS.evidence[0].chunk, text: 'abcdefghij' }, score: 1 }]
      };
      const prompt = new ReportService({ excerptChars: 4 }).buildPrompt({ result: { ...RESULT, records: [long] } });
      expect(prompt.split('\n').at(-1)).toBe('    abcd...');
    });
  });

  describe('narrate', () => {
    it('should place the narrative above the static report', async () => {
      const service = new ReportService({}, { provider: new DeterministicModelProvider(), logger: quiet });
      const report = await service.narrate({ result: RESULT, title: 'Add order endpoint' });
      expect(report).toEqual({
        markdown: `Deterministic narrative: Change title: Add order endpoint\n\n---\n\n${EXPECTED_REPORT}`,
        narrated: true
      });
    });

    it('should pass the system prompt to the provider', async () => {
      const complete = vi.fn().mockResolvedValue('Summary');
      const provider: ModelProvider = { name: 'spy', embeddingModel: 'none', embed: vi.fn(), complete };
      await new ReportService({}, { provider, logger: quiet }).narrate({ result: RESULT });
      expect(complete).toHaveBeenCalledTimes(1);
      expect(complete.mock.calls[0][1]).toMatchObject({ system: NARRATIVE_SYSTEM_PROMPT });
    });

    it('should fall back to the static report without a provider', async () => {
      const report = await new ReportService({}, { logger: quiet }).narrate({ result: RESULT, title: 'Add order endpoint' });
      expect(report).toEqual({
        markdown: EXPECTED_REPORT,
        narrated: false,
        reason: 'no completion provider configured'
      });
    });

    it('should fall back to the static report when the provider fails', async () => {
      const provider = rejectingProvider(new ProviderError('Completion request failed: quota exceeded', 'broken'));
      const report = await new ReportService({}, { provider, logger: quiet }).narrate({
        result: RESULT,
        title: 'Add order endpoint'
      });
      expect(report).toEqual({
        markdown: EXPECTED_REPORT,
        narrated: false,
        reason: 'Completion request failed: quota exceeded'
      });
    });

    it('should fall back on an empty completion', async () => {
      const provider: ModelProvider = {
        name: 'blank',
        embeddingModel: 'none',
        embed: vi.fn(),
        complete: vi.fn().mockResolvedValue('   ')
      };
      const report = await new ReportService({}, { provider, logger: quiet }).narrate({ result: RESULT });
      expect(report.narrated).toBe(false);
      expect(report.reason).toBe('provider returned an empty completion');
    });
  });
});
