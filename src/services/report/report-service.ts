/**
 * Report Service
 *
 * Turns an analysis result into reviewer-facing markdown. The static report
 * is a pure function of its input; the narrated report asks the model
 * provider for a summary and falls back to the static report when the
 * provider is missing or fails.
 */

import type { AnalysisResult, ImpactRecord } from '../../models/impact.js';
import type { SeverityLabel } from '../../models/types.js';
import { describeError } from '../../core/errors.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { validateTitle } from '../../core/validation.js';
import type { ModelProvider } from '../providers/model-provider.js';

export interface ReportContext {
  result: AnalysisResult;
  title?: string;
  /** Adds a generation comment on top when set */
  generatedAt?: Date;
}

export interface ReportOptions {
  /** Evidence entries listed per service */
  maxEvidencePerNode?: number;
  /** Characters of chunk text quoted in the prompt */
  excerptChars?: number;
  /** Completion timeout */
  completionTimeoutMs?: number;
}

export interface ReportDependencies {
  provider?: ModelProvider | null;
  logger?: Logger;
}

export interface NarratedReport {
  markdown: string;
  narrated: boolean;
  /** Why the static report was used instead */
  reason?: string;
}

export const NARRATIVE_SYSTEM_PROMPT =
  'You are a senior engineer reviewing a multi-service change. ' +
  'Write a short markdown summary for the pull request: what changed, which services are at risk and why, ' +
  'and which tests to run. Only use facts from the context.';

const SEVERITY_ORDER: Record<SeverityLabel, number> = { low: 0, medium: 1, high: 2 };

/**
 * Highest severity among the records; low when nothing is impacted
 */
export function overallSeverity(records: readonly ImpactRecord[]): SeverityLabel {
  let worst: SeverityLabel = 'low';
  for (const record of records) {
    if (SEVERITY_ORDER[record.severity] > SEVERITY_ORDER[worst]) {
      worst = record.severity;
    }
  }
  return worst;
}

export class ReportService {
  private readonly maxEvidencePerNode: number;
  private readonly excerptChars: number;
  private readonly completionTimeoutMs: number;
  private readonly provider: ModelProvider | null;
  private readonly log: Logger;

  constructor(options: ReportOptions = {}, dependencies: ReportDependencies = {}) {
    this.maxEvidencePerNode = options.maxEvidencePerNode ?? 3;
    this.excerptChars = options.excerptChars ?? 400;
    this.completionTimeoutMs = options.completionTimeoutMs ?? 60000;
    this.provider = dependencies.provider ?? null;
    this.log = (dependencies.logger ?? rootLogger).child('report');
  }

  /**
   * Deterministic markdown report
   */
  render(context: ReportContext): string {
    const { result } = context;
    const sections: string[] = [];

    const heading = `# Impact Analysis: ${validateTitle(context.title)}`;
    sections.push(context.generatedAt ? `<!-- generated: ${context.generatedAt.toISOString()} -->\n${heading}` : heading);
    sections.push(renderDashboard(result));

    const notes = renderNotes(result);
    if (notes) {
      sections.push(notes);
    }

    if (result.records.length === 0) {
      sections.push(
        result.confidence === 'low'
          ? 'No changed file maps to a known service; impact could not be determined.'
          : 'No impacted services found.'
      );
    }

    for (const record of result.records) {
      sections.push(this.renderCard(record));
    }

    return `${sections.join('\n\n')}\n`;
  }

  /**
   * Prompt for the narrative summary; records keep their risk order
   */
  buildPrompt(context: ReportContext): string {
    const { result } = context;
    const lines: string[] = [
      `Change title: ${validateTitle(context.title)}`,
      `Overall severity: ${overallSeverity(result.records)}`,
      '',
      'Changed files:',
      ...result.changeSet.map(file => `- ${file}`)
    ];

    if (result.unmappedFiles.length > 0) {
      lines.push('', 'Files not owned by any service:', ...result.unmappedFiles.map(file => `- ${file}`));
    }

    lines.push('', 'Impacted services (highest risk first):');
    if (result.records.length === 0) {
      lines.push('- none');
    }
    for (const record of result.records) {
      lines.push(
        `- ${record.nodeId} (${record.kind}): severity ${record.severity}, risk ${record.riskEstimate}, ` +
          `distance ${record.distance}, path ${record.path.join(' -> ')}`
      );
      for (const { chunk } of record.evidence.slice(0, this.maxEvidencePerNode)) {
        lines.push(`  evidence ${chunk.filePath}:${chunk.lineStart}-${chunk.lineEnd}`);
        for (const excerptLine of excerpt(chunk.text, this.excerptChars).split('\n')) {
          lines.push(`    ${excerptLine}`);
        }
      }
    }

    return lines.join('\n');
  }

  /**
   * Narrative report from the provider, followed by the static report
   */
  async narrate(context: ReportContext): Promise<NarratedReport> {
    const fallback = this.render(context);
    if (!this.provider) {
      return { markdown: fallback, narrated: false, reason: 'no completion provider configured' };
    }

    let narrative: string;
    try {
      narrative = await this.provider.complete(this.buildPrompt(context), {
        system: NARRATIVE_SYSTEM_PROMPT,
        signal: AbortSignal.timeout(this.completionTimeoutMs)
      });
    } catch (error) {
      const reason = describeError(error);
      this.log.warn('Narrative unavailable, using static report', { provider: this.provider.name, reason });
      return { markdown: fallback, narrated: false, reason };
    }

    if (narrative.trim().length === 0) {
      return { markdown: fallback, narrated: false, reason: 'provider returned an empty completion' };
    }
    return { markdown: `${narrative.trim()}\n\n---\n\n${fallback}`, narrated: true };
  }

  private renderCard(record: ImpactRecord): string {
    const lines: string[] = [`## ${record.label} (${record.severity.toUpperCase()}, risk ${record.riskEstimate})`, ''];

    lines.push(`- Kind: ${record.kind}`);
    lines.push(
      record.distance === 0
        ? '- Distance: 0 (changed directly)'
        : `- Distance: ${record.distance} via ${record.path.join(' -> ')}`
    );

    const structure = [`rank ${record.metrics.rank.toFixed(4)}`, `betweenness ${record.metrics.betweenness.toFixed(4)}`];
    if (record.metrics.componentId !== null) {
      structure.push(`cycle ${record.metrics.componentId}`);
    }
    lines.push(`- Structure: ${structure.join(', ')}`);

    const retrieval = record.retrieval.reason
      ? `${record.retrieval.mode} (${record.retrieval.reason})`
      : record.retrieval.mode;
    lines.push(`- Retrieval: ${retrieval}`);

    const evidence = record.evidence.slice(0, this.maxEvidencePerNode);
    if (evidence.length > 0) {
      lines.push('', 'Evidence:');
      for (const { chunk, score } of evidence) {
        lines.push(`- \`${chunk.filePath}:${chunk.lineStart}-${chunk.lineEnd}\` (score ${formatScore(score)})`);
      }
    }

    return lines.join('\n');
  }
}

function renderDashboard(result: AnalysisResult): string {
  const services = result.records.map(record => record.nodeId).join(', ') || 'none';
  return [
    `**Severity:** ${overallSeverity(result.records).toUpperCase()}`,
    `**Impacted services:** ${services}`,
    `**Changed files:** ${result.changeSet.length}`,
    `**Confidence:** ${result.confidence}`
  ].join(' | ');
}

function renderNotes(result: AnalysisResult): string {
  const notes: string[] = [];
  if (result.degraded) {
    const count = result.records.filter(record => record.retrieval.degraded).length;
    notes.push(`> Evidence for ${count} service(s) was ranked lexically; semantic retrieval was unavailable.`);
  }
  if (result.unmappedFiles.length > 0) {
    notes.push(`> Unmapped files: ${result.unmappedFiles.join(', ')}`);
  }
  return notes.join('\n>\n');
}

function formatScore(score: number): string {
  return Number.isInteger(score) ? String(score) : score.toFixed(3);
}

function excerpt(text: string, maxChars: number): string {
  const trimmed = text.trim();
  return trimmed.length > maxChars ? `${trimmed.slice(0, maxChars)}...` : trimmed;
}
