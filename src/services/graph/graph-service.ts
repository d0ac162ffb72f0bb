/**
 * Graph Service
 *
 * Renders an enriched knowledge graph as a metrics table, JSON, Mermaid
 * or DOT. Impacted nodes can be styled by severity; members of cyclic
 * components are marked in every format.
 */

import type { SeverityLabel } from '../../models/types.js';
import type { GraphNode } from '../../models/graph.js';
import type { ImpactRecord } from '../../models/impact.js';
import { KnowledgeGraph } from './knowledge-graph.js';
import { computeComponents, type CyclicComponent } from './graph-enricher.js';

/**
 * Graph output format options
 */
export type GraphFormat = 'table' | 'json' | 'mermaid' | 'dot';

export const GRAPH_FORMATS: readonly GraphFormat[] = ['table', 'json', 'mermaid', 'dot'];

/**
 * Options for graph rendering
 */
export interface GraphOptions {
  format: GraphFormat;
  /** Severity per impacted node id */
  severities?: ReadonlyMap<string, SeverityLabel>;
}

/**
 * Severity per impacted node, for styling a rendered graph
 */
export function severitiesOf(records: readonly ImpactRecord[]): Map<string, SeverityLabel> {
  return new Map(records.map(record => [record.nodeId, record.severity]));
}

/**
 * A dependency cycle, as a cyclic strongly connected component
 */
export interface CircularDependency extends CyclicComponent {
  severity: 'warning' | 'critical';
}

const MERMAID_SEVERITY_CLASSES: Record<SeverityLabel, string> = {
  high: 'fill:#d73a49,stroke:#b31d28,color:#fff',
  medium: 'fill:#fb8c00,stroke:#ef6c00,color:#fff',
  low: 'fill:#28a745,stroke:#22863a,color:#fff'
};

const DOT_SEVERITY_COLORS: Record<SeverityLabel, string> = {
  high: 'red',
  medium: 'orange',
  low: 'palegreen'
};

export interface IGraphService {
  render(graph: KnowledgeGraph, options?: GraphOptions): string;
  detectCircularDependencies(graph: KnowledgeGraph): CircularDependency[];
}

export class GraphService implements IGraphService {
  render(graph: KnowledgeGraph, options: GraphOptions = { format: 'table' }): string {
    const severities = options.severities ?? new Map<string, SeverityLabel>();
    switch (options.format) {
      case 'table':
        return this.generateTable(graph);
      case 'json':
        return JSON.stringify({ ...graph.toJSON(), cycles: this.detectCircularDependencies(graph) }, null, 2);
      case 'mermaid':
        return this.generateMermaidGraph(graph, severities);
      case 'dot':
        return this.generateDotGraph(graph, severities);
    }
  }

  /**
   * Cycles of more than three services are critical
   */
  detectCircularDependencies(graph: KnowledgeGraph): CircularDependency[] {
    return computeComponents(graph).map(component => ({
      ...component,
      severity: component.members.length > 3 ? 'critical' : 'warning'
    }));
  }

  private generateTable(graph: KnowledgeGraph): string {
    const rows: string[][] = [['NODE', 'KIND', 'RANK', 'BETWEENNESS', 'CYCLE']];
    for (const node of graph.getNodes()) {
      rows.push([
        node.id,
        node.kind,
        node.metrics.rank.toFixed(4),
        node.metrics.betweenness.toFixed(4),
        node.metrics.componentId ?? '-'
      ]);
    }

    const widths = rows[0].map((_, column) => Math.max(...rows.map(row => row[column].length)));
    const lines = rows.map(row => row.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd());

    const cycles = this.detectCircularDependencies(graph);
    if (cycles.length > 0) {
      lines.push('', 'Cycles:');
      for (const cycle of cycles) {
        lines.push(`- ${cycle.componentId}: ${cycle.members.join(', ')} (${cycle.severity})`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Generates Mermaid flowchart syntax
   */
  private generateMermaidGraph(graph: KnowledgeGraph, severities: ReadonlyMap<string, SeverityLabel>): string {
    const lines: string[] = ['graph LR', '', '%% Style definitions'];
    for (const [severity, style] of Object.entries(MERMAID_SEVERITY_CLASSES)) {
      lines.push(`classDef ${severity} ${style}`);
    }
    lines.push('classDef cyclic stroke-dasharray: 5 5', '');

    lines.push('%% Nodes');
    for (const node of graph.getNodes()) {
      lines.push(`${this.sanitizeNodeId(node.id)}["${this.escapeMermaidText(nodeCaption(node))}"]`);
    }
    lines.push('');

    const edges = graph.getEdges();
    if (edges.length > 0) {
      lines.push('%% Edges');
      for (const edge of edges) {
        const source = this.sanitizeNodeId(edge.source);
        const target = this.sanitizeNodeId(edge.target);
        lines.push(
          edge.relations.length > 0 ? `${source} -->|${edge.relations.join(', ')}| ${target}` : `${source} --> ${target}`
        );
      }
      lines.push('');
    }

    lines.push('%% Apply styles');
    for (const node of graph.getNodes()) {
      const nodeId = this.sanitizeNodeId(node.id);
      const severity = severities.get(node.id);
      if (severity) {
        lines.push(`class ${nodeId} ${severity}`);
      }
      if (node.metrics.componentId !== null) {
        lines.push(`class ${nodeId} cyclic`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Generates Graphviz DOT syntax; ids are quoted rather than sanitized
   */
  private generateDotGraph(graph: KnowledgeGraph, severities: ReadonlyMap<string, SeverityLabel>): string {
    const lines: string[] = ['digraph impact {', '  rankdir=LR;', '  node [shape=box];', ''];

    for (const node of graph.getNodes()) {
      const attributes = [`label="${this.escapeDotText(`${node.label}\n(${node.kind})`)}"`];
      const severity = severities.get(node.id);
      if (severity) {
        attributes.push('style=filled', `fillcolor=${DOT_SEVERITY_COLORS[severity]}`);
      }
      if (node.metrics.componentId !== null) {
        attributes.push('color=red');
      }
      lines.push(`  "${this.escapeDotText(node.id)}" [${attributes.join(', ')}];`);
    }

    const edges = graph.getEdges();
    if (edges.length > 0) {
      lines.push('');
      for (const edge of edges) {
        const label = edge.relations.length > 0 ? ` [label="${edge.relations.join(', ')}"]` : '';
        lines.push(`  "${this.escapeDotText(edge.source)}" -> "${this.escapeDotText(edge.target)}"${label};`);
      }
    }

    lines.push('}');
    return lines.join('\n');
  }

  /**
   * Sanitizes a node ID for use in Mermaid syntax
   */
  private sanitizeNodeId(id: string): string {
    return id.replace(/[^A-Za-z0-9_]/g, '_');
  }

  private escapeMermaidText(text: string): string {
    return text
      .replace(/"/g, "'")
      .replace(/\[/g, '(')
      .replace(/\]/g, ')')
      .replace(/\n/g, ' ');
  }

  private escapeDotText(text: string): string {
    return text
      .replace(/\\/g, '\\\\')
      .replace(/"/g, '\\"')
      .replace(/\n/g, '\\n');
  }
}

function nodeCaption(node: GraphNode): string {
  return node.label === node.id ? `${node.id} (${node.kind})` : `${node.id}: ${node.label} (${node.kind})`;
}
