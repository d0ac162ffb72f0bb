// Graph command - enriched service graph with metrics and cycles

import * as path from 'path';
import { writeFile } from 'fs/promises';
import { Command, Option } from 'commander';
import { ConfigService, DEFAULT_CONFIG_DIR } from '../../services/config/config-service.js';
import { ImpactAnalysisService } from '../../services/analysis/impact-analysis-service.js';
import { GraphService, GRAPH_FORMATS, severitiesOf, type GraphFormat } from '../../services/graph/graph-service.js';
import { ChangeSetService } from '../../services/changes/change-set-service.js';
import { handleError, success } from '../utils/error-handler.js';
import { readTopologyFile } from '../utils/input.js';

interface GraphCommandOptions {
  format: GraphFormat;
  output?: string;
  configDir?: string;
  changed?: string;
}

export function registerGraphCommand(program: Command): void {
  program
    .command('graph')
    .description('Print the enriched service graph: rank, betweenness and cycles')
    .argument('<topology>', 'Topology file (JSON or YAML) produced by discovery')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(GRAPH_FORMATS).default('table'))
    .option('-o, --output <file>', 'Write output to file instead of stdout')
    .option('--config-dir <dir>', 'Configuration directory', DEFAULT_CONFIG_DIR)
    .option('-c, --changed <files>', 'Color the services these changed files impact (comma- or newline-separated)')
    .action(async (topologyFile: string, options: GraphCommandOptions) => {
      try {
        const config = await new ConfigService({ baseDir: options.configDir }).getAnalysisConfig();
        // lexical evidence only: graph never calls a model
        const analysis = new ImpactAnalysisService({ ...config, embeddingEnabled: false });
        const { topology, graph } = analysis.prepareGraph(await readTopologyFile(topologyFile));

        const changed = options.changed === undefined ? null : new ChangeSetService().fromList(options.changed);
        const severities = changed
          ? severitiesOf((await analysis.analyzeGraph(graph, topology, changed.files)).records)
          : undefined;

        const rendered = new GraphService().render(graph, { format: options.format, severities });

        if (options.output) {
          await writeFile(path.resolve(options.output), `${rendered}\n`, 'utf-8');
          success(`Graph written to ${options.output} (${options.format})`);
        } else {
          console.log(rendered);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
