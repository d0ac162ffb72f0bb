// Analyze command - change impact across the service graph

import * as path from 'path';
import { Command } from 'commander';
import { ConfigService, DEFAULT_CONFIG_DIR } from '../../services/config/config-service.js';
import { ChangeSetService, type ChangeSet } from '../../services/changes/change-set-service.js';
import { ImpactAnalysisService, toRunArtifact } from '../../services/analysis/impact-analysis-service.js';
import { ReportService } from '../../services/report/report-service.js';
import { EmbeddingCache } from '../../services/storage/embedding-cache.js';
import {
  saveRunArtifact,
  loadEmbeddingCache,
  saveEmbeddingCache
} from '../../services/storage/artifact-store.js';
import { createModelProvider, type ProviderName } from '../../services/providers/index.js';
import { logger } from '../../core/logger.js';
import { handleError, success } from '../utils/error-handler.js';
import { parseNonNegativeInteger, parseProviderName, readTopologyFile } from '../utils/input.js';

/**
 * Analyze command options
 */
interface AnalyzeOptions {
  changed?: string;
  base?: string;
  head?: string;
  root: string;
  configDir?: string;
  title?: string;
  json?: boolean;
  out?: string;
  topK?: number;
  maxHops?: number;
  embeddings: boolean;
  provider?: ProviderName;
  embeddingCache?: string;
  narrate?: boolean;
}

/**
 * Registers the analyze command
 *
 * - impact analyze topology.json --changed "orders/api.py,billing/charge.py"
 * - impact analyze topology.json --base origin/main --narrate
 * - CHANGED_FILES=... impact analyze topology.json --json --out impact-summary.json
 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Rank the services a change may affect')
    .argument('<topology>', 'Topology file (JSON or YAML) produced by discovery')
    .option('-c, --changed <files>', 'Changed files, comma- or newline-separated (default: $CHANGED_FILES)')
    .option('-b, --base <ref>', 'Collect changed files from git against this ref')
    .option('--head <ref>', 'Compare the base ref with this ref instead of the working tree')
    .option('-r, --root <dir>', 'Analysis root (repository checkout)', process.cwd())
    .option('--config-dir <dir>', `Configuration directory (default: <root>/${DEFAULT_CONFIG_DIR})`)
    .option('-t, --title <title>', 'Change title (default: $PR_TITLE)')
    .option('--json', 'Print the run artifact as JSON instead of markdown')
    .option('-o, --out <file>', 'Write the run artifact to a file')
    .option('-k, --top-k <n>', 'Evidence chunks kept per service', parseNonNegativeInteger)
    .option('--max-hops <n>', 'Stop traversal after this many hops', parseNonNegativeInteger)
    .option('--no-embeddings', 'Rank evidence lexically without calling the embedding provider')
    .option('-p, --provider <name>', 'Model provider (openai, deterministic)', parseProviderName)
    .option('--embedding-cache <file>', 'Load and save embedding cache snapshots at this path')
    .option('--narrate', 'Ask the model provider for a narrative summary')
    .action(async (topologyFile: string, options: AnalyzeOptions) => {
      try {
        await runAnalyze(topologyFile, options);
      } catch (error) {
        handleError(error);
      }
    });
}

async function runAnalyze(topologyFile: string, options: AnalyzeOptions): Promise<void> {
  const root = path.resolve(options.root);
  const configService = new ConfigService({ baseDir: options.configDir ?? path.join(root, DEFAULT_CONFIG_DIR) });
  const resolved = await configService.resolve(
    {
      topK: options.topK,
      maxHops: options.maxHops,
      embeddingEnabled: options.embeddings ? undefined : false
    },
    { name: options.provider }
  );

  const topology = await readTopologyFile(topologyFile);
  const changes = await collectChanges(root, options);

  const provider = createModelProvider(resolved.provider);
  const cache = new EmbeddingCache();
  if (options.embeddingCache) {
    const loaded = await loadEmbeddingCache(options.embeddingCache, cache);
    logger.debug('Embedding cache loaded', { entries: loaded });
  }

  const analysis = new ImpactAnalysisService(resolved.analysis, { provider, cache });
  const result = await analysis.analyze({ topology, changeSet: changes.files, diffs: changes.diffs });

  const title = options.title ?? process.env.PR_TITLE;
  const generatedAt = new Date();
  const artifact = toRunArtifact(result, { title, generatedAt });

  if (options.out) {
    await saveRunArtifact(options.out, artifact);
    success(`Run artifact written to ${options.out}`);
  }
  if (options.embeddingCache) {
    await saveEmbeddingCache(options.embeddingCache, cache);
  }

  if (options.json) {
    console.log(JSON.stringify(artifact, null, 2));
    return;
  }

  const reports = new ReportService({}, { provider });
  const context = { result, title, generatedAt };
  if (options.narrate) {
    const report = await reports.narrate(context);
    if (!report.narrated) {
      logger.warn('Narrative unavailable', { reason: report.reason });
    }
    console.log(report.markdown);
  } else {
    console.log(reports.render(context));
  }
}

async function collectChanges(root: string, options: AnalyzeOptions): Promise<ChangeSet> {
  const changes = new ChangeSetService({ root });
  if (options.base) {
    return changes.fromGit({ base: options.base, head: options.head });
  }
  return changes.fromList(options.changed ?? process.env.CHANGED_FILES);
}
