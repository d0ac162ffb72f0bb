#!/usr/bin/env node
// Service impact analyzer CLI

import { Command } from 'commander';
import { logger, LogLevel } from '../core/logger.js';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerGraphCommand } from './commands/graph.js';
import { registerConfigCommand } from './commands/config.js';

const program = new Command();

program
  .name('impact')
  .description('Knowledge-graph impact analysis for multi-service code changes')
  .version('0.1.0')
  .option('-v, --verbose', 'Log every analysis phase')
  .option('-q, --quiet', 'Only log errors')
  .hook('preAction', command => {
    const { verbose, quiet } = command.opts<{ verbose?: boolean; quiet?: boolean }>();
    if (verbose) {
      logger.setLevel(LogLevel.DEBUG);
    } else if (quiet) {
      logger.setLevel(LogLevel.ERROR);
    }
  });

registerAnalyzeCommand(program);
registerGraphCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
