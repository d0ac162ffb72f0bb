// Config command - show or initialize .impact/config.yaml

import * as yaml from 'yaml';
import { Command } from 'commander';
import { ConfigService, DEFAULT_CONFIG_DIR } from '../../services/config/config-service.js';
import { handleError, info, success } from '../utils/error-handler.js';

interface ConfigCommandOptions {
  configDir: string;
  init?: boolean;
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Print the resolved configuration')
    .option('--config-dir <dir>', 'Configuration directory', DEFAULT_CONFIG_DIR)
    .option('--init', 'Write a starter config file when none exists')
    .action(async (options: ConfigCommandOptions) => {
      try {
        const configService = new ConfigService({ baseDir: options.configDir });

        if (options.init) {
          const existing = await configService.loadConfig();
          if (Object.keys(existing).length > 0) {
            info(`${configService.configPath} already exists; leaving it unchanged`);
          } else {
            await configService.saveConfig({ analysis: { topK: 5 }, provider: { name: 'openai' } });
            success(`Created ${configService.configPath}`);
          }
        }

        const resolved = await configService.resolve();
        console.log(yaml.stringify(resolved).trimEnd());
      } catch (error) {
        handleError(error);
      }
    });
}
