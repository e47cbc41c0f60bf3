import { Command } from 'commander';
import chalk from 'chalk';
import { CONFIG_KEYS } from '../models/config.js';
import type { ContextProvider } from '../context.js';

interface JsonOption {
  json?: boolean;
}

const KNOWN_KEYS: string[] = Object.values(CONFIG_KEYS);

export function maskSecret(key: string, value: string): string {
  if (!key.endsWith('_key') && !key.endsWith('_token')) return value;
  return value.length > 8 ? `${value.slice(0, 4)}...` : '***';
}

export function createConfigCommand(getContext: ContextProvider): Command {
  const config = new Command('config').description('Manage configuration');

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'Configuration key')
    .argument('<value>', 'Configuration value')
    .option('--json', 'Output as JSON')
    .action((key: string, value: string, options: JsonOption) => {
      const { config: settings, logger } = getContext();
      if (!KNOWN_KEYS.includes(key)) {
        logger.warn(`Unknown key ${key}; known keys: ${KNOWN_KEYS.join(', ')}`);
      }
      settings.set(key, value);

      if (options.json) {
        console.log(JSON.stringify({ success: true, key }));
      } else {
        logger.success(`Configuration set: ${key} = ${maskSecret(key, value)}`);
      }
    });

  config
    .command('get')
    .description('Get a configuration value (environment, then stored, then default)')
    .argument('<key>', 'Configuration key')
    .option('--json', 'Output as JSON')
    .action((key: string, options: JsonOption) => {
      const { config: settings, logger } = getContext();
      const value = settings.get(key);

      if (options.json) {
        console.log(JSON.stringify({ key, value }));
      } else if (value !== null) {
        console.log(`${key} = ${maskSecret(key, value)}`);
      } else {
        logger.warn(`Configuration not found: ${key}`);
      }
    });

  config
    .command('delete')
    .description('Delete a stored configuration value')
    .argument('<key>', 'Configuration key')
    .option('--json', 'Output as JSON')
    .action((key: string, options: JsonOption) => {
      const { config: settings, logger } = getContext();
      const success = settings.delete(key);

      if (options.json) {
        console.log(JSON.stringify({ success }));
      } else if (success) {
        logger.success(`Configuration deleted: ${key}`);
      } else {
        logger.warn(`Configuration not found: ${key}`);
      }
    });

  config
    .command('list')
    .description('List stored configuration values')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      const { config: settings, logger } = getContext();
      const configs = settings.all();

      if (options.json) {
        console.log(JSON.stringify(configs.map((cfg) => ({ key: cfg.key, value: maskSecret(cfg.key, cfg.value) }))));
        return;
      }

      if (configs.length === 0) {
        logger.info('No configurations found');
        console.log();
        console.log(chalk.dim('Available configuration keys:'));
        for (const key of KNOWN_KEYS) {
          console.log(chalk.dim(`  ${key}`));
        }
        return;
      }

      console.log();
      console.log(chalk.bold('Configurations:'));
      console.log();
      for (const cfg of configs) {
        console.log(`  ${chalk.cyan(cfg.key)} = ${maskSecret(cfg.key, cfg.value)}`);
      }
      console.log();
    });

  return config;
}
