import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import { exportOpmlFile } from '../services/opml.js';
import { errorMessage } from '../utils/errors.js';
import type { ContextProvider } from '../context.js';

function parseDays(value: string): number {
  const days = Number.parseInt(value, 10);
  if (!Number.isInteger(days) || days <= 0) {
    throw new InvalidArgumentError('Days must be a positive integer.');
  }
  return days;
}

export function createExportCommand(getContext: ContextProvider): Command {
  return new Command('export')
    .description('Export subscriptions as OPML')
    .argument('<file>', 'Destination file')
    .action((file: string) => {
      const { cache, logger } = getContext();
      try {
        const count = exportOpmlFile(cache, file);
        logger.success(`Exported ${count} feeds to ${file}`);
      } catch (error) {
        logger.error(`Export failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}

export function createCompactCommand(getContext: ContextProvider): Command {
  return new Command('compact')
    .description('Delete old articles and tombstones, then reclaim space')
    .option('-d, --days <n>', 'Retention window in days (default: retention_days)', parseDays)
    .action((options: { days?: number }) => {
      const { cache, retentionDays } = getContext();
      const days = options.days ?? retentionDays;
      const spinner = ora(`Compacting (keeping ${days} days)...`).start();
      try {
        const deleted = cache.compactDatabase(days);
        spinner.succeed(`Compacted database: ${deleted} articles older than ${days} days removed`);
      } catch (error) {
        spinner.fail(`Compaction failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
