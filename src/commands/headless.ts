import chalk from 'chalk';
import ora from 'ora';
import { importOpmlFile } from '../services/opml.js';
import { errorMessage } from '../utils/errors.js';
import type { AppContext } from '../context.js';

/** `--import <file>`: subscribe to every new feed in an OPML file. */
export function importAndReport(context: AppContext, file: string): boolean {
  const { cache, logger } = context;
  try {
    const { added, skipped } = importOpmlFile(cache, file);
    for (const feed of added) {
      console.log(`  ${chalk.green('+')} ${feed.title} ${chalk.dim(feed.url)}`);
    }
    logger.success(`Imported ${added.length} feeds from ${file} (${skipped} already subscribed)`);
    return true;
  } catch (error) {
    logger.error(`Import failed: ${errorMessage(error)}`);
    return false;
  }
}

/** `--refresh`: one refresh cycle through the orchestrator, waited on. */
export async function refreshAndReport(context: AppContext): Promise<boolean> {
  const { cache, operations, logger, retentionDays } = context;
  const feeds = cache.getAllFeeds();
  if (feeds.length === 0) {
    logger.info('No feeds found. Use "rss-triage feed add <url>" to add one.');
    return true;
  }

  const pruned = cache.deleteOldArticles(retentionDays);
  if (pruned > 0) {
    logger.info(`Pruned ${pruned} articles older than ${retentionDays} days`);
  }

  const spinner = ora(`Refreshing ${feeds.length} feeds...`).start();
  operations.startRefresh(feeds);
  await operations.settled('refresh');
  const outcome = operations.poll('refresh');

  if (!outcome || outcome.status === 'failed') {
    spinner.fail(`Refresh failed: ${outcome ? outcome.error : 'no result'}`);
    return false;
  }

  const report = outcome.result;
  spinner.succeed(`Refreshed ${report.succeeded}/${report.feeds} feeds`);
  console.log();
  console.log(`  ${chalk.green(`+${report.inserted} new`)}, ${report.updated} updated, ${report.suppressed} deleted earlier`);
  if (report.failed > 0) {
    logger.warn(`${report.failed} feeds failed to update (see the log above)`);
  }
  return true;
}
