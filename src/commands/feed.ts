import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { ContextProvider } from '../context.js';
import type { Feed } from '../models/feed.js';

interface JsonOption {
  json?: boolean;
}

function findFeed(feeds: Feed[], idOrUrl: string): Feed | undefined {
  const id = /^\d+$/.test(idOrUrl) ? Number(idOrUrl) : null;
  return feeds.find((feed) => feed.id === id || feed.url === idOrUrl);
}

export function createFeedCommand(getContext: ContextProvider): Command {
  const feed = new Command('feed').description('Manage feed subscriptions');

  feed
    .command('add')
    .description('Subscribe to a feed, discovering it from a site URL if needed')
    .argument('<url>', 'Site or feed URL')
    .option('--json', 'Output as JSON')
    .action(async (url: string, options: JsonOption) => {
      const { operations, logger } = getContext();
      const spinner = ora(`Looking for feeds at ${url}...`).start();

      operations.startDiscover(url);
      await operations.settled('discover');
      const outcome = operations.poll('discover');

      if (!outcome || outcome.status === 'failed') {
        const message = outcome ? outcome.error : 'discovery did not finish';
        spinner.fail('Failed to add feed');
        if (options.json) {
          console.log(JSON.stringify({ error: message }));
        } else {
          logger.error(message);
        }
        return;
      }

      const { added, discovered } = outcome.result;
      if (!added) {
        spinner.warn('Already subscribed');
        if (options.json) {
          console.log(JSON.stringify({ error: 'Feed already exists', discovered }));
        } else {
          for (const info of discovered) {
            logger.warn(`Feed already exists: ${info.title} (${info.url})`);
          }
        }
        return;
      }

      spinner.succeed('Feed added successfully');
      if (options.json) {
        console.log(JSON.stringify(added));
        return;
      }

      console.log();
      console.log(chalk.green('Feed added:'));
      console.log(`  ID:    ${chalk.cyan(added.id)}`);
      console.log(`  Title: ${added.title}`);
      console.log(`  URL:   ${chalk.dim(added.url)}`);
      if (added.site_url) {
        console.log(`  Site:  ${chalk.dim(added.site_url)}`);
      }
      if (discovered.length > 1) {
        console.log();
        console.log(chalk.dim(`  ${discovered.length - 1} more feed(s) found; run "feed add <url>" to subscribe:`));
        for (const info of discovered) {
          if (info.url !== added.url) console.log(chalk.dim(`    ${info.url}`));
        }
      }
    });

  feed
    .command('remove')
    .description('Unsubscribe from a feed and drop its articles')
    .argument('<id-or-url>', 'Feed ID or URL')
    .option('--json', 'Output as JSON')
    .action((idOrUrl: string, options: JsonOption) => {
      const { cache, logger } = getContext();
      const target = findFeed(cache.getAllFeeds(), idOrUrl);
      const success = target ? cache.removeFeed(target.id) : false;

      if (options.json) {
        console.log(JSON.stringify({ success }));
      } else if (target && success) {
        logger.success(`Feed removed: ${target.title}`);
      } else {
        logger.error(`Feed not found: ${idOrUrl}`);
      }
    });

  feed
    .command('list')
    .description('List subscribed feeds')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      const { cache, logger } = getContext();
      const feeds = cache.getAllFeeds();

      if (options.json) {
        console.log(JSON.stringify(feeds));
        return;
      }

      if (feeds.length === 0) {
        logger.info('No feeds found. Use "rss-triage feed add <url>" to add one.');
        return;
      }

      console.log();
      console.log(chalk.bold(`Feeds (${feeds.length}):`));
      console.log();

      for (const f of feeds) {
        const lastFetch = f.last_fetched ? f.last_fetched.toLocaleString() : 'Never';
        console.log(`  ${chalk.cyan(f.id.toString().padStart(3))} ${f.title}`);
        console.log(`      ${chalk.dim(f.url)}`);
        console.log(`      Last fetch: ${chalk.dim(lastFetch)}`);
      }
      console.log();
    });

  return feed;
}

