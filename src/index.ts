#!/usr/bin/env node

import 'dotenv/config';
import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { createConfigCommand } from './commands/config.js';
import { createFeedCommand } from './commands/feed.js';
import { importAndReport, refreshAndReport } from './commands/headless.js';
import { createCompactCommand, createExportCommand } from './commands/maintenance.js';
import { closeAppContext, openAppContext, type AppContext, type ContextProvider } from './context.js';
import { runInteractive } from './tui/terminal.js';
import { errorMessage } from './utils/errors.js';

interface RootOptions {
  db?: string;
  debug?: boolean;
  import?: string;
  refresh?: boolean;
}

const program = new Command();

let context: AppContext | null = null;
let interactive = false;

// Failing to open the store is the one fatal error
const getContext: ContextProvider = () => {
  if (!context) {
    const { db, debug } = program.opts<RootOptions>();
    try {
      context = openAppContext({ dbPath: db, debug, interactive });
    } catch (error) {
      console.error(chalk.red('✗'), `Cannot open database: ${errorMessage(error)}`);
      process.exit(1);
    }
  }
  return context;
};

function shutdown(): void {
  if (context) {
    closeAppContext(context);
    context = null;
  }
}

program
  .name('rss-triage')
  .description('Triage RSS feeds in the terminal: summarize, bookmark or delete each article')
  .version('0.1.0')
  .option('--db <path>', 'Database file (default: ~/.rss-triage/rss-triage.db, or RSS_TRIAGE_DB)')
  .option('--debug', 'Enable debug logging')
  .option('--import <file>', 'Import feeds from an OPML file and exit')
  .option('--refresh', 'Refresh all feeds once and exit')
  .action(async (options: RootOptions) => {
    if (options.import) {
      if (!importAndReport(getContext(), options.import)) process.exitCode = 1;
      return;
    }
    if (options.refresh) {
      if (!(await refreshAndReport(getContext()))) process.exitCode = 1;
      return;
    }

    interactive = true;
    await runInteractive(getContext());
    shutdown();
    // In-flight operations are abandoned rather than awaited
    process.exit(0);
  });

program.addCommand(createFeedCommand(getContext));
program.addCommand(createExportCommand(getContext));
program.addCommand(createCompactCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.addHelpText('after', `
Interactive mode (the default) keys:
  j/k move · Enter summarize · o open · b bookmark · d delete · u undelete
  r refresh · a add feed · i/w import/export OPML · ? help · q quit
`);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
  } else {
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
  }
} finally {
  shutdown();
}
