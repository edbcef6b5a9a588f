#!/usr/bin/env node
/**
 * Ingest AWStats sider sections into monthly per-URL statistics.
 *
 * Usage:
 *   awstats-ingest                                   process every new or changed file
 *   awstats-ingest --server frankfurt                only one server's directory
 *   awstats-ingest --website example.com --force     wipe and recompute one website
 *   awstats-ingest --file awstats032024.example.com.txt --force
 *   awstats-ingest --force --dry-run                 show what a full recompute would do
 *
 * Env: see .env.example (DATABASE_PATH, SERVERS_FILE, IGNORE_URLS_FILE, URL_PATH_PREFIX)
 */

import { Command } from 'commander';
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { EXIT_FATAL, exitCodeFor } from './exit-codes.js';
import { Ingestor, logSummary } from './ingest.js';
import { SqliteStatsStore } from './services/sqlite-stats-store.js';
import type { IngestRunOptions } from './types.js';

dotenv.config();

interface CliOptions {
  server?: string;
  file?: string;
  website?: string;
  force: boolean;
  dryRun: boolean;
}

async function main(options: CliOptions): Promise<number> {
  const config = await loadConfig();
  const store = await SqliteStatsStore.open(config.databasePath);

  try {
    const ingestor = new Ingestor({ store, config });
    const runOptions: IngestRunOptions = {
      server: options.server,
      file: options.file,
      website: options.website,
      force: options.force,
      dryRun: options.dryRun,
    };

    if (options.dryRun) {
      console.log('DRY RUN: no rows will be written.');
    }

    const summary = await ingestor.run(runOptions);
    logSummary(summary);
    return exitCodeFor(summary);
  } finally {
    store.close();
  }
}

const program = new Command()
  .name('awstats-ingest')
  .description('Process AWStats sider data into monthly per-URL statistics')
  .option('--server <name>', 'only process the server with this name (or directory fragment)')
  .option('--file <filename>', 'only process this file in each server directory')
  .option('--website <name>', 'only process files of this website')
  .option('--force', 'reprocess files already ingested, deleting their previous stats first', false)
  .option('--dry-run', 'parse files and report what would change without writing', false)
  .action(async (options: CliOptions) => {
    process.exitCode = await main(options);
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(errorMessage(err));
  process.exit(EXIT_FATAL);
});
