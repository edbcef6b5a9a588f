import fs from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import { Aggregator } from './aggregator.js';
import { FileTracker } from './file-tracker.js';
import { IngestError, LookupError, errorMessage } from './errors.js';
import { readSectionIndex, requireSection } from './report-index.js';
import { isReportFile, parseReportFilename, requireReportFilename } from './report-filename.js';
import { requireWebsite, resetScopes } from './reset.js';
import { parseSiderSection } from './sider-parser.js';
import { SIDER_SECTION } from './types.js';
import type { IngestConfig } from './config.js';
import type { StatsStore } from './services/stats-store.js';
import type { FileOutcome, IngestRunOptions, IngestSummary, ServerLocation } from './types.js';

export interface IngestorOptions {
  store: StatsStore;
  config: IngestConfig;
}

/**
 * Servers whose name equals the filter or whose directory contains it
 */
export function selectServers(servers: readonly ServerLocation[], filter?: string): ServerLocation[] {
  if (!filter) return [...servers];
  return servers.filter((server) => server.name === filter || server.directory.includes(filter));
}

// Errors that belong to one file rather than to the whole run
function isFileError(error: unknown): boolean {
  return error instanceof IngestError || (error instanceof Error && 'syscall' in error);
}

function emptySummary(): IngestSummary {
  return {
    serversScanned: 0,
    filesSeen: 0,
    filesProcessed: 0,
    filesSkipped: 0,
    filesFailed: 0,
    recordsMerged: 0,
    linesSkipped: 0,
    recordsIgnored: 0,
    errors: [],
    outcomes: [],
    durationMs: 0,
  };
}

/**
 * Ingests AWStats data files into monthly per-URL statistics.
 *
 * Each file goes through: filename check → fingerprint check → index and
 * SIDER decode → merge and fingerprint update in one transaction. A failure
 * in one file never stops the others.
 */
export class Ingestor {
  private store: StatsStore;
  private config: IngestConfig;
  private tracker: FileTracker;

  constructor(options: IngestorOptions) {
    this.store = options.store;
    this.config = options.config;
    this.tracker = new FileTracker(options.store);
  }

  /**
   * Run one ingestion pass.
   * @throws LookupError when the server or website filter matches nothing
   */
  async run(options: IngestRunOptions = {}): Promise<IngestSummary> {
    const startTime = Date.now();
    const summary = emptySummary();
    const force = options.force ?? false;
    const dryRun = options.dryRun ?? false;

    const servers = selectServers(this.config.servers, options.server);
    if (servers.length === 0) {
      throw new LookupError(`No directory found for server '${options.server}'.`);
    }
    if (options.website) {
      await requireWebsite(this.store, options.website);
    }

    if (force) {
      console.log('\n=== STEP 1: Forced reset ===');
      try {
        await this.reset(options, servers, dryRun);
      } catch (error) {
        if (!(error instanceof IngestError)) throw error;
        console.error(`Forced reset aborted: ${error.message}`);
        summary.errors.push(error.message);
        summary.durationMs = Date.now() - startTime;
        return summary;
      }
    }

    console.log(`\n=== ${force ? 'STEP 2: ' : ''}Processing AWStats files${dryRun ? ' (DRY RUN)' : ''} ===`);
    for (const server of servers) {
      summary.serversScanned++;
      const filenames = await this.listFiles(server, options, summary);

      for (const filename of filenames) {
        const outcome = await this.processFile(join(server.directory, filename), filename, server.id, force, dryRun);
        this.record(summary, outcome);
      }
    }

    summary.durationMs = Date.now() - startTime;
    return summary;
  }

  /**
   * Ingest a single file for one server. Never throws for problems that
   * belong to the file itself; they come back as a failed outcome.
   */
  async processFile(
    path: string,
    filename: string,
    serverId: number,
    force = false,
    dryRun = false
  ): Promise<FileOutcome> {
    try {
      const info = requireReportFilename(filename);
      const { mtime } = await fs.stat(path);

      if (await this.tracker.shouldSkip(filename, serverId, mtime, force)) {
        console.log(`File ${filename} has already been processed.`);
        return { status: 'skipped', filename, serverId };
      }

      const buffer = await fs.readFile(path);
      const offset = requireSection(readSectionIndex(buffer), SIDER_SECTION, filename);
      const section = parseSiderSection(buffer, offset, {
        pathPrefix: this.config.pathPrefix,
        ignorePatterns: this.config.ignorePatterns,
      });
      const counts = { skippedLines: section.skippedLines, ignoredRecords: section.ignoredRecords };

      if (dryRun) {
        await requireWebsite(this.store, info.website);
        console.log(
          `[DRY RUN] Would merge ${section.records.length} records from ${filename} into ${info.website} ${info.year}-${String(info.month).padStart(2, '0')} (server ${serverId})`
        );
        return { status: 'dry-run', filename, serverId, recordsMerged: section.records.length, ...counts };
      }

      // URL ids cached by the aggregator die with the transaction
      const recordsMerged = await this.store.transaction(async (tx) => {
        const websiteId = await requireWebsite(tx, info.website);
        const merged = await new Aggregator(tx).mergeRecords(websiteId, serverId, info, section.records);
        await new FileTracker(tx).recordSuccess(filename, serverId, mtime);
        return merged;
      });

      console.log(`Processed file ${filename}.`);
      return { status: 'processed', filename, serverId, recordsMerged, ...counts };
    } catch (error) {
      if (!isFileError(error)) throw error;

      const message = `Failed to process ${filename}: ${errorMessage(error)}`;
      console.warn(message);
      return { status: 'failed', filename, serverId, error: message };
    }
  }

  private async reset(options: IngestRunOptions, servers: ServerLocation[], dryRun: boolean): Promise<void> {
    const scope = {
      website: options.website,
      serverIds: servers.map((server) => server.id),
      byServer: options.server !== undefined,
      file: options.file,
    };

    if (dryRun) {
      if (scope.file) requireReportFilename(scope.file);
      console.log(`[DRY RUN] Would reset ${describeScope(scope)}`);
      return;
    }

    const counts = await resetScopes(this.store, scope);
    for (const count of counts) {
      console.log(
        `Reset ${count.scope}: ${count.statsDeleted} stats rows, ${count.urlsDeleted} URLs and ${count.fingerprintsDeleted} file fingerprints deleted`
      );
    }
  }

  private async listFiles(server: ServerLocation, options: IngestRunOptions, summary: IngestSummary): Promise<string[]> {
    if (options.file) {
      try {
        await fs.access(join(server.directory, options.file));
        return [options.file];
      } catch {
        console.log(`File '${options.file}' not found in directory '${server.directory}'.`);
        return [];
      }
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(server.directory, { withFileTypes: true });
    } catch (error) {
      const message = `Failed to read directory '${server.directory}' for server ${server.name}: ${errorMessage(error)}`;
      console.warn(message);
      summary.errors.push(message);
      return [];
    }

    return entries
      .filter((entry) => entry.isFile() && isReportFile(entry.name))
      .map((entry) => entry.name)
      .filter((name) => {
        if (!options.website) return true;
        const parsed = parseReportFilename(name);
        return parsed.ok && parsed.value.website === options.website;
      })
      .sort();
  }

  private record(summary: IngestSummary, outcome: FileOutcome): void {
    summary.filesSeen++;
    summary.outcomes.push(outcome);

    switch (outcome.status) {
      case 'skipped':
        summary.filesSkipped++;
        break;
      case 'failed':
        summary.filesFailed++;
        summary.errors.push(outcome.error);
        break;
      case 'processed':
      case 'dry-run':
        summary.filesProcessed++;
        summary.recordsMerged += outcome.recordsMerged;
        summary.linesSkipped += outcome.skippedLines;
        summary.recordsIgnored += outcome.ignoredRecords;
        break;
    }
  }
}

function describeScope(scope: { website?: string; byServer: boolean; serverIds: number[]; file?: string }): string {
  const parts: string[] = [];
  if (scope.website) parts.push(`website ${scope.website}`);
  if (scope.byServer) parts.push(`servers ${scope.serverIds.join(', ')}`);
  if (scope.file) parts.push(`file ${scope.file}`);
  return parts.length > 0 ? parts.join(', ') : 'all statistics';
}

export function logSummary(summary: IngestSummary): void {
  console.log('\n=== EXECUTION SUMMARY ===');
  console.log(`  Servers scanned: ${summary.serversScanned}`);
  console.log(`  Files seen: ${summary.filesSeen}`);
  console.log(`  Files processed: ${summary.filesProcessed}`);
  console.log(`  Files skipped: ${summary.filesSkipped}`);
  console.log(`  Files failed: ${summary.filesFailed}`);
  console.log(`  Records merged: ${summary.recordsMerged}`);
  console.log(`  Lines skipped: ${summary.linesSkipped}`);
  console.log(`  Records ignored: ${summary.recordsIgnored}`);
  console.log(`  Errors: ${summary.errors.length}`);
  console.log(`  Duration: ${summary.durationMs}ms`);
}
