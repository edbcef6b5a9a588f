import type { StatsStore } from './services/stats-store.js';

/**
 * Drop sub-second precision; filesystems disagree on it.
 */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** ISO-8601 timestamp without milliseconds */
export function formatProcessedDate(date: Date): string {
  return new Date(toEpochSeconds(date) * 1000).toISOString().replace('.000Z', 'Z');
}

/**
 * Idempotency gate keyed by (filename, server id) and the file's
 * modification time. Content is never inspected.
 */
export class FileTracker {
  private store: StatsStore;

  constructor(store: StatsStore) {
    this.store = store;
  }

  async shouldSkip(filename: string, serverId: number, modifiedAt: Date, force: boolean): Promise<boolean> {
    if (force) {
      return false;
    }
    const fingerprint = await this.store.getFingerprint(filename, serverId);
    return fingerprint !== undefined && fingerprint.lastModified === toEpochSeconds(modifiedAt);
  }

  async recordSuccess(filename: string, serverId: number, modifiedAt: Date, processedAt: Date = new Date()): Promise<void> {
    await this.store.upsertFingerprint({
      filename,
      serverId,
      lastModified: toEpochSeconds(modifiedAt),
      processedDate: formatProcessedDate(processedAt),
    });
  }
}
