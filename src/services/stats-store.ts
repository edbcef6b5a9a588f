/**
 * Stats Store
 * Storage operations the ingestion job needs from the relational database
 */

/**
 * Counters merged into one monthly bucket
 */
export interface StatsIncrement {
  hits: number;
  entryCount: number;
  exitCount: number;
}

/**
 * Key of a monthly bucket
 */
export interface StatsBucketKey {
  websiteUrlId: number;
  serverId: number;
  year: number;
  month: number;
}

/**
 * A stored monthly bucket
 */
export interface StatsBucket extends StatsBucketKey, StatsIncrement {}

/**
 * Stored fingerprint of an ingested file
 */
export interface FileFingerprint {
  filename: string;
  serverId: number;
  /** Modification time in whole epoch seconds */
  lastModified: number;
  processedDate: string;
}

export interface StatsStore {
  /**
   * Run `fn` against a store bound to one write transaction. Commits when
   * `fn` resolves, rolls every write back when it rejects. Called on a store
   * that is already inside a transaction, `fn` joins that transaction.
   */
  transaction<T>(fn: (tx: StatsStore) => Promise<T>): Promise<T>;

  findWebsiteId(name: string): Promise<number | undefined>;

  findWebsiteUrlId(websiteId: number, url: string): Promise<number | undefined>;
  insertWebsiteUrl(websiteId: number, url: string): Promise<number>;

  /** Insert the bucket, or add the increment to an existing one */
  addStats(key: StatsBucketKey, increment: StatsIncrement): Promise<void>;

  getFingerprint(filename: string, serverId: number): Promise<FileFingerprint | undefined>;
  listFingerprints(): Promise<FileFingerprint[]>;
  upsertFingerprint(fingerprint: FileFingerprint): Promise<void>;

  /** Each delete resolves to the number of rows removed */
  deleteFingerprint(filename: string, serverId: number): Promise<number>;
  deleteFingerprintsForServer(serverId: number): Promise<number>;
  deleteAllFingerprints(): Promise<number>;

  deleteStatsForWebsite(websiteId: number): Promise<number>;
  deleteStatsForServer(serverId: number): Promise<number>;
  deleteStatsForPeriod(websiteId: number, year: number, month: number, serverIds: readonly number[]): Promise<number>;
  deleteAllStats(): Promise<number>;

  /** Remove website_url rows no stats row references; limited to one website when given */
  sweepOrphanUrls(websiteId?: number): Promise<number>;
  deleteAllUrls(): Promise<number>;
}
