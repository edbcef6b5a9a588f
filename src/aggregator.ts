import type { StatsStore } from './services/stats-store.js';
import type { ReportPeriod, SiderRecord } from './types.js';

/**
 * Merges decoded SIDER records into monthly per-URL buckets.
 *
 * URL ids are cached for the lifetime of the instance, so an instance should
 * not outlive the transaction it writes in. `mergeRecords` called on a store
 * outside a transaction opens one and merges through a fresh instance.
 */
export class Aggregator {
  private store: StatsStore;
  private urlIds = new Map<string, number>();

  constructor(store: StatsStore) {
    this.store = store;
  }

  /**
   * Look up the website_url id for a URL, creating the row on first use
   */
  async resolveUrlId(websiteId: number, url: string): Promise<number> {
    const cacheKey = `${websiteId}#${url}`;
    const cached = this.urlIds.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const id =
      (await this.store.findWebsiteUrlId(websiteId, url)) ?? (await this.store.insertWebsiteUrl(websiteId, url));
    this.urlIds.set(cacheKey, id);
    return id;
  }

  /**
   * Add one record's pages, entries and exits to its bucket. Bandwidth is not stored.
   */
  async mergeStats(urlId: number, serverId: number, year: number, month: number, record: SiderRecord): Promise<void> {
    await this.store.addStats(
      { websiteUrlId: urlId, serverId, year, month },
      { hits: record.pages, entryCount: record.entry, exitCount: record.exit }
    );
  }

  /**
   * Merge a decoded section atomically. Resolves to the number of records merged.
   */
  async mergeRecords(
    websiteId: number,
    serverId: number,
    period: ReportPeriod,
    records: readonly SiderRecord[]
  ): Promise<number> {
    return this.store.transaction(async (tx) => {
      const aggregator = tx === this.store ? this : new Aggregator(tx);
      for (const record of records) {
        const urlId = await aggregator.resolveUrlId(websiteId, record.url);
        await aggregator.mergeStats(urlId, serverId, period.year, period.month, record);
      }
      return records.length;
    });
  }
}
