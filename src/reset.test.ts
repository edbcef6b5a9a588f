import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { resetScopes } from './reset.js';
import { addWebsite, openTempStore } from './testing/temp-store.js';
import type { TempStore } from './testing/temp-store.js';
import type { SqliteStatsStore } from './services/sqlite-stats-store.js';
import { FilenameFormatError, LookupError } from './errors.js';

const A_MARCH = 'awstats032024.a.example.com.txt';
const A_APRIL = 'awstats042024.a.example.com.txt';
const B_MARCH = 'awstats032024.b.example.com.txt';

describe('resetScopes', () => {
  let temp: TempStore;
  let store: SqliteStatsStore;
  let siteA: number;
  let siteB: number;

  async function seed(websiteId: number, url: string, serverId: number, month: number): Promise<void> {
    const urlId = (await store.findWebsiteUrlId(websiteId, url)) ?? (await store.insertWebsiteUrl(websiteId, url));
    await store.addStats({ websiteUrlId: urlId, serverId, year: 2024, month }, { hits: 1, entryCount: 0, exitCount: 0 });
  }

  async function track(filename: string, serverId: number): Promise<void> {
    await store.upsertFingerprint({ filename, serverId, lastModified: 1000, processedDate: '2024-04-01T00:00:00Z' });
  }

  async function trackedFiles(): Promise<string[]> {
    return (await store.listFingerprints()).map((f) => `${f.filename}@${f.serverId}`);
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    temp = await openTempStore();
    store = temp.store;
    siteA = await addWebsite(store, 'a.example.com');
    siteB = await addWebsite(store, 'b.example.com');
    await seed(siteA, 'A-march', 1, 3);
    await seed(siteA, 'A-april', 1, 4);
    await seed(siteA, 'A-both', 1, 3);
    await seed(siteA, 'A-both', 2, 3);
    await seed(siteB, 'B-march', 1, 3);
    await seed(siteB, 'B-other-server', 2, 3);
    await track(A_MARCH, 1);
    await track(A_MARCH, 2);
    await track(A_APRIL, 1);
    await track(B_MARCH, 1);
    await track(B_MARCH, 2);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await temp.cleanup();
  });

  it('deletes one website, its URLs and its fingerprints, leaving others untouched', async () => {
    expect(await resetScopes(store, { website: 'a.example.com', serverIds: [1, 2] })).toEqual([
      { scope: 'website', statsDeleted: 4, urlsDeleted: 3, fingerprintsDeleted: 3 },
    ]);
    expect(await store.listUrls(siteA)).toEqual([]);
    expect(await store.listUrls(siteB)).toEqual(['B-march', 'B-other-server']);
    expect(await store.listStats()).toHaveLength(2);
    expect(await trackedFiles()).toEqual([`${B_MARCH}@1`, `${B_MARCH}@2`]);
  });

  it('deletes the stats of the selected servers and sweeps orphans everywhere', async () => {
    expect(await resetScopes(store, { serverIds: [2], byServer: true })).toEqual([
      { scope: 'server', statsDeleted: 2, urlsDeleted: 1, fingerprintsDeleted: 2 },
    ]);
    expect(await store.listUrls(siteA)).toEqual(['A-april', 'A-both', 'A-march']);
    expect(await store.listUrls(siteB)).toEqual(['B-march']);
    expect(await trackedFiles()).toEqual([`${A_MARCH}@1`, `${B_MARCH}@1`, `${A_APRIL}@1`]);
  });

  it('deletes one website month on the selected servers', async () => {
    expect(await resetScopes(store, { file: A_MARCH, serverIds: [1] })).toEqual([
      { scope: 'file', statsDeleted: 2, urlsDeleted: 1, fingerprintsDeleted: 1 },
    ]);
    expect(await store.listUrls(siteA)).toEqual(['A-april', 'A-both']);
    expect(await store.listUrls(siteB)).toEqual(['B-march', 'B-other-server']);
    expect(await store.getFingerprint(A_MARCH, 2)).toBeDefined();
  });

  it('deletes everything when no scope is named', async () => {
    expect(await resetScopes(store, { serverIds: [1, 2] })).toEqual([
      { scope: 'all', statsDeleted: 6, urlsDeleted: 5, fingerprintsDeleted: 5 },
    ]);
    expect(await store.listStats()).toEqual([]);
    expect(await trackedFiles()).toEqual([]);
  });

  it('combines scopes', async () => {
    const counts = await resetScopes(store, {
      website: 'b.example.com',
      file: A_APRIL,
      serverIds: [1, 2],
    });
    expect(counts).toEqual([
      { scope: 'website', statsDeleted: 2, urlsDeleted: 2, fingerprintsDeleted: 2 },
      { scope: 'file', statsDeleted: 1, urlsDeleted: 1, fingerprintsDeleted: 1 },
    ]);
    expect(await store.listUrls(siteA)).toEqual(['A-both', 'A-march']);
  });

  it('rejects a malformed filename without deleting anything', async () => {
    await expect(resetScopes(store, { website: 'a.example.com', file: 'awstats.txt', serverIds: [1] })).rejects.toThrow(
      FilenameFormatError
    );
    expect(await store.listStats()).toHaveLength(6);
    expect(await store.listFingerprints()).toHaveLength(5);
  });

  it('rejects an unknown website', async () => {
    await expect(resetScopes(store, { website: 'missing.example.com', serverIds: [1] })).rejects.toThrow(LookupError);
    await expect(resetScopes(store, { file: 'awstats032024.missing.example.com.txt', serverIds: [1] })).rejects.toThrow(
      "Website 'missing.example.com' not found in the database."
    );
  });
});
