import fs from 'fs/promises';
import os from 'os';
import { join } from 'path';
import { SqliteStatsStore } from '../services/sqlite-stats-store.js';

export interface TempStore {
  store: SqliteStatsStore;
  dir: string;
  cleanup(): Promise<void>;
}

/**
 * A migrated store backed by a database file in a fresh temp directory.
 * A file is used rather than :memory: because each libSQL transaction
 * leaves the client on a new connection.
 */
export async function openTempStore(): Promise<TempStore> {
  const dir = await fs.mkdtemp(join(os.tmpdir(), 'stats-store-'));
  const store = await SqliteStatsStore.open(join(dir, 'stats.db'));
  return {
    store,
    dir,
    async cleanup() {
      store.close();
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Websites are provisioned outside the job; tests insert them directly */
export async function addWebsite(store: SqliteStatsStore, name: string): Promise<number> {
  const result = await store.client.execute({
    sql: 'INSERT INTO websites (name) VALUES (?)',
    args: [name],
  });
  return Number(result.lastInsertRowid);
}
