/**
 * SQLite Stats Store
 * libSQL implementation of the stats storage used by the ingestion job
 */

import { createClient } from '@libsql/client';
import type { Client, InStatement, ResultSet, Row, Transaction } from '@libsql/client';
import { existsSync, mkdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type {
  FileFingerprint,
  StatsBucket,
  StatsBucketKey,
  StatsIncrement,
  StatsStore,
} from './stats-store.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Works from both src/services and dist/services
const MIGRATIONS_DIR = join(__dirname, '..', '..', 'migrations');

const MIGRATIONS = ['001_initial.sql'];

/** What the client and an open transaction have in common */
interface Executor {
  execute(stmt: InStatement): Promise<ResultSet>;
}

function intColumn(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw new Error(`Expected an integer in column ${column}, got ${value === null ? 'null' : typeof value}`);
}

function textColumn(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  throw new Error(`Expected text in column ${column}, got ${value === null ? 'null' : typeof value}`);
}

function toFingerprint(row: Row): FileFingerprint {
  return {
    filename: textColumn(row, 'filename'),
    serverId: intColumn(row, 'server_id'),
    lastModified: intColumn(row, 'last_modified'),
    processedDate: textColumn(row, 'processed_date'),
  };
}

export class SqliteStatsStore implements StatsStore {
  readonly client: Client;
  private readonly executor: Executor;
  private readonly inTransaction: boolean;

  /**
   * Open (creating if needed) a database file and apply the schema
   */
  static async open(dbPath: string): Promise<SqliteStatsStore> {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const client = createClient({ url: `file:${dbPath}` });
    const store = new SqliteStatsStore(client);
    await client.execute('PRAGMA journal_mode = WAL');
    await store.migrate();
    console.log(`Opened stats database: ${dbPath}`);
    return store;
  }

  constructor(client: Client, tx?: Transaction) {
    this.client = client;
    this.executor = tx ?? client;
    this.inTransaction = tx !== undefined;
  }

  async migrate(): Promise<void> {
    for (const migration of MIGRATIONS) {
      const sql = readFileSync(join(MIGRATIONS_DIR, migration), 'utf-8');
      await this.client.executeMultiple(sql);
    }
  }

  close(): void {
    this.client.close();
  }

  async transaction<T>(fn: (tx: StatsStore) => Promise<T>): Promise<T> {
    if (this.inTransaction) {
      return fn(this);
    }

    const tx = await this.client.transaction('write');
    try {
      const result = await fn(new SqliteStatsStore(this.client, tx));
      await tx.commit();
      return result;
    } catch (error) {
      await tx.rollback();
      throw error;
    } finally {
      tx.close();
    }
  }

  async findWebsiteId(name: string): Promise<number | undefined> {
    const result = await this.executor.execute({
      sql: 'SELECT id FROM websites WHERE name = ?',
      args: [name],
    });
    return result.rows.length > 0 ? intColumn(result.rows[0], 'id') : undefined;
  }

  async findWebsiteUrlId(websiteId: number, url: string): Promise<number | undefined> {
    const result = await this.executor.execute({
      sql: 'SELECT id FROM website_url WHERE website_id = ? AND url = ?',
      args: [websiteId, url],
    });
    return result.rows.length > 0 ? intColumn(result.rows[0], 'id') : undefined;
  }

  async insertWebsiteUrl(websiteId: number, url: string): Promise<number> {
    const result = await this.executor.execute({
      sql: 'INSERT INTO website_url (website_id, url) VALUES (?, ?)',
      args: [websiteId, url],
    });
    return Number(result.lastInsertRowid);
  }

  async addStats(key: StatsBucketKey, increment: StatsIncrement): Promise<void> {
    await this.executor.execute({
      sql: `
        INSERT INTO website_url_stats (website_url_id, server_id, year, month, hits, entry_count, exit_count)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(website_url_id, server_id, year, month) DO UPDATE SET
          hits = hits + excluded.hits,
          entry_count = entry_count + excluded.entry_count,
          exit_count = exit_count + excluded.exit_count
      `,
      args: [
        key.websiteUrlId,
        key.serverId,
        key.year,
        key.month,
        increment.hits,
        increment.entryCount,
        increment.exitCount,
      ],
    });
  }

  async getFingerprint(filename: string, serverId: number): Promise<FileFingerprint | undefined> {
    const result = await this.executor.execute({
      sql: `
        SELECT filename, server_id, last_modified, processed_date FROM file_tracking
        WHERE filename = ? AND server_id = ?
      `,
      args: [filename, serverId],
    });
    return result.rows.length > 0 ? toFingerprint(result.rows[0]) : undefined;
  }

  async listFingerprints(): Promise<FileFingerprint[]> {
    const result = await this.executor.execute(
      'SELECT filename, server_id, last_modified, processed_date FROM file_tracking ORDER BY filename, server_id'
    );
    return result.rows.map(toFingerprint);
  }

  async upsertFingerprint(fingerprint: FileFingerprint): Promise<void> {
    await this.executor.execute({
      sql: `
        INSERT INTO file_tracking (filename, server_id, last_modified, processed_date)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(filename, server_id) DO UPDATE SET
          last_modified = excluded.last_modified,
          processed_date = excluded.processed_date
      `,
      args: [fingerprint.filename, fingerprint.serverId, fingerprint.lastModified, fingerprint.processedDate],
    });
  }

  async deleteFingerprint(filename: string, serverId: number): Promise<number> {
    const result = await this.executor.execute({
      sql: 'DELETE FROM file_tracking WHERE filename = ? AND server_id = ?',
      args: [filename, serverId],
    });
    return result.rowsAffected;
  }

  async deleteFingerprintsForServer(serverId: number): Promise<number> {
    const result = await this.executor.execute({
      sql: 'DELETE FROM file_tracking WHERE server_id = ?',
      args: [serverId],
    });
    return result.rowsAffected;
  }

  async deleteAllFingerprints(): Promise<number> {
    return (await this.executor.execute('DELETE FROM file_tracking')).rowsAffected;
  }

  async deleteStatsForWebsite(websiteId: number): Promise<number> {
    const result = await this.executor.execute({
      sql: `
        DELETE FROM website_url_stats
        WHERE website_url_id IN (SELECT id FROM website_url WHERE website_id = ?)
      `,
      args: [websiteId],
    });
    return result.rowsAffected;
  }

  async deleteStatsForServer(serverId: number): Promise<number> {
    const result = await this.executor.execute({
      sql: 'DELETE FROM website_url_stats WHERE server_id = ?',
      args: [serverId],
    });
    return result.rowsAffected;
  }

  async deleteStatsForPeriod(
    websiteId: number,
    year: number,
    month: number,
    serverIds: readonly number[]
  ): Promise<number> {
    if (serverIds.length === 0) return 0;

    const placeholders = serverIds.map(() => '?').join(', ');
    const result = await this.executor.execute({
      sql: `
        DELETE FROM website_url_stats
        WHERE website_url_id IN (SELECT id FROM website_url WHERE website_id = ?)
          AND year = ? AND month = ?
          AND server_id IN (${placeholders})
      `,
      args: [websiteId, year, month, ...serverIds],
    });
    return result.rowsAffected;
  }

  async deleteAllStats(): Promise<number> {
    return (await this.executor.execute('DELETE FROM website_url_stats')).rowsAffected;
  }

  async sweepOrphanUrls(websiteId?: number): Promise<number> {
    const orphan = 'NOT EXISTS (SELECT 1 FROM website_url_stats ws WHERE ws.website_url_id = website_url.id)';
    if (websiteId === undefined) {
      return (await this.executor.execute(`DELETE FROM website_url WHERE ${orphan}`)).rowsAffected;
    }
    const result = await this.executor.execute({
      sql: `DELETE FROM website_url WHERE website_id = ? AND ${orphan}`,
      args: [websiteId],
    });
    return result.rowsAffected;
  }

  async deleteAllUrls(): Promise<number> {
    return (await this.executor.execute('DELETE FROM website_url')).rowsAffected;
  }

  /**
   * All stats rows, ordered by key
   */
  async listStats(): Promise<StatsBucket[]> {
    const result = await this.executor.execute(`
      SELECT website_url_id, server_id, year, month, hits, entry_count, exit_count
      FROM website_url_stats
      ORDER BY website_url_id, server_id, year, month
    `);
    return result.rows.map((row) => ({
      websiteUrlId: intColumn(row, 'website_url_id'),
      serverId: intColumn(row, 'server_id'),
      year: intColumn(row, 'year'),
      month: intColumn(row, 'month'),
      hits: intColumn(row, 'hits'),
      entryCount: intColumn(row, 'entry_count'),
      exitCount: intColumn(row, 'exit_count'),
    }));
  }

  /**
   * Stored URLs of one website, sorted
   */
  async listUrls(websiteId: number): Promise<string[]> {
    const result = await this.executor.execute({
      sql: 'SELECT url FROM website_url WHERE website_id = ? ORDER BY url',
      args: [websiteId],
    });
    return result.rows.map((row) => textColumn(row, 'url'));
  }
}
