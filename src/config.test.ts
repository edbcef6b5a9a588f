import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import { join } from 'path';
import { PROJECT_ROOT, loadConfig, parseServers } from './config.js';
import { ConfigError } from './errors.js';

describe('parseServers', () => {
  it('accepts a list of servers', () => {
    expect(parseServers([{ id: 1, name: 'local', directory: '/var/lib/awstats' }])).toEqual([
      { id: 1, name: 'local', directory: '/var/lib/awstats' },
    ]);
  });

  it('rejects duplicate ids and names', () => {
    const servers = [
      { id: 1, name: 'local', directory: '/a' },
      { id: 1, name: 'local', directory: '/b' },
    ];
    expect(() => parseServers(servers)).toThrow(
      "Invalid servers configuration: Duplicate server id 1; Duplicate server name 'local'"
    );
  });

  it('rejects malformed entries', () => {
    expect(() => parseServers([{ id: 0, name: 'x', directory: '/x' }])).toThrow(ConfigError);
    expect(() => parseServers([])).toThrow('At least one server must be configured');
    expect(() => parseServers({})).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(os.tmpdir(), 'config-'));
    await fs.writeFile(
      join(dir, 'servers.json'),
      JSON.stringify([{ id: 2, name: 'frankfurt', directory: join(dir, 'frankfurt') }])
    );
    await fs.writeFile(join(dir, 'ignore.txt'), 'Special:\n\nimages/\n');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads servers and ignore patterns from the configured files', async () => {
    const config = await loadConfig({
      DATABASE_PATH: join(dir, 'stats.db'),
      SERVERS_FILE: join(dir, 'servers.json'),
      IGNORE_URLS_FILE: join(dir, 'ignore.txt'),
      URL_PATH_PREFIX: '',
    });

    expect(config).toEqual({
      databasePath: join(dir, 'stats.db'),
      servers: [{ id: 2, name: 'frankfurt', directory: join(dir, 'frankfurt') }],
      ignorePatterns: ['Special:', 'images/'],
      pathPrefix: '',
    });
  });

  it('uses the bundled defaults', async () => {
    const config = await loadConfig({});
    expect(config.databasePath).toBe(join(PROJECT_ROOT, 'data', 'awstats.db'));
    expect(config.pathPrefix).toBe('wiki/');
    expect(config.servers.map((s) => s.name)).toEqual(['local', 'frankfurt', 'singapore', 'saopaulo']);
    expect(config.ignorePatterns).toContain('Special:');
  });

  it('fails on an unreadable servers file', async () => {
    await expect(loadConfig({ SERVERS_FILE: join(dir, 'missing.json') })).rejects.toThrow(ConfigError);
  });
});
