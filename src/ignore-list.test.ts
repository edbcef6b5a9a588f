import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import { join } from 'path';
import { loadIgnorePatterns, parseIgnorePatterns, shouldIgnoreUrl } from './ignore-list.js';

describe('parseIgnorePatterns', () => {
  it('trims lines and drops blank ones', () => {
    expect(parseIgnorePatterns('Special:\n\n  skins/  \r\n\n')).toEqual(['Special:', 'skins/']);
  });
});

describe('shouldIgnoreUrl', () => {
  const patterns = ['ignored/', 'Special:'];

  it('ignores empty and root URLs', () => {
    expect(shouldIgnoreUrl('', [])).toBe(true);
    expect(shouldIgnoreUrl('/', [])).toBe(true);
  });

  it('ignores URLs starting with a configured prefix', () => {
    expect(shouldIgnoreUrl('ignored/page', patterns)).toBe(true);
    expect(shouldIgnoreUrl('Special:Search', patterns)).toBe(true);
  });

  it('keeps other URLs', () => {
    expect(shouldIgnoreUrl('Main Page', patterns)).toBe(false);
    expect(shouldIgnoreUrl('not-ignored/page', patterns)).toBe(false);
  });
});

describe('loadIgnorePatterns', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(os.tmpdir(), 'ignore-list-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads patterns from a file', async () => {
    const path = join(dir, 'ignore_urls.txt');
    await fs.writeFile(path, 'images/\nrobots.txt\n');
    expect(await loadIgnorePatterns(path)).toEqual(['images/', 'robots.txt']);
  });

  it('returns an empty list when the file is missing', async () => {
    expect(await loadIgnorePatterns(join(dir, 'missing.txt'))).toEqual([]);
  });
});
