import fs from 'fs/promises';

/**
 * Load URL prefixes to ignore, one per line. Blank lines are dropped.
 * A missing file means nothing is ignored.
 */
export async function loadIgnorePatterns(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      console.warn(`Ignore list ${path} not found, no URLs will be ignored`);
      return [];
    }
    throw error;
  }
  return parseIgnorePatterns(content);
}

export function parseIgnorePatterns(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * URLs that are empty, the site root, or start with an ignored prefix
 * never reach the database.
 */
export function shouldIgnoreUrl(url: string, patterns: readonly string[]): boolean {
  return url === '' || url === '/' || patterns.some((pattern) => url.startsWith(pattern));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
