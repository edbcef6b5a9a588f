import { readLines } from './lib/report-lines.js';
import { SectionNotFoundError } from './errors.js';
import type { SectionIndex } from './types.js';

/** Upper bound on header lines scanned when END_MAP never shows up */
export const DEFAULT_INDEX_MAX_LINES = 1000;

export interface SectionIndexOptions {
  maxLines?: number;
}

/**
 * Parse one BEGIN_MAP entry such as "POS_SIDER 10432".
 * Returns null for anything that is not a two-token POS_ line.
 */
export function parseIndexLine(line: string): [string, number] | null {
  const parts = line.split(/\s+/);
  if (parts.length !== 2 || !parts[0].startsWith('POS_')) {
    return null;
  }
  if (!/^\d+$/.test(parts[1])) {
    return null;
  }
  return [parts[0], parseInt(parts[1], 10)];
}

/**
 * Build the section → byte offset map from the header of an AWStats data file.
 *
 * Example header:
 *   AWSTATS DATA FILE 7.8 (build 20200416)
 *   BEGIN_MAP 27
 *   POS_GENERAL 2196
 *   POS_SIDER 10432
 *   END_MAP
 */
export function readSectionIndex(
  buffer: Buffer,
  options: SectionIndexOptions = {}
): SectionIndex {
  const maxLines = options.maxLines ?? DEFAULT_INDEX_MAX_LINES;
  const index: SectionIndex = {};
  let scanned = 0;

  for (const { text } of readLines(buffer)) {
    if (text.startsWith('END_MAP') || scanned >= maxLines) {
      break;
    }
    scanned++;

    const entry = parseIndexLine(text);
    if (entry) {
      index[entry[0]] = entry[1];
    }
  }

  return index;
}

/**
 * Look up a section offset, throwing when the header does not list it.
 */
export function requireSection(
  index: SectionIndex,
  section: string,
  filename?: string
): number {
  const offset = index[section];
  if (offset === undefined) {
    throw new SectionNotFoundError(section, filename);
  }
  return offset;
}
