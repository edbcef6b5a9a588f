import { FilenameFormatError } from './errors.js';
import type { ReportFileInfo } from './types.js';

export const REPORT_MARKER = 'awstats';
export const REPORT_EXTENSION = '.txt';

/** awstatsMMYYYY.<website>.txt */
const REPORT_FILENAME = /^awstats(\d{2})(\d{4})\.(.+)\.txt$/;

export type FilenameFailure = 'missing-marker' | 'bad-extension' | 'bad-period' | 'missing-website';

export type FilenameParseResult =
  | { ok: true; value: ReportFileInfo }
  | { ok: false; reason: FilenameFailure };

const FAILURE_MESSAGES: Record<FilenameFailure, string> = {
  'missing-marker': `expected the "${REPORT_MARKER}" prefix`,
  'bad-extension': `expected the "${REPORT_EXTENSION}" extension`,
  'bad-period': 'expected a two-digit month (01-12) and four-digit year after the prefix',
  'missing-website': 'cannot extract website name',
};

/**
 * Is this directory entry an AWStats data file worth looking at?
 */
export function isReportFile(filename: string): boolean {
  return filename.includes(REPORT_MARKER) && filename.endsWith(REPORT_EXTENSION);
}

/**
 * Split a report filename into website and period.
 * e.g., "awstats032024.example.com.txt" → { website: "example.com", year: 2024, month: 3 }
 */
export function parseReportFilename(filename: string): FilenameParseResult {
  if (!filename.startsWith(REPORT_MARKER)) {
    return { ok: false, reason: 'missing-marker' };
  }
  if (!filename.endsWith(REPORT_EXTENSION)) {
    return { ok: false, reason: 'bad-extension' };
  }

  const match = filename.match(REPORT_FILENAME);
  if (!match) {
    const stamp = filename.slice(REPORT_MARKER.length, REPORT_MARKER.length + 6);
    return { ok: false, reason: /^\d{6}$/.test(stamp) ? 'missing-website' : 'bad-period' };
  }

  const month = parseInt(match[1], 10);
  const year = parseInt(match[2], 10);
  if (month < 1 || month > 12) {
    return { ok: false, reason: 'bad-period' };
  }

  return {
    ok: true,
    value: { filename, website: match[3], year, month },
  };
}

export function describeFilenameFailure(reason: FilenameFailure): string {
  return FAILURE_MESSAGES[reason];
}

/**
 * Like parseReportFilename, but throws FilenameFormatError on failure.
 */
export function requireReportFilename(filename: string): ReportFileInfo {
  const result = parseReportFilename(filename);
  if (!result.ok) {
    throw new FilenameFormatError(filename, describeFilenameFailure(result.reason));
  }
  return result.value;
}
