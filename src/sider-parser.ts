import { readLines } from './lib/report-lines.js';
import { shouldIgnoreUrl } from './ignore-list.js';
import { RecordFormatError, SectionFormatError } from './errors.js';
import type { SiderParseResult, SiderRecord } from './types.js';

export interface SiderParseOptions {
  /** Prefix removed after the leading slash, e.g. "wiki/" */
  pathPrefix: string;
  ignorePatterns: readonly string[];
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

// Bytes a UTF-8 sequence spans, judged from its first byte; 0 for bytes that cannot start one
function utf8SequenceLength(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

function decodeEscapeRun(run: string): string {
  const bytes = new Uint8Array(run.length / 3);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(run.slice(i * 3 + 1, i * 3 + 3), 16);
  }

  let decoded = '';
  let i = 0;
  while (i < bytes.length) {
    const length = utf8SequenceLength(bytes[i]);
    if (length > 0 && i + length <= bytes.length) {
      try {
        decoded += strictUtf8.decode(bytes.subarray(i, i + length));
        i += length;
        continue;
      } catch (error) {
        if (!(error instanceof TypeError)) throw error;
      }
    }
    // Not valid UTF-8 from here: keep this one escape as written
    decoded += run.slice(i * 3, i * 3 + 3);
    i++;
  }
  return decoded;
}

/**
 * Percent-decode a URL path. Each escape that does not belong to a valid
 * UTF-8 sequence is left as written; its neighbours still decode.
 * "+" stays a plus sign.
 */
export function decodeUrlPath(value: string): string {
  return value.replace(/(?:%[0-9A-Fa-f]{2})+/g, decodeEscapeRun);
}

/**
 * Turn the first field of a SIDER line into the stored URL.
 * "/wiki/Some%20Page" → "Some Page"
 */
export function normalizeUrl(raw: string, pathPrefix: string): string {
  let url = raw;
  if (url.startsWith('/')) {
    url = url.slice(1);
  }
  if (pathPrefix && url.startsWith(pathPrefix)) {
    url = url.slice(pathPrefix.length);
  }
  return decodeUrlPath(url);
}

function parseCounter(field: string, line: string): number {
  if (!/^-?\d+$/.test(field)) {
    throw new RecordFormatError(line, field);
  }
  return parseInt(field, 10);
}

export type SiderLineResult =
  | { kind: 'record'; record: SiderRecord }
  | { kind: 'ignored'; url: string }
  | { kind: 'malformed' };

/**
 * Parse one SIDER data line: URL, pages, bandwidth, entry, exit.
 * The URL filter runs before the counters are read, so an ignored line
 * never fails on its counters.
 */
export function parseSiderLine(line: string, options: SiderParseOptions): SiderLineResult {
  const parts = line.split(/\s+/);
  if (parts.length !== 5) {
    return { kind: 'malformed' };
  }

  const [rawUrl, pages, bandwidth, entry, exit] = parts;
  const url = normalizeUrl(rawUrl, options.pathPrefix);
  if (shouldIgnoreUrl(url, options.ignorePatterns)) {
    return { kind: 'ignored', url };
  }

  return {
    kind: 'record',
    record: {
      url,
      pages: parseCounter(pages, line),
      bandwidth: parseCounter(bandwidth, line),
      entry: parseCounter(entry, line),
      exit: parseCounter(exit, line),
    },
  };
}

/**
 * Decode the SIDER section starting at `offset` until END_SIDER.
 *
 * Lines of any other shape are counted in `skippedLines`; records whose URL
 * is filtered out are counted in `ignoredRecords`. A counter that is not an
 * integer fails the whole section.
 */
export function parseSiderSection(
  buffer: Buffer,
  offset: number,
  options: SiderParseOptions
): SiderParseResult {
  if (offset < 0 || offset >= buffer.length) {
    throw new SectionFormatError(`SIDER offset ${offset} is outside the file (${buffer.length} bytes)`);
  }

  const records: SiderRecord[] = [];
  let skippedLines = 0;
  let ignoredRecords = 0;

  for (const { text } of readLines(buffer, offset)) {
    if (text.startsWith('END_SIDER')) {
      return { records, skippedLines, ignoredRecords };
    }
    if (text === '' || text.startsWith('#') || text.startsWith('BEGIN_SIDER')) {
      continue;
    }

    const result = parseSiderLine(text, options);
    if (result.kind === 'malformed') {
      skippedLines++;
    } else if (result.kind === 'ignored') {
      ignoredRecords++;
    } else {
      records.push(result.record);
    }
  }

  throw new SectionFormatError('SIDER section is not terminated by END_SIDER');
}
