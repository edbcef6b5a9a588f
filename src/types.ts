/** Section offsets read from the BEGIN_MAP/END_MAP header, e.g. POS_SIDER → 10432 */
export type SectionIndex = Record<string, number>;

/** Name of the report section holding per-URL visit records */
export const SIDER_SECTION = 'POS_SIDER';

/** A single normalized record from the SIDER section */
export interface SiderRecord {
  url: string;
  pages: number;
  bandwidth: number;
  entry: number;
  exit: number;
}

/** Result of decoding one SIDER section */
export interface SiderParseResult {
  records: SiderRecord[];
  /** Lines inside the section that did not have the five-field record shape */
  skippedLines: number;
  /** Well-formed records dropped by URL filtering */
  ignoredRecords: number;
}

/** Fields carried by a report filename such as awstats032024.example.com.txt */
export interface ReportFileInfo {
  filename: string;
  website: string;
  year: number;
  month: number;
}

/** Calendar month a report covers */
export interface ReportPeriod {
  year: number;
  month: number;
}

/** A directory of AWStats files produced on one server */
export interface ServerLocation {
  id: number;
  name: string;
  directory: string;
}

/** Options for a single ingestion run */
export interface IngestRunOptions {
  server?: string;
  file?: string;
  website?: string;
  force?: boolean;
  dryRun?: boolean;
}

/** What happened to one report file */
export type FileOutcome =
  | { status: 'processed'; filename: string; serverId: number; recordsMerged: number; skippedLines: number; ignoredRecords: number }
  | { status: 'dry-run'; filename: string; serverId: number; recordsMerged: number; skippedLines: number; ignoredRecords: number }
  | { status: 'skipped'; filename: string; serverId: number }
  | { status: 'failed'; filename: string; serverId: number; error: string };

/** Stats for the execution summary */
export interface IngestSummary {
  serversScanned: number;
  filesSeen: number;
  filesProcessed: number;
  filesSkipped: number;
  filesFailed: number;
  recordsMerged: number;
  linesSkipped: number;
  recordsIgnored: number;
  errors: string[];
  outcomes: FileOutcome[];
  durationMs: number;
}
