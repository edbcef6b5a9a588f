/**
 * Error taxonomy for the ingestion job.
 *
 * structural: the report itself is unusable (missing section, bad counter)
 * lookup:     a name does not resolve (unknown website, unknown server)
 * format:     a filename does not follow awstatsMMYYYY.<website>.txt
 * config:     environment or configuration files are invalid
 */

export type IngestErrorKind = 'structural' | 'lookup' | 'format' | 'config';

export class IngestError extends Error {
  readonly kind: IngestErrorKind;

  constructor(kind: IngestErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class SectionNotFoundError extends IngestError {
  readonly section: string;

  constructor(section: string, filename?: string) {
    super('structural', `${section} section not found${filename ? ` in ${filename}` : ''}`);
    this.section = section;
  }
}

export class SectionFormatError extends IngestError {
  constructor(message: string) {
    super('structural', message);
  }
}

export class RecordFormatError extends IngestError {
  readonly line: string;

  constructor(line: string, field: string) {
    super('structural', `Invalid counter "${field}" in record: ${line}`);
    this.line = line;
  }
}

export class LookupError extends IngestError {
  constructor(message: string) {
    super('lookup', message);
  }
}

export class FilenameFormatError extends IngestError {
  readonly filename: string;

  constructor(filename: string, reason: string) {
    super('format', `Invalid file name format '${filename}': ${reason}`);
    this.filename = filename;
  }
}

export class ConfigError extends IngestError {
  constructor(message: string) {
    super('config', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
