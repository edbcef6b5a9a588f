import type { IngestSummary } from './types.js';

export const EXIT_OK = 0;
/** Configuration, database or filter errors that stop the run */
export const EXIT_FATAL = 1;
/** The run finished but some files or directories failed */
export const EXIT_PARTIAL = 2;

export function exitCodeFor(summary: IngestSummary): number {
  return summary.errors.length === 0 ? EXIT_OK : EXIT_PARTIAL;
}
