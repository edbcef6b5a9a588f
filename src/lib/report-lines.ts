/**
 * Line iteration over an AWStats data file held in memory.
 *
 * Section offsets in the BEGIN_MAP header are byte positions, so lines are
 * split on raw bytes and only decoded once cut out of the buffer.
 */

const NEWLINE = 0x0a;

export interface ReportLine {
  /** Decoded line with surrounding whitespace (including \r) removed */
  text: string;
  /** Byte offset of the first character of the line */
  offset: number;
}

/**
 * Yield lines of `buffer` starting at byte `start`.
 * A trailing line without a newline is still yielded.
 */
export function* readLines(buffer: Buffer, start = 0): Generator<ReportLine> {
  let offset = start;
  while (offset < buffer.length) {
    let end = buffer.indexOf(NEWLINE, offset);
    if (end === -1) end = buffer.length;
    yield {
      text: buffer.toString('utf-8', offset, end).trim(),
      offset,
    };
    offset = end + 1;
  }
}
