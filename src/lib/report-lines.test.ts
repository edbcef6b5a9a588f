import { describe, it, expect } from 'vitest';
import { readLines } from './report-lines.js';

describe('readLines', () => {
  it('yields trimmed lines with their byte offsets', () => {
    const buffer = Buffer.from('first\r\n  second \nthird');
    const lines = Array.from(readLines(buffer));
    expect(lines).toEqual([
      { text: 'first', offset: 0 },
      { text: 'second', offset: 7 },
      { text: 'third', offset: 17 },
    ]);
  });

  it('starts at the given byte offset', () => {
    const buffer = Buffer.from('skip\nkeep\n');
    expect(Array.from(readLines(buffer, 5)).map((l) => l.text)).toEqual(['keep']);
  });

  it('counts multi-byte characters as bytes', () => {
    const buffer = Buffer.from('café\nnext\n');
    const lines = Array.from(readLines(buffer));
    expect(lines[0].text).toBe('café');
    expect(lines[1].offset).toBe(6);
  });

  it('yields nothing past the end of the buffer', () => {
    expect(Array.from(readLines(Buffer.from('abc'), 10))).toEqual([]);
  });
});
