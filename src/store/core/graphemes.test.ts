import { describe, it, expect } from 'vitest';
import {
  countGraphemes,
  findSafeSegmentStart,
  graphemeWidth,
  isBoundaryAt,
  isLineBreak,
  segmentGraphemes,
} from './graphemes.ts';

describe('segmentation', () => {
  it('should split into grapheme clusters', () => {
    expect([...segmentGraphemes('\u00e9x\r\n\u{1F44D}\u{1F3FD}')]).toEqual([
      '\u00e9',
      'x',
      '\r\n',
      '\u{1F44D}\u{1F3FD}',
    ]);
    expect(countGraphemes('e\u0301x\u{1F44D}\u{1F3FD}')).toBe(3);
    expect(countGraphemes('')).toBe(0);
  });

  it('should recognize line breaks', () => {
    expect(isLineBreak('\n')).toBe(true);
    expect(isLineBreak('\r\n')).toBe(true);
    expect(isLineBreak('\r')).toBe(false);
  });
});

describe('isBoundaryAt', () => {
  it('should reject an index inside a combining sequence', () => {
    expect(isBoundaryAt('e\u0301x', 1)).toBe(false);
    expect(isBoundaryAt('e\u0301x', 2)).toBe(true);
  });

  it('should accept both ends', () => {
    expect(isBoundaryAt('abc', 0)).toBe(true);
    expect(isBoundaryAt('abc', 3)).toBe(true);
  });

  it('should reject the middle of CRLF', () => {
    expect(isBoundaryAt('a\r\nb', 2)).toBe(false);
    expect(isBoundaryAt('a\r\nb', 1)).toBe(true);
  });

  it('should find boundaries far into long text', () => {
    const text = 'x'.repeat(1000) + '\u{1F44D}\u{1F3FD}' + 'y'.repeat(10);
    expect(isBoundaryAt(text, 1000)).toBe(true);
    expect(isBoundaryAt(text, 1002)).toBe(false);
    expect(isBoundaryAt(text, 1004)).toBe(true);
  });
});

describe('findSafeSegmentStart', () => {
  it('should stop between two ASCII characters', () => {
    expect(findSafeSegmentStart('abcdef', 4)).toBe(4);
  });

  it('should step back over non-ASCII text', () => {
    expect(findSafeSegmentStart('ab\u00e9\u00e9', 4)).toBe(1);
  });

  it('should not stop between CR and LF', () => {
    expect(findSafeSegmentStart('ab\r\n', 3)).toBe(2);
  });

  it('should stop between two CJK ideographs', () => {
    expect(findSafeSegmentStart('\u4e2d\u6587\u5b57', 2)).toBe(2);
  });

  it('should not stop before a combining sound mark', () => {
    expect(findSafeSegmentStart('\u304b\u3099\u304b', 2)).toBe(0);
  });
});

describe('graphemeWidth', () => {
  it('should measure narrow, wide and zero-width clusters', () => {
    expect(graphemeWidth('a')).toBe(1);
    expect(graphemeWidth('\u4e2d')).toBe(2);
    expect(graphemeWidth('\u0301')).toBe(0);
    expect(graphemeWidth('e\u0301')).toBe(1);
  });

  it('should measure emoji as two columns', () => {
    expect(graphemeWidth('\u{1F44D}')).toBe(2);
    expect(graphemeWidth('\u{1F44D}\u{1F3FD}')).toBe(2);
  });

  it('should give format characters and controls no width', () => {
    expect(graphemeWidth('\u00ad')).toBe(0);
    expect(graphemeWidth('\u200b')).toBe(0);
    expect(graphemeWidth('\t')).toBe(0);
  });
});
