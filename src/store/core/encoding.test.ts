import { describe, it, expect } from 'vitest';
import { byteToUtf16Index, countLineBreaks, utf8Length } from './encoding.ts';

describe('utf8Length', () => {
  it('should count bytes per code point', () => {
    expect(utf8Length('abc')).toBe(3);
    expect(utf8Length('\u00E9')).toBe(2);
    expect(utf8Length('\u4E2D')).toBe(3);
    expect(utf8Length('\u{1F600}')).toBe(4);
  });

  it('should measure a slice of code units', () => {
    expect(utf8Length('a\u00E9b', 1, 3)).toBe(3);
  });

  it('should count a lone surrogate as three bytes', () => {
    expect(utf8Length('\uD83D')).toBe(3);
  });
});

describe('byteToUtf16Index', () => {
  it('should map code point boundaries', () => {
    const text = 'a\u00E9\u{1F600}z';
    expect(byteToUtf16Index(text, 0)).toBe(0);
    expect(byteToUtf16Index(text, 1)).toBe(1);
    expect(byteToUtf16Index(text, 3)).toBe(2);
    expect(byteToUtf16Index(text, 7)).toBe(4);
    expect(byteToUtf16Index(text, 8)).toBe(5);
  });

  it('should reject offsets inside a code point or past the end', () => {
    expect(byteToUtf16Index('\u00E9', 1)).toBe(-1);
    expect(byteToUtf16Index('ab', 3)).toBe(-1);
  });
});

describe('countLineBreaks', () => {
  it('should count CRLF once and ignore a lone CR', () => {
    expect(countLineBreaks('a\r\nb\rc\n')).toBe(2);
    expect(countLineBreaks('')).toBe(0);
  });
});
