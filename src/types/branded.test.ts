/**
 * Tests for branded offset types.
 */

import { describe, it, expect } from 'vitest';
import {
  byteOffset,
  byteLength,
  isValidOffset,
  addByteOffset,
  diffByteOffset,
  compareByteOffsets,
  clampByteOffset,
  ZERO_BYTE_OFFSET,
  ZERO_BYTE_LENGTH,
  type ByteOffset,
  type ByteLength,
} from './branded.ts';

describe('Branded Types', () => {
  describe('constructor functions', () => {
    it('should create ByteOffset from number', () => {
      const offset = byteOffset(42);
      expect(offset).toBe(42);
    });

    it('should create ByteLength from number', () => {
      const len = byteLength(7);
      expect(len).toBe(7);
    });
  });

  describe('validation functions', () => {
    it('should validate valid offsets', () => {
      expect(isValidOffset(0)).toBe(true);
      expect(isValidOffset(100)).toBe(true);
      expect(isValidOffset(1000000)).toBe(true);
    });

    it('should reject invalid offsets', () => {
      expect(isValidOffset(-1)).toBe(false);
      expect(isValidOffset(1.5)).toBe(false);
      expect(isValidOffset(NaN)).toBe(false);
      expect(isValidOffset(Infinity)).toBe(false);
    });
  });

  describe('arithmetic helpers', () => {
    it('should advance an offset by a length', () => {
      const end: ByteOffset = addByteOffset(byteOffset(10), byteLength(5));
      expect(end).toBe(15);
    });

    it('should accept a negative delta', () => {
      expect(addByteOffset(byteOffset(10), -4)).toBe(6);
    });

    it('should compute the distance between offsets as a length', () => {
      const len: ByteLength = diffByteOffset(byteOffset(12), byteOffset(4));
      expect(len).toBe(8);
      expect(diffByteOffset(byteOffset(4), byteOffset(12))).toBe(-8);
    });
  });

  describe('comparison helpers', () => {
    it('should order offsets', () => {
      expect(compareByteOffsets(byteOffset(1), byteOffset(2))).toBeLessThan(0);
      expect(compareByteOffsets(byteOffset(2), byteOffset(2))).toBe(0);
      expect(compareByteOffsets(byteOffset(3), byteOffset(2))).toBeGreaterThan(0);
    });

    it('should clamp into range', () => {
      const min = byteOffset(0);
      const max = byteOffset(10);
      expect(clampByteOffset(byteOffset(-5), min, max)).toBe(0);
      expect(clampByteOffset(byteOffset(5), min, max)).toBe(5);
      expect(clampByteOffset(byteOffset(50), min, max)).toBe(10);
    });
  });

  describe('constants', () => {
    it('should expose zero values', () => {
      expect(ZERO_BYTE_OFFSET).toBe(0);
      expect(ZERO_BYTE_LENGTH).toBe(0);
    });
  });
});
