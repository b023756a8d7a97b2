/**
 * Branded types for type-safe offset handling.
 *
 * Byte offsets and byte lengths are both plain numbers at runtime, but mixing
 * them up (or mixing either with a UTF-16 index or a grapheme column) is the
 * most common source of cursor bugs in multi-byte text. The brand makes the
 * compiler catch it.
 *
 * Usage:
 * ```typescript
 * const start = byteOffset(10);
 * const len = byteLength(3);
 *
 * // Type error: a length is not a position
 * const wrong: ByteOffset = len;
 *
 * // OK: explicit arithmetic
 * const end = addByteOffset(start, len);
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Phantom key; never exists at runtime.
 */
declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Offset Types
// =============================================================================

/**
 * Byte offset in a document.
 * Represents a position in terms of UTF-8 bytes.
 *
 * Use when:
 * - Addressing text store content
 * - Keying style spans
 * - Recording undo operations
 */
export type ByteOffset = Branded<number, 'ByteOffset'>;

/**
 * Byte length (size/count of bytes).
 * Semantically distinct from ByteOffset: an offset is a position,
 * a length is a size/count.
 */
export type ByteLength = Branded<number, 'ByteLength'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Brand a raw number as a byte position.
 */
export function byteOffset(value: number): ByteOffset {
  return value as ByteOffset;
}

/**
 * Brand a raw number as a byte count.
 */
export function byteLength(value: number): ByteLength {
  return value as ByteLength;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Non-negative integer. Says nothing about grapheme boundaries.
 */
export function isValidOffset(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Advance a ByteOffset by a length (or a signed delta).
 */
export function addByteOffset(offset: ByteOffset, delta: ByteLength | number): ByteOffset {
  return (offset + delta) as ByteOffset;
}

/**
 * Distance between two offsets, as a length.
 * Negative when `b` is after `a`.
 */
export function diffByteOffset(a: ByteOffset, b: ByteOffset): ByteLength {
  return (a - b) as ByteLength;
}

// =============================================================================
// Comparison Helpers
// =============================================================================

/**
 * Sort comparator for offsets.
 */
export function compareByteOffsets(a: ByteOffset, b: ByteOffset): number {
  return a - b;
}

/**
 * Pin an offset into [min, max]. Editing paths never clamp; this is for
 * viewport arithmetic.
 */
export function clampByteOffset(
  offset: ByteOffset,
  min: ByteOffset,
  max: ByteOffset
): ByteOffset {
  return Math.max(min, Math.min(max, offset)) as ByteOffset;
}

// =============================================================================
// Constants
// =============================================================================

export const ZERO_BYTE_OFFSET: ByteOffset = 0 as ByteOffset;

export const ZERO_BYTE_LENGTH: ByteLength = 0 as ByteLength;
