/**
 * Capability interfaces of the Weft text engine.
 */

import type { ByteOffset } from './branded.ts';
import type {
  ByteRange,
  EditDelta,
  Glyph,
  Grapheme,
  ScrollAnchor,
  SelectionState,
  TextPosition,
  UndoRecord,
  WrapSegment,
} from './state.ts';
import type { EmptyOperation } from './errors.ts';

// =============================================================================
// Text Storage
// =============================================================================

/**
 * Read-only view of document content, addressed in UTF-8 bytes.
 * Line breaks are '\n' (a preceding '\r' belongs to the terminator).
 */
export interface TextSource {
  /** Total length in bytes */
  lenBytes(): number;
  /** Number of lines; always >= 1 */
  lenLines(): number;
  /** Byte offset where `line` starts; `line` must be < lenLines() */
  lineStart(line: number): ByteOffset;
  /** Line containing `offset`, for 0 <= offset <= lenBytes() */
  lineAt(offset: ByteOffset): number;
  /** Text between two code-point aligned offsets */
  slice(start: ByteOffset, end: ByteOffset): string;
  /**
   * Nearest code-point boundary at or before `offset` (at or after it when
   * `forward`), clamped to [0, lenBytes()].
   */
  alignOffset(offset: number, forward: boolean): ByteOffset;
}

/**
 * Lazy grapheme cursor. Iteration never crosses the end of its range.
 */
export interface GraphemeCursor extends IterableIterator<Grapheme> {
  /** Byte offset of the next grapheme */
  readonly offset: ByteOffset;
  /** Continue from a grapheme boundary without visiting what lies between */
  skipTo(offset: ByteOffset): void;
  /** Continue from the start of the next line */
  skipLine(): void;
}

/**
 * Finite, restartable grapheme sequence. Every iteration starts over.
 */
export interface GraphemeSequence extends Iterable<Grapheme> {
  readonly range: ByteRange;
  cursor(): GraphemeCursor;
}

export interface DeleteResult {
  readonly removed: string;
  readonly delta: EditDelta;
}

/**
 * Storage backend selected once from a size hint.
 */
export type TextStoreKind = 'flat' | 'rope';

/**
 * Raw storage backend. Offsets are trusted: the text store validates
 * boundaries before calling in.
 */
export interface TextBuffer extends TextSource {
  readonly kind: TextStoreKind;
  text(): string;
  insertText(offset: ByteOffset, text: string): void;
  deleteText(start: ByteOffset, end: ByteOffset): void;
  snapshot(): TextSource;
}

/**
 * Which offsets an edit accepts: grapheme boundaries, or any code-point
 * boundary when replaying history over text whose clusters have merged.
 */
export type EditBoundary = 'grapheme' | 'code-point';

/**
 * The mutable document. Both backends share this contract.
 */
export interface TextStore extends TextSource {
  readonly kind: TextStoreKind;
  /** Entire content */
  text(): string;
  /** Range of `line` including its terminator */
  lineBytes(line: number): ByteRange;
  /** Range of `line` excluding its terminator */
  lineContent(line: number): ByteRange;
  /** Text of `line` excluding its terminator */
  lineText(line: number): string;
  /** Graphemes covering `range` (default: whole document) */
  graphemes(range?: ByteRange): GraphemeSequence;
  /** Whether `offset` is in bounds and on a grapheme boundary */
  isBoundary(offset: ByteOffset): boolean;
  insert(offset: ByteOffset, text: string, boundary?: EditBoundary): EditDelta | EmptyOperation;
  delete(range: ByteRange, boundary?: EditBoundary): DeleteResult | EmptyOperation;
  byteToPosition(offset: ByteOffset): TextPosition;
  positionToByte(position: TextPosition): ByteOffset;
  /** Frozen view of the current content, unaffected by later edits */
  snapshot(): TextSource;
  /** Lowest offset changed since the previous call, or null; resets the mark */
  minChanged(): ByteOffset | null;
}

// =============================================================================
// Undo
// =============================================================================

/**
 * Applies or reverts one record against the document and its styles.
 * Supplied by the owner of the store.
 */
export interface UndoReplayer {
  apply(record: UndoRecord): void;
  revert(record: UndoRecord): void;
}

export interface UndoEngineConfig {
  /** Maximum number of groups kept; the oldest are evicted */
  readonly limit: number;
  /** Window in ms for merging consecutive typing; 0 disables */
  readonly coalesceTimeout: number;
}

export interface UndoEngine {
  /** Open a group; nested calls only count depth */
  beginGroup(selection: SelectionState): void;
  /** Close a group; the outermost call commits it */
  endGroup(selection: SelectionState): void;
  record(record: UndoRecord): void;
  undo(replayer: UndoReplayer): SelectionState | null;
  redo(replayer: UndoReplayer): SelectionState | null;
  remainingUndo(): number;
  remainingRedo(): number;
  clear(): void;
  setLimit(limit: number): void;
  readonly depth: number;
  readonly isGrouping: boolean;
}

// =============================================================================
// Display
// =============================================================================

/**
 * Lazy glyph cursor over one logical line.
 */
export interface GlyphCursor extends IterableIterator<Glyph> {
  /** Continue from a grapheme boundary inside the line without shaping what lies between */
  skipTo(offset: ByteOffset): void;
  /** Stop after the current glyph; nothing more of the line is shaped */
  skipLine(): void;
}

/**
 * Finite, restartable glyph sequence for one line.
 */
export interface GlyphRun extends Iterable<Glyph> {
  readonly line: number;
  readonly segments: readonly WrapSegment[];
  cursor(): GlyphCursor;
  [Symbol.iterator](): GlyphCursor;
}

/**
 * Precomputed layout reused across shaping calls.
 */
export interface GlyphRunOptions {
  readonly segments?: readonly WrapSegment[];
  /** Checkpoints for unwrapped lines */
  readonly anchors?: readonly ScrollAnchor[];
}

// =============================================================================
// Clipboard
// =============================================================================

/**
 * Clipboard capability injected by the host.
 */
export interface Clipboard {
  getText(): string | null;
  setText(text: string): void;
}

// =============================================================================
// Misc
// =============================================================================

/**
 * Listener function for store changes.
 */
export type StoreListener = () => void;

/**
 * Unsubscribe function.
 */
export type Unsubscribe = () => void;

