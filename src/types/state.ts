/**
 * Core immutable state types for the Weft text engine.
 * Tree-shaped state is read-only and shared structurally between versions.
 */

import type { ByteOffset, ByteLength } from './branded.ts';

// =============================================================================
// Red-Black Tree Base
// =============================================================================

/**
 * Red-Black tree node color.
 */
export type NodeColor = 'red' | 'black';

/**
 * Generic base interface for Red-Black tree nodes.
 * Provides the common structure (color, left, right) that all RB-tree nodes share.
 * Uses F-bounded polymorphism for type-safe self-referential children.
 *
 * @template T - The concrete node type extending this interface
 */
export interface RBNode<T extends RBNode<T>> {
  readonly color: NodeColor;
  readonly left: T | null;
  readonly right: T | null;
  /** Number of black nodes on any path from here down to a leaf (cached for join) */
  readonly blackHeight: number;
}

// =============================================================================
// Coordinates
// =============================================================================

/**
 * Half-open byte range [start, end).
 */
export interface ByteRange {
  readonly start: ByteOffset;
  readonly end: ByteOffset;
}

/**
 * Logical position. `column` counts grapheme clusters from the line start,
 * not bytes and not UTF-16 units.
 */
export interface TextPosition {
  readonly line: number;
  readonly column: number;
}

/**
 * Ordered pair of positions, start <= end.
 */
export interface TextRange {
  readonly start: TextPosition;
  readonly end: TextPosition;
}

/**
 * One grapheme cluster and the bytes it occupies.
 */
export interface Grapheme {
  readonly text: string;
  readonly range: ByteRange;
}

/**
 * Description of one primitive store mutation, consumed by the style index,
 * the metrics cache and the selection.
 */
export interface EditDelta {
  readonly kind: 'insert' | 'delete';
  /** Byte offset of the edit */
  readonly offset: ByteOffset;
  readonly removedLength: ByteLength;
  readonly insertedLength: ByteLength;
  /** Line containing `offset` before the edit */
  readonly line: number;
  readonly removedLineBreaks: number;
  readonly insertedLineBreaks: number;
}

// =============================================================================
// Rope Types
// =============================================================================

/**
 * Immutable rope node. Each node holds one text chunk; in-order traversal
 * yields the document.
 */
export interface RopeNode extends RBNode<RopeNode> {
  readonly chunk: string;
  /** UTF-8 length of `chunk` */
  readonly chunkBytes: number;
  /** Number of '\n' in `chunk` */
  readonly chunkLineBreaks: number;
  readonly subtreeBytes: number;
  readonly subtreeLineBreaks: number;
}

export interface RopeState {
  readonly root: RopeNode | null;
}

// =============================================================================
// Style Types
// =============================================================================

/**
 * Opaque caller-chosen style identifier.
 */
export type StyleTag = number;

export interface StyleSpan {
  readonly range: ByteRange;
  readonly tag: StyleTag;
}

/**
 * Immutable style-index node.
 *
 * Starts are gap-encoded: `gap` is the distance from the in-order
 * predecessor's start (or from the subtree base for the first span).
 * Rotations keep in-order sequence, so they never touch gaps.
 */
export interface StyleNode extends RBNode<StyleNode> {
  readonly gap: number;
  readonly length: number;
  readonly tag: StyleTag;
  /** Number of spans in this subtree */
  readonly count: number;
  /** Sum of gaps in this subtree */
  readonly gapSum: number;
  /** Largest span end in this subtree, relative to the subtree base */
  readonly maxEnd: number;
}

export interface StyleIndexState {
  readonly root: StyleNode | null;
}

/**
 * How a deletion reshaped one span. `after` is null when the span was
 * removed entirely.
 */
export interface StyleChange {
  readonly before: ByteRange;
  readonly after: ByteRange | null;
  readonly tag: StyleTag;
}

// =============================================================================
// Selection & History Types
// =============================================================================

/**
 * Selection as byte offsets. A collapsed selection (anchor === head) is a caret.
 */
export interface SelectionState {
  readonly anchor: ByteOffset;
  readonly head: ByteOffset;
}

export interface UndoInsertRecord {
  readonly type: 'insert';
  readonly offset: ByteOffset;
  readonly text: string;
  readonly byteLength: ByteLength;
  readonly selectionBefore: SelectionState;
  readonly selectionAfter: SelectionState;
  readonly timestamp: number;
}

export interface UndoDeleteRecord {
  readonly type: 'delete';
  readonly offset: ByteOffset;
  readonly text: string;
  readonly byteLength: ByteLength;
  /** Spans reshaped by the deletion, restored on undo */
  readonly styles: readonly StyleChange[];
  readonly selectionBefore: SelectionState;
  readonly selectionAfter: SelectionState;
  readonly timestamp: number;
}

/**
 * One invertible primitive edit.
 */
export type UndoRecord = UndoInsertRecord | UndoDeleteRecord;

/**
 * The unit replayed by a single undo or redo.
 */
export interface UndoGroup {
  readonly records: readonly UndoRecord[];
  readonly selectionBefore: SelectionState;
  readonly selectionAfter: SelectionState;
  readonly timestamp: number;
}

// =============================================================================
// Display Types
// =============================================================================

export type WrapMode = 'none' | 'hard' | 'word';

/**
 * Everything that changes how a line is shaped.
 */
export interface RenderConfig {
  readonly wrapMode: WrapMode;
  readonly viewportWidth: number;
  readonly tabWidth: number;
  /** Show control characters and line breaks as visible placeholders */
  readonly showControl: boolean;
  /** Show a placeholder glyph at soft wraps */
  readonly showWrap: boolean;
}

/**
 * One displayable unit.
 */
export interface Glyph {
  /** Text to paint; may differ from the source (tabs, controls, soft hyphen) */
  readonly text: string;
  /** Columns occupied on screen; 0 for hidden glyphs */
  readonly screenWidth: number;
  readonly sourceRange: ByteRange;
  /** Logical line */
  readonly line: number;
  /** Grapheme column within the logical line */
  readonly column: number;
  /** Row within the logical line (0 unless wrapped) */
  readonly screenRow: number;
  /** Column within that row */
  readonly screenColumn: number;
  /** The glyph stands for the line terminator */
  readonly lineBreak: boolean;
  /** The row wraps after this glyph */
  readonly softBreak: boolean;
}

/**
 * One screen row of a logical line. Segments of a line partition its content
 * (terminator excluded) in order.
 */
export interface WrapSegment {
  readonly range: ByteRange;
  /** Screen width of the row */
  readonly width: number;
  /** Grapheme column of the row's first grapheme */
  readonly column: number;
  /** The row ends at a soft hyphen drawn as '-' */
  readonly hyphenated: boolean;
}

/**
 * Screen coordinates relative to a logical line: `row` counts wrapped rows
 * from the line's first row, `column` counts screen cells.
 */
export interface ScreenPosition {
  readonly row: number;
  readonly column: number;
}

/**
 * Checkpoint inside a long unwrapped line, letting horizontal scrolling
 * start shaping near the visible columns.
 */
export interface ScrollAnchor {
  readonly byte: ByteOffset;
  /** Grapheme column */
  readonly column: number;
  /** Screen column */
  readonly x: number;
}

// =============================================================================
// Editor Types
// =============================================================================

/**
 * Result of a widget command.
 * - 'unchanged': nothing happened
 * - 'changed': selection or view state moved; repaint
 * - 'text-changed': content differs; repaint and mark dirty
 */
export type TextOutcome = 'unchanged' | 'changed' | 'text-changed';

/**
 * Where a style applies: bytes, or logical positions resolved on arrival.
 */
export type StyleTarget = ByteRange | TextRange;

export interface StyledRange {
  readonly range: StyleTarget;
  readonly tag: StyleTag;
}

/**
 * Editor construction options. Omitted keys take DEFAULT_CONFIG values.
 */
export interface EditorConfig extends RenderConfig {
  /** Initial text */
  readonly content: string;
  /** Size hint in bytes that selects the storage backend; defaults to the content size */
  readonly expectedSize: number | null;
  /** Hint below which the flat store is used */
  readonly flatThreshold: number;
  /** Maximum undo groups kept */
  readonly undoLimit: number;
  /** Window in ms for merging consecutive typing; 0 disables */
  readonly coalesceTimeout: number;
  /** Tab inserts spaces up to the next tab stop instead of '\t' */
  readonly expandTabs: boolean;
}
