/**
 * Weft - a text-editing engine for single-line inputs and multi-line editors
 *
 * Main entry point exporting core types, the editor, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  ByteRange,
  TextPosition,
  TextRange,
  Grapheme,
  EditDelta,
  StyleTag,
  StyleSpan,
  StyleIndexState,
  StyleChange,
  SelectionState,
  UndoInsertRecord,
  UndoDeleteRecord,
  UndoRecord,
  WrapMode,
  RenderConfig,
  Glyph,
  WrapSegment,
  ScreenPosition,
  ScrollAnchor,
  TextOutcome,
  StyleTarget,
  StyledRange,
  EditorConfig,
  EditorCommand,
  EditorCommandType,
  CommandValidationResult,
  TextSource,
  GraphemeCursor,
  GraphemeSequence,
  TextStoreKind,
  TextStore,
  EditBoundary,
  UndoReplayer,
  UndoEngine,
  GlyphCursor,
  GlyphRun,
  Clipboard,
  StoreListener,
  Unsubscribe,
  TextErrorKind,
  TextErrorDetail,
  EmptyOperation,
  ByteOffset,
  ByteLength,
} from './types/index.ts';

export {
  byteOffset,
  byteLength,
  isValidOffset,
  addByteOffset,
  diffByteOffset,
  compareByteOffsets,
  clampByteOffset,
  ZERO_BYTE_OFFSET,
  ZERO_BYTE_LENGTH,
} from './types/index.ts';

// =============================================================================
// Errors and Guards
// =============================================================================

export {
  TextError,
  isTextError,
  invalidBoundary,
  invalidRange,
  EMPTY_OPERATION,
  isEmptyOperation,
  isTextEditCommand,
  isHistoryCommand,
  isByteRange,
  validateCommand,
  isEditorCommand,
} from './types/index.ts';

// =============================================================================
// Editor
// =============================================================================

export {
  createTextEditor,
  mapOffset,
  EditorCommands,
  DEFAULT_CONFIG,
  validateConfig,
  resolveConfig,
  createSelection,
  isCollapsed,
  selectionBounds,
} from './store/index.ts';
export type { EditorOptions, TextEditor, ConfigValidationResult } from './store/index.ts';

// =============================================================================
// Storage and Positions
// =============================================================================

export {
  DEFAULT_FLAT_THRESHOLD,
  createTextStore,
  utf8Length,
  segmentGraphemes,
  countGraphemes,
  graphemeWidth,
  MAX_TEXT_RANGE,
  byteRange,
  comparePositions,
  lineGraphemeCount,
  byteToPosition,
  positionToByte,
  rangeToBytes,
  bytesToRange,
} from './store/index.ts';
export type { TextStoreOptions } from './store/index.ts';

// =============================================================================
// Styles and Undo
// =============================================================================

export {
  createStyleIndex,
  styleIndexAdd,
  styleIndexRemove,
  styleIndexSet,
  stylesIn,
  stylesAt,
  collectSpans,
  applyEditToStyles,
  restoreStyleChanges,
  createUndoEngine,
} from './store/index.ts';

// =============================================================================
// Display
// =============================================================================

export {
  DEFAULT_RENDER_CONFIG,
  WRAP_PICTURE,
  remapGrapheme,
  displayWidth,
  computeWrapSegments,
  lineDisplayWidth,
  glyphsForLine,
  positionToScreen,
  screenToPosition,
  createLineMetricsCache,
  getVisibleRows,
  screenCellToPosition,
} from './store/index.ts';
export type {
  LineMetricsCache,
  LineMetricsStats,
  Viewport,
  ScrollPosition,
  VisibleRow,
  VisibleRowsResult,
  ScreenCell,
} from './store/index.ts';

// =============================================================================
// Event System
// =============================================================================

export { createEventEmitter } from './store/index.ts';
export type {
  ContentChangeEvent,
  SelectionChangeEvent,
  HistoryChangeEvent,
  StyleChangeEvent,
  AnyEditorEvent,
  EditorEventMap,
  EventHandler,
} from './store/index.ts';

// =============================================================================
// Namespaces
// =============================================================================

export { query, scan } from './api/index.ts';
