/**
 * Type exports for the Weft text engine.
 */

// State types
export type {
  NodeColor,
  RBNode,
  ByteRange,
  TextPosition,
  TextRange,
  Grapheme,
  EditDelta,
  RopeNode,
  RopeState,
  StyleTag,
  StyleSpan,
  StyleNode,
  StyleIndexState,
  StyleChange,
  SelectionState,
  UndoInsertRecord,
  UndoDeleteRecord,
  UndoRecord,
  UndoGroup,
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
} from './state.ts';

// Command types
export type {
  InsertTextCommand,
  InsertAtCommand,
  DeleteRangeCommand,
  DeleteSelectionCommand,
  DeletePrevGraphemeCommand,
  DeleteNextGraphemeCommand,
  SetTextCommand,
  SetCursorCommand,
  SetSelectionCommand,
  SelectAllCommand,
  BeginUndoSequenceCommand,
  EndUndoSequenceCommand,
  UndoCommand,
  RedoCommand,
  AddStyleCommand,
  RemoveStyleCommand,
  SetStylesCommand,
  CopyCommand,
  CutCommand,
  PasteCommand,
  EditorCommand,
  EditorCommandType,
  CommandValidationResult,
} from './actions.ts';

export {
  isTextEditCommand,
  isHistoryCommand,
  isByteRange,
  validateCommand,
  isEditorCommand,
} from './actions.ts';

// Capability interfaces
export type {
  TextSource,
  GraphemeCursor,
  GraphemeSequence,
  DeleteResult,
  TextStoreKind,
  EditBoundary,
  TextBuffer,
  TextStore,
  UndoReplayer,
  UndoEngineConfig,
  UndoEngine,
  GlyphCursor,
  GlyphRun,
  GlyphRunOptions,
  Clipboard,
  StoreListener,
  Unsubscribe,
} from './store.ts';

// Errors
export type { TextErrorKind, TextErrorDetail, EmptyOperation } from './errors.ts';
export {
  TextError,
  isTextError,
  invalidBoundary,
  invalidRange,
  EMPTY_OPERATION,
  isEmptyOperation,
} from './errors.ts';

// Branded offset types
export type { ByteOffset, ByteLength } from './branded.ts';
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
} from './branded.ts';
