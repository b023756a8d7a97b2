/**
 * Editor command types.
 * Every widget command can also be expressed as a plain object and
 * dispatched, which is how input handling drives the editor.
 */

import type { ByteRange, StyleTag, StyledRange, StyleTarget, TextPosition, TextRange } from './state.ts';
import type { ByteOffset } from './branded.ts';

// =============================================================================
// Text Editing Commands
// =============================================================================

/**
 * Insert text at the cursor, replacing the selection.
 */
export interface InsertTextCommand {
  readonly type: 'INSERT_TEXT';
  readonly text: string;
  /** Optional timestamp for deterministic undo coalescing (defaults to Date.now()) */
  readonly timestamp?: number;
}

/**
 * Insert text at a byte offset; the selection shifts with the edit.
 */
export interface InsertAtCommand {
  readonly type: 'INSERT_AT';
  readonly offset: ByteOffset;
  readonly text: string;
  readonly timestamp?: number;
}

export interface DeleteRangeCommand {
  readonly type: 'DELETE_RANGE';
  readonly range: ByteRange;
  readonly timestamp?: number;
}

export interface DeleteSelectionCommand {
  readonly type: 'DELETE_SELECTION';
  readonly timestamp?: number;
}

/**
 * Backspace: the selection if any, else the grapheme before the cursor.
 */
export interface DeletePrevGraphemeCommand {
  readonly type: 'DELETE_PREV_GRAPHEME';
  readonly timestamp?: number;
}

/**
 * Forward delete: the selection if any, else the grapheme after the cursor.
 */
export interface DeleteNextGraphemeCommand {
  readonly type: 'DELETE_NEXT_GRAPHEME';
  readonly timestamp?: number;
}

/**
 * Delete forward to the next word start, or to the end of the word when the
 * cursor is already on one; the selection if any.
 */
export interface DeleteNextWordCommand {
  readonly type: 'DELETE_NEXT_WORD';
  readonly timestamp?: number;
}

/**
 * Delete back over whitespace or the previous word; the selection if any.
 */
export interface DeletePrevWordCommand {
  readonly type: 'DELETE_PREV_WORD';
  readonly timestamp?: number;
}

/**
 * Indent the selected lines, or insert a tab (spaces with expandTabs) at the cursor.
 */
export interface InsertTabCommand {
  readonly type: 'INSERT_TAB';
  readonly timestamp?: number;
}

/**
 * Dedent the selected lines; nothing without a selection.
 */
export interface InsertBacktabCommand {
  readonly type: 'INSERT_BACKTAB';
  readonly timestamp?: number;
}

/**
 * Replace the whole document; history and styles are reset.
 */
export interface SetTextCommand {
  readonly type: 'SET_TEXT';
  readonly text: string;
}

// =============================================================================
// Selection Commands
// =============================================================================

export interface SetCursorCommand {
  readonly type: 'SET_CURSOR';
  readonly position: TextPosition;
  /** Keep the anchor and move only the head */
  readonly extend?: boolean;
}

export interface SetSelectionCommand {
  readonly type: 'SET_SELECTION';
  readonly range: TextRange;
}

export interface SelectAllCommand {
  readonly type: 'SELECT_ALL';
}

// =============================================================================
// History Commands
// =============================================================================

export interface BeginUndoSequenceCommand {
  readonly type: 'BEGIN_UNDO_SEQUENCE';
}

export interface EndUndoSequenceCommand {
  readonly type: 'END_UNDO_SEQUENCE';
}

export interface UndoCommand {
  readonly type: 'UNDO';
}

export interface RedoCommand {
  readonly type: 'REDO';
}

// =============================================================================
// Style Commands
// =============================================================================

export interface AddStyleCommand {
  readonly type: 'ADD_STYLE';
  readonly range: StyleTarget;
  readonly tag: StyleTag;
}

export interface RemoveStyleCommand {
  readonly type: 'REMOVE_STYLE';
  readonly range: StyleTarget;
  readonly tag: StyleTag;
}

export interface SetStylesCommand {
  readonly type: 'SET_STYLES';
  readonly spans: readonly StyledRange[];
}

// =============================================================================
// Clipboard Commands
// =============================================================================

export interface CopyCommand {
  readonly type: 'COPY';
}

export interface CutCommand {
  readonly type: 'CUT';
}

export interface PasteCommand {
  readonly type: 'PASTE';
}

// =============================================================================
// Union Type
// =============================================================================

export type EditorCommand =
  | InsertTextCommand
  | InsertAtCommand
  | DeleteRangeCommand
  | DeleteSelectionCommand
  | DeletePrevGraphemeCommand
  | DeleteNextGraphemeCommand
  | DeleteNextWordCommand
  | DeletePrevWordCommand
  | InsertTabCommand
  | InsertBacktabCommand
  | SetTextCommand
  | SetCursorCommand
  | SetSelectionCommand
  | SelectAllCommand
  | BeginUndoSequenceCommand
  | EndUndoSequenceCommand
  | UndoCommand
  | RedoCommand
  | AddStyleCommand
  | RemoveStyleCommand
  | SetStylesCommand
  | CopyCommand
  | CutCommand
  | PasteCommand;

export type EditorCommandType = EditorCommand['type'];

// =============================================================================
// Command Type Guards
// =============================================================================

/**
 * Commands that may change the document content.
 */
export function isTextEditCommand(
  command: EditorCommand
): command is
  | InsertTextCommand
  | InsertAtCommand
  | DeleteRangeCommand
  | DeleteSelectionCommand
  | DeletePrevGraphemeCommand
  | DeleteNextGraphemeCommand
  | DeleteNextWordCommand
  | DeletePrevWordCommand
  | InsertTabCommand
  | InsertBacktabCommand
  | SetTextCommand
  | CutCommand
  | PasteCommand {
  switch (command.type) {
    case 'INSERT_TEXT':
    case 'INSERT_AT':
    case 'DELETE_RANGE':
    case 'DELETE_SELECTION':
    case 'DELETE_PREV_GRAPHEME':
    case 'DELETE_NEXT_GRAPHEME':
    case 'DELETE_NEXT_WORD':
    case 'DELETE_PREV_WORD':
    case 'INSERT_TAB':
    case 'INSERT_BACKTAB':
    case 'SET_TEXT':
    case 'CUT':
    case 'PASTE':
      return true;
    default:
      return false;
  }
}

export function isHistoryCommand(
  command: EditorCommand
): command is UndoCommand | RedoCommand | BeginUndoSequenceCommand | EndUndoSequenceCommand {
  return (
    command.type === 'UNDO' ||
    command.type === 'REDO' ||
    command.type === 'BEGIN_UNDO_SEQUENCE' ||
    command.type === 'END_UNDO_SEQUENCE'
  );
}

/**
 * ByteRange and TextRange share their keys; a byte range has numeric ends.
 */
export function isByteRange(range: StyleTarget): range is ByteRange {
  return typeof range.start === 'number';
}

// =============================================================================
// Command Validation
// =============================================================================

export interface CommandValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

type Fields = Readonly<Record<string, unknown>>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function checkByteRange(value: unknown, name: string, errors: string[], documentLength?: number): void {
  if (!isFields(value) || !isCount(value.start) || !isCount(value.end)) {
    errors.push(`${name} requires a "range" with non-negative integer "start" and "end"`);
    return;
  }
  if (value.start > value.end) {
    errors.push(`${name} start (${value.start}) cannot be greater than end (${value.end})`);
  }
  if (documentLength !== undefined && value.end > documentLength) {
    errors.push(`${name} end ${value.end} exceeds document length ${documentLength}`);
  }
}

function isPosition(value: unknown): boolean {
  return isFields(value) && isCount(value.line) && isCount(value.column);
}

function checkTextRange(value: unknown, name: string, errors: string[]): void {
  if (!isFields(value) || !isPosition(value.start) || !isPosition(value.end)) {
    errors.push(`${name} requires a "range" with "start" and "end" positions`);
  }
}

function checkStyleTarget(value: unknown, name: string, errors: string[], documentLength?: number): void {
  if (isFields(value) && typeof value.start === 'number') {
    checkByteRange(value, name, errors, documentLength);
  } else {
    checkTextRange(value, name, errors);
  }
}

function checkText(command: Fields, errors: string[]): void {
  if (typeof command.text !== 'string') {
    errors.push(`${String(command.type)} command requires a string "text" property`);
  }
}

function checkTag(command: Fields, errors: string[]): void {
  if (typeof command.tag !== 'number' || !Number.isFinite(command.tag)) {
    errors.push(`${String(command.type)} command requires a numeric "tag" property`);
  }
}

/**
 * Validate a command with detailed error messages. Byte offsets are checked
 * against `documentLength` when given; grapheme boundaries are checked by
 * the editor when the command runs.
 */
export function validateCommand(value: unknown, documentLength?: number): CommandValidationResult {
  const errors: string[] = [];

  if (!isFields(value)) {
    errors.push('Command must be a non-null object');
    return { valid: false, errors };
  }
  if (typeof value.type !== 'string') {
    errors.push('Command must have a string "type" property');
    return { valid: false, errors };
  }

  switch (value.type) {
    case 'INSERT_TEXT':
    case 'SET_TEXT':
      checkText(value, errors);
      break;

    case 'INSERT_AT':
      if (!isCount(value.offset)) {
        errors.push('INSERT_AT command requires a non-negative integer "offset" property');
      } else if (documentLength !== undefined && value.offset > documentLength) {
        errors.push(`INSERT_AT offset ${value.offset} exceeds document length ${documentLength}`);
      }
      checkText(value, errors);
      break;

    case 'DELETE_RANGE':
      checkByteRange(value.range, 'DELETE_RANGE', errors, documentLength);
      break;

    case 'SET_CURSOR':
      if (!isPosition(value.position)) {
        errors.push('SET_CURSOR command requires a "position" with "line" and "column"');
      }
      if (value.extend !== undefined && typeof value.extend !== 'boolean') {
        errors.push('SET_CURSOR "extend" must be a boolean');
      }
      break;

    case 'SET_SELECTION':
      checkTextRange(value.range, 'SET_SELECTION', errors);
      break;

    case 'ADD_STYLE':
    case 'REMOVE_STYLE':
      checkStyleTarget(value.range, value.type, errors, documentLength);
      checkTag(value, errors);
      break;

    case 'SET_STYLES':
      if (!Array.isArray(value.spans)) {
        errors.push('SET_STYLES command requires an array "spans" property');
        break;
      }
      for (const span of value.spans) {
        if (!isFields(span)) {
          errors.push('SET_STYLES spans must be objects');
          continue;
        }
        checkStyleTarget(span.range, 'SET_STYLES', errors, documentLength);
        checkTag({ ...span, type: 'SET_STYLES' }, errors);
      }
      break;

    case 'DELETE_SELECTION':
    case 'DELETE_PREV_GRAPHEME':
    case 'DELETE_NEXT_GRAPHEME':
    case 'DELETE_NEXT_WORD':
    case 'DELETE_PREV_WORD':
    case 'INSERT_TAB':
    case 'INSERT_BACKTAB':
    case 'SELECT_ALL':
    case 'BEGIN_UNDO_SEQUENCE':
    case 'END_UNDO_SEQUENCE':
    case 'UNDO':
    case 'REDO':
    case 'COPY':
    case 'CUT':
    case 'PASTE':
      break;

    default:
      errors.push(`Unknown command type: "${value.type}"`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Check if an unknown value is a well-formed EditorCommand.
 */
export function isEditorCommand(value: unknown): value is EditorCommand {
  return validateCommand(value).valid;
}
