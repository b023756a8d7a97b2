/**
 * Command creator functions for the text editor.
 * Provides type-safe factory functions for plain editor command objects.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type { ByteRange, StyleTag, StyledRange, StyleTarget, TextPosition, TextRange } from '../../types/state.ts';
import type {
  AddStyleCommand,
  BeginUndoSequenceCommand,
  CopyCommand,
  CutCommand,
  DeleteNextGraphemeCommand,
  DeleteNextWordCommand,
  DeletePrevGraphemeCommand,
  DeletePrevWordCommand,
  DeleteRangeCommand,
  DeleteSelectionCommand,
  EndUndoSequenceCommand,
  InsertAtCommand,
  InsertBacktabCommand,
  InsertTabCommand,
  InsertTextCommand,
  PasteCommand,
  RedoCommand,
  RemoveStyleCommand,
  SelectAllCommand,
  SetCursorCommand,
  SetSelectionCommand,
  SetStylesCommand,
  SetTextCommand,
  UndoCommand,
} from '../../types/actions.ts';

/**
 * Command creators. All functions return frozen plain objects.
 */
export const EditorCommands = {
  /**
   * Insert at the cursor, replacing the selection.
   * @param timestamp - Time used for undo coalescing
   */
  insertText(text: string, timestamp?: number): InsertTextCommand {
    return Object.freeze({ type: 'INSERT_TEXT', text, timestamp });
  },

  insertAt(offset: ByteOffset, text: string): InsertAtCommand {
    return Object.freeze({ type: 'INSERT_AT', offset, text });
  },

  deleteRange(range: ByteRange): DeleteRangeCommand {
    return Object.freeze({ type: 'DELETE_RANGE', range });
  },

  deleteSelection(): DeleteSelectionCommand {
    return Object.freeze({ type: 'DELETE_SELECTION' });
  },

  deletePrevGrapheme(timestamp?: number): DeletePrevGraphemeCommand {
    return Object.freeze({ type: 'DELETE_PREV_GRAPHEME', timestamp });
  },

  deleteNextGrapheme(timestamp?: number): DeleteNextGraphemeCommand {
    return Object.freeze({ type: 'DELETE_NEXT_GRAPHEME', timestamp });
  },

  deleteNextWord(timestamp?: number): DeleteNextWordCommand {
    return Object.freeze({ type: 'DELETE_NEXT_WORD', timestamp });
  },

  deletePrevWord(timestamp?: number): DeletePrevWordCommand {
    return Object.freeze({ type: 'DELETE_PREV_WORD', timestamp });
  },

  /**
   * Tab: indents the selected lines, or inserts a tab at the cursor.
   */
  insertTab(timestamp?: number): InsertTabCommand {
    return Object.freeze({ type: 'INSERT_TAB', timestamp });
  },

  insertBacktab(timestamp?: number): InsertBacktabCommand {
    return Object.freeze({ type: 'INSERT_BACKTAB', timestamp });
  },

  setText(text: string): SetTextCommand {
    return Object.freeze({ type: 'SET_TEXT', text });
  },

  /**
   * Move the cursor.
   * @param extend - Keep the anchor where it is
   */
  setCursor(position: TextPosition, extend: boolean = false): SetCursorCommand {
    return Object.freeze({ type: 'SET_CURSOR', position, extend });
  },

  setSelection(range: TextRange): SetSelectionCommand {
    return Object.freeze({ type: 'SET_SELECTION', range });
  },

  selectAll(): SelectAllCommand {
    return Object.freeze({ type: 'SELECT_ALL' });
  },

  beginUndoSequence(): BeginUndoSequenceCommand {
    return Object.freeze({ type: 'BEGIN_UNDO_SEQUENCE' });
  },

  endUndoSequence(): EndUndoSequenceCommand {
    return Object.freeze({ type: 'END_UNDO_SEQUENCE' });
  },

  undo(): UndoCommand {
    return Object.freeze({ type: 'UNDO' });
  },

  redo(): RedoCommand {
    return Object.freeze({ type: 'REDO' });
  },

  addStyle(range: StyleTarget, tag: StyleTag): AddStyleCommand {
    return Object.freeze({ type: 'ADD_STYLE', range, tag });
  },

  removeStyle(range: StyleTarget, tag: StyleTag): RemoveStyleCommand {
    return Object.freeze({ type: 'REMOVE_STYLE', range, tag });
  },

  setStyles(spans: readonly StyledRange[]): SetStylesCommand {
    return Object.freeze({ type: 'SET_STYLES', spans });
  },

  copy(): CopyCommand {
    return Object.freeze({ type: 'COPY' });
  },

  cut(): CutCommand {
    return Object.freeze({ type: 'CUT' });
  },

  paste(): PasteCommand {
    return Object.freeze({ type: 'PASTE' });
  },
};
