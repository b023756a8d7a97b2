/**
 * Event system for the text editor.
 * Provides a pub/sub mechanism for content, selection, history and style changes.
 */

import type { ByteRange, EditDelta, SelectionState } from '../../types/state.ts';
import type { Unsubscribe } from '../../types/store.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface EditorEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired once per primitive store mutation, including undo and redo replays.
 */
export interface ContentChangeEvent extends EditorEvent {
  readonly type: 'content-change';
  readonly delta: EditDelta;
}

/**
 * Fired when the selection moves.
 */
export interface SelectionChangeEvent extends EditorEvent {
  readonly type: 'selection-change';
  readonly previous: SelectionState;
  readonly selection: SelectionState;
}

/**
 * Fired after an undo or redo replayed a group.
 */
export interface HistoryChangeEvent extends EditorEvent {
  readonly type: 'history-change';
  readonly direction: 'undo' | 'redo';
  readonly selection: SelectionState;
}

/**
 * Fired when spans are added or removed by the caller. `range` is null when
 * the whole index was replaced.
 */
export interface StyleChangeEvent extends EditorEvent {
  readonly type: 'style-change';
  readonly range: ByteRange | null;
}

export type AnyEditorEvent =
  | ContentChangeEvent
  | SelectionChangeEvent
  | HistoryChangeEvent
  | StyleChangeEvent;

/**
 * Event type to payload mapping.
 */
export interface EditorEventMap {
  'content-change': ContentChangeEvent;
  'selection-change': SelectionChangeEvent;
  'history-change': HistoryChangeEvent;
  'style-change': StyleChangeEvent;
}

export type EventHandler<T extends AnyEditorEvent> = (event: T) => void;

type HandlerSets = { readonly [K in keyof EditorEventMap]: Set<EventHandler<EditorEventMap[K]>> };

// =============================================================================
// Event Emitter
// =============================================================================

export interface EditorEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof EditorEventMap>(
    type: K,
    handler: EventHandler<EditorEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof EditorEventMap>(
    type: K,
    handler: EventHandler<EditorEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers. A throwing handler is logged
   * and the rest still run.
   */
  emit<K extends keyof EditorEventMap>(type: K, event: EditorEventMap[K]): void;

  listenerCount(type: keyof EditorEventMap): number;

  removeAllListeners(): void;
}

export function createEventEmitter(): EditorEventEmitter {
  const handlers: HandlerSets = {
    'content-change': new Set(),
    'selection-change': new Set(),
    'history-change': new Set(),
    'style-change': new Set(),
  };

  return {
    addEventListener<K extends keyof EditorEventMap>(
      type: K,
      handler: EventHandler<EditorEventMap[K]>
    ): Unsubscribe {
      const typeHandlers: Set<EventHandler<EditorEventMap[K]>> = handlers[type];
      typeHandlers.add(handler);
      return () => {
        typeHandlers.delete(handler);
      };
    },

    removeEventListener<K extends keyof EditorEventMap>(
      type: K,
      handler: EventHandler<EditorEventMap[K]>
    ): void {
      const typeHandlers: Set<EventHandler<EditorEventMap[K]>> = handlers[type];
      typeHandlers.delete(handler);
    },

    emit<K extends keyof EditorEventMap>(type: K, event: EditorEventMap[K]): void {
      const typeHandlers: Set<EventHandler<EditorEventMap[K]>> = handlers[type];
      for (const handler of [...typeHandlers]) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    listenerCount: (type: keyof EditorEventMap) => handlers[type].size,

    removeAllListeners(): void {
      for (const set of Object.values(handlers)) set.clear();
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

export function createContentChangeEvent(delta: EditDelta): ContentChangeEvent {
  return Object.freeze({
    type: 'content-change' as const,
    timestamp: Date.now(),
    delta,
  });
}

export function createSelectionChangeEvent(
  previous: SelectionState,
  selection: SelectionState
): SelectionChangeEvent {
  return Object.freeze({
    type: 'selection-change' as const,
    timestamp: Date.now(),
    previous,
    selection,
  });
}

export function createHistoryChangeEvent(
  direction: 'undo' | 'redo',
  selection: SelectionState
): HistoryChangeEvent {
  return Object.freeze({
    type: 'history-change' as const,
    timestamp: Date.now(),
    direction,
    selection,
  });
}

export function createStyleChangeEvent(range: ByteRange | null): StyleChangeEvent {
  return Object.freeze({
    type: 'style-change' as const,
    timestamp: Date.now(),
    range,
  });
}
