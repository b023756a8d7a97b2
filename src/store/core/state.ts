/**
 * Editor configuration defaults, validation and selection factories.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type { EditorConfig, RenderConfig, SelectionState } from '../../types/state.ts';
import { byteOffset } from '../../types/branded.ts';
import { DEFAULT_FLAT_THRESHOLD } from './text-store.ts';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: EditorConfig = Object.freeze({
  content: '',
  expectedSize: null,
  flatThreshold: DEFAULT_FLAT_THRESHOLD,
  undoLimit: 1000,
  coalesceTimeout: 0,
  expandTabs: false,
  wrapMode: 'none',
  viewportWidth: 80,
  tabWidth: 8,
  showControl: false,
  showWrap: false,
});

export interface ConfigValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

const WRAP_MODES: readonly string[] = ['none', 'hard', 'word'];

function checkNumber(
  errors: string[],
  name: string,
  value: number | null | undefined,
  min: number
): void {
  if (value === undefined || value === null) return;
  if (!Number.isFinite(value) || value < min) {
    errors.push(`${name} must be a finite number >= ${min}, got ${value}`);
  }
}

/**
 * Validate a partial configuration with detailed error messages.
 */
export function validateConfig(config: Partial<EditorConfig>): ConfigValidationResult {
  const errors: string[] = [];
  checkNumber(errors, 'tabWidth', config.tabWidth, 1);
  checkNumber(errors, 'viewportWidth', config.viewportWidth, 1);
  checkNumber(errors, 'undoLimit', config.undoLimit, 0);
  checkNumber(errors, 'coalesceTimeout', config.coalesceTimeout, 0);
  checkNumber(errors, 'expectedSize', config.expectedSize, 0);
  checkNumber(errors, 'flatThreshold', config.flatThreshold, 0);
  if (config.wrapMode !== undefined && !WRAP_MODES.includes(config.wrapMode)) {
    errors.push(`wrapMode must be one of ${WRAP_MODES.join(', ')}, got ${String(config.wrapMode)}`);
  }
  if (config.expandTabs !== undefined && typeof config.expandTabs !== 'boolean') {
    errors.push(`expandTabs must be a boolean, got ${String(config.expandTabs)}`);
  }
  if (config.content !== undefined && typeof config.content !== 'string') {
    errors.push('content must be a string');
  }
  return { valid: errors.length === 0, errors };
}

/**
 * Merge `config` over the defaults.
 * @throws RangeError when the configuration is invalid
 */
export function resolveConfig(config: Partial<EditorConfig> = {}): EditorConfig {
  const result = validateConfig(config);
  if (!result.valid) {
    throw new RangeError(`Invalid editor configuration: ${result.errors.join('; ')}`);
  }
  return Object.freeze({ ...DEFAULT_CONFIG, ...config });
}

/**
 * The render-relevant part of a configuration.
 */
export function renderConfigOf(config: RenderConfig): RenderConfig {
  return Object.freeze({
    wrapMode: config.wrapMode,
    viewportWidth: config.viewportWidth,
    tabWidth: config.tabWidth,
    showControl: config.showControl,
    showWrap: config.showWrap,
  });
}

// =============================================================================
// Selection
// =============================================================================

export function createSelection(anchor: ByteOffset, head: ByteOffset = anchor): SelectionState {
  return Object.freeze({ anchor, head });
}

export function createInitialSelection(): SelectionState {
  return createSelection(byteOffset(0));
}

export function isCollapsed(selection: SelectionState): boolean {
  return selection.anchor === selection.head;
}

/**
 * Ordered byte bounds of a selection.
 */
export function selectionBounds(selection: SelectionState): { start: ByteOffset; end: ByteOffset } {
  return selection.anchor <= selection.head
    ? { start: selection.anchor, end: selection.head }
    : { start: selection.head, end: selection.anchor };
}
