import { describe, it, expect } from 'vitest';
import { byteOffset } from '../../types/branded.ts';
import {
  DEFAULT_CONFIG,
  createSelection,
  isCollapsed,
  renderConfigOf,
  resolveConfig,
  selectionBounds,
  validateConfig,
} from './state.ts';

describe('validateConfig', () => {
  it('should accept an empty configuration', () => {
    expect(validateConfig({})).toEqual({ valid: true, errors: [] });
  });

  it('should report every bad number', () => {
    const result = validateConfig({ tabWidth: 0, viewportWidth: Number.NaN, undoLimit: -1 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'tabWidth must be a finite number >= 1, got 0',
      'viewportWidth must be a finite number >= 1, got NaN',
      'undoLimit must be a finite number >= 0, got -1',
    ]);
  });

  it('should report a non-boolean expandTabs', () => {
    expect(validateConfig({ expandTabs: false }).valid).toBe(true);
    expect(validateConfig(JSON.parse('{"expandTabs":"yes"}')).errors).toEqual([
      'expandTabs must be a boolean, got yes',
    ]);
  });

  it('should accept a null expected size', () => {
    expect(validateConfig({ expectedSize: null }).valid).toBe(true);
  });
});

describe('resolveConfig', () => {
  it('should merge over the defaults', () => {
    const config = resolveConfig({ tabWidth: 4, wrapMode: 'word' });
    expect(config.tabWidth).toBe(4);
    expect(config.wrapMode).toBe('word');
    expect(config.viewportWidth).toBe(DEFAULT_CONFIG.viewportWidth);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should throw RangeError for invalid values', () => {
    expect(() => resolveConfig({ viewportWidth: 0 })).toThrow(RangeError);
    expect(() => resolveConfig({ viewportWidth: 0 })).toThrow(
      'Invalid editor configuration: viewportWidth must be a finite number >= 1, got 0'
    );
  });

  it('should extract the render settings', () => {
    expect(renderConfigOf(resolveConfig({ showWrap: true }))).toEqual({
      wrapMode: 'none',
      viewportWidth: 80,
      tabWidth: 8,
      showControl: false,
      showWrap: true,
    });
  });
});

describe('Selection', () => {
  it('should order selection bounds', () => {
    const selection = createSelection(byteOffset(7), byteOffset(2));
    expect(selectionBounds(selection)).toEqual({ start: 2, end: 7 });
    expect(isCollapsed(selection)).toBe(false);
    expect(isCollapsed(createSelection(byteOffset(3)))).toBe(true);
  });
});
