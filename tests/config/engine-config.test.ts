import { describe, expect, it } from 'vitest';
import {
  clampNumber,
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  parseGlyphSetName,
  parseSixelEncoderKind,
} from '../../src/config/engine-config.js';

describe('loadEngineConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadEngineConfig({})).toEqual({
      cols: 80,
      rows: 24,
      scrollback: 2000,
      sixelPaletteSize: 256,
      sixelEncoder: 'hq',
      glyphSet: 'halves',
      cellWidthPx: 10,
      cellHeightPx: 20,
      debug: false,
    });
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('reads every key', () => {
    expect(
      loadEngineConfig({
        VTSCOPE_COLS: '132',
        VTSCOPE_ROWS: '50',
        VTSCOPE_SCROLLBACK: '0',
        VTSCOPE_SIXEL_PALETTE_SIZE: '16',
        VTSCOPE_SIXEL_ENCODER: 'simple',
        VTSCOPE_GLYPH_SET: 'Sextants',
        VTSCOPE_CELL_WIDTH: '8',
        VTSCOPE_CELL_HEIGHT: '16',
        VTSCOPE_DEBUG: 'true',
      }),
    ).toEqual({
      cols: 132,
      rows: 50,
      scrollback: 0,
      sixelPaletteSize: 16,
      sixelEncoder: 'simple',
      glyphSet: 'sextants',
      cellWidthPx: 8,
      cellHeightPx: 16,
      debug: true,
    });
  });

  it('clamps numbers and ignores values it does not know', () => {
    const config = loadEngineConfig({
      VTSCOPE_COLS: '5000',
      VTSCOPE_ROWS: '0',
      VTSCOPE_SIXEL_PALETTE_SIZE: 'lots',
      VTSCOPE_SIXEL_ENCODER: 'fast',
      VTSCOPE_GLYPH_SET: 'octants',
      VTSCOPE_DEBUG: 'yes',
    });
    expect(config.cols).toBe(1000);
    expect(config.rows).toBe(1);
    expect(config.sixelPaletteSize).toBe(256);
    expect(config.sixelEncoder).toBe('hq');
    expect(config.glyphSet).toBe('halves');
    expect(config.debug).toBe(false);
  });
});

describe('value parsers', () => {
  it('clamps and floors numbers', () => {
    expect(clampNumber('12.9', 0, 100, 5)).toBe(12);
    expect(clampNumber(-3, 0, 100, 5)).toBe(0);
    expect(clampNumber('  ', 0, 100, 5)).toBe(5);
    expect(clampNumber(undefined, 0, 100, 5)).toBe(5);
    expect(clampNumber('Infinity', 0, 100, 5)).toBe(5);
  });

  it('accepts only known encoder and glyph set names', () => {
    expect(parseSixelEncoderKind('simple')).toBe('simple');
    expect(parseSixelEncoderKind('HQ')).toBeUndefined();
    expect(parseGlyphSetName('6DOT')).toBe('6dot');
    expect(parseGlyphSetName(3)).toBeUndefined();
  });
});
