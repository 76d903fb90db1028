/**
 * Environment-driven engine configuration.
 *
 * Every key is optional; unknown or out-of-range values fall back to the
 * default (numbers are clamped). Constructor options override whatever
 * this returns.
 */

export type SixelEncoderKind = 'hq' | 'simple';

export type GlyphSetName = 'solid' | 'halves' | 'quadrants' | 'sextants' | '6dot' | '6dotsolid';

export interface EngineConfig {
  cols: number;
  rows: number;
  scrollback: number;
  sixelPaletteSize: number;
  sixelEncoder: SixelEncoderKind;
  glyphSet: GlyphSetName;
  cellWidthPx: number;
  cellHeightPx: number;
  debug: boolean;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
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

export const GLYPH_SET_NAMES: readonly GlyphSetName[] = ['solid', 'halves', 'quadrants', 'sextants', '6dot', '6dotsolid'];

export function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  if (!Number.isFinite(parsed)) return fallback;
  return Math.max(min, Math.min(max, Math.floor(parsed)));
}

export function parseSixelEncoderKind(value: unknown): SixelEncoderKind | undefined {
  if (value === 'hq' || value === 'simple') return value;
  return undefined;
}

export function parseGlyphSetName(value: unknown): GlyphSetName | undefined {
  if (typeof value !== 'string') return undefined;
  const lowered = value.toLowerCase();
  return GLYPH_SET_NAMES.find((name) => name === lowered);
}

function parseFlag(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  return {
    cols: clampNumber(env.VTSCOPE_COLS, 2, 1000, d.cols),
    rows: clampNumber(env.VTSCOPE_ROWS, 1, 500, d.rows),
    scrollback: clampNumber(env.VTSCOPE_SCROLLBACK, 0, 1_000_000, d.scrollback),
    sixelPaletteSize: clampNumber(env.VTSCOPE_SIXEL_PALETTE_SIZE, 2, 1024, d.sixelPaletteSize),
    sixelEncoder: parseSixelEncoderKind(env.VTSCOPE_SIXEL_ENCODER) ?? d.sixelEncoder,
    glyphSet: parseGlyphSetName(env.VTSCOPE_GLYPH_SET) ?? d.glyphSet,
    cellWidthPx: clampNumber(env.VTSCOPE_CELL_WIDTH, 2, 64, d.cellWidthPx),
    cellHeightPx: clampNumber(env.VTSCOPE_CELL_HEIGHT, 2, 128, d.cellHeightPx),
    debug: parseFlag(env.VTSCOPE_DEBUG),
  };
}
