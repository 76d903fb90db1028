/**
 * Unicode block-glyph fallback for terminals without bitmap graphics.
 *
 * An image is tiled into text cells; each cell is split into the
 * sub-regions of the selected glyph set and the sub-region averages are
 * partitioned into a foreground and a background cluster. The glyph whose
 * coverage mask matches the foreground cluster is emitted.
 */

import { Chalk } from 'chalk';
import type { GlyphSetName } from '../config/engine-config.js';
import { blue, green, red, type RgbImage } from './image.js';

export type { GlyphSetName } from '../config/engine-config.js';

export interface GlyphCell {
  ch: string;
  fg: number;
  bg: number;
}

export type GlyphGrid = GlyphCell[][];

interface GlyphLayout {
  columns: number;
  rows: number;
  /** Braille sets keep the brighter cluster on the dots. */
  braille: boolean;
  glyph(mask: number): string;
}

const QUADRANTS = ' ▘▝▀▖▌▞▛▗▚▐▜▄▙▟█';

function sextantGlyph(mask: number): string {
  switch (mask) {
    case 0:
      return ' ';
    case 21:
      return '▌';
    case 42:
      return '▐';
    case 63:
      return '█';
    default:
      return String.fromCodePoint(0x1fb00 + mask - 1 - (mask > 21 ? 1 : 0) - (mask > 42 ? 1 : 0));
  }
}

/** Sub-regions are numbered row-major; braille numbers dots down each column. */
function brailleGlyph(mask: number): string {
  let dots = 0;
  for (let row = 0; row < 3; row += 1) {
    if (mask & (1 << (row * 2))) dots |= 1 << row;
    if (mask & (1 << (row * 2 + 1))) dots |= 1 << (row + 3);
  }
  return String.fromCodePoint(0x2800 + dots);
}

const LAYOUTS: Record<GlyphSetName, GlyphLayout> = {
  solid: { columns: 1, rows: 1, braille: false, glyph: () => '█' },
  halves: { columns: 1, rows: 2, braille: false, glyph: (mask) => [' ', '▀', '▄', '█'][mask] },
  quadrants: { columns: 2, rows: 2, braille: false, glyph: (mask) => QUADRANTS[mask] },
  sextants: { columns: 2, rows: 3, braille: false, glyph: sextantGlyph },
  '6dot': { columns: 2, rows: 3, braille: true, glyph: brailleGlyph },
  '6dotsolid': { columns: 2, rows: 3, braille: true, glyph: brailleGlyph },
};

interface Region {
  count: number;
  r: number;
  g: number;
  b: number;
}

function luminance(rgb: number): number {
  return red(rgb) * 299 + green(rgb) * 587 + blue(rgb) * 114;
}

function popcount(mask: number): number {
  let n = 0;
  for (let m = mask; m !== 0; m &= m - 1) n += 1;
  return n;
}

function meanOf(regions: Region[], mask: number, covered: boolean): number | undefined {
  let count = 0;
  let r = 0;
  let g = 0;
  let b = 0;
  regions.forEach((region, i) => {
    const inMask = ((mask >> i) & 1) === 1;
    if (inMask !== covered) return;
    count += region.count;
    r += region.r;
    g += region.g;
    b += region.b;
  });
  if (count === 0) return undefined;
  return (Math.round(r / count) << 16) | (Math.round(g / count) << 8) | Math.round(b / count);
}

function clusterError(regions: Region[], mask: number, fg: number, bg: number): number {
  let error = 0;
  regions.forEach((region, i) => {
    if (region.count === 0) return;
    const target = ((mask >> i) & 1) === 1 ? fg : bg;
    const dr = region.r / region.count - red(target);
    const dg = region.g / region.count - green(target);
    const db = region.b / region.count - blue(target);
    error += region.count * (dr * dr + dg * dg + db * db);
  });
  return error;
}

export class GlyphDownsampler {
  readonly glyphSet: GlyphSetName;
  readonly cellWidth: number;
  readonly cellHeight: number;
  private readonly layout: GlyphLayout;

  constructor(glyphSet: GlyphSetName, cellWidth: number, cellHeight: number) {
    if (!Number.isInteger(cellWidth) || cellWidth < 1 || !Number.isInteger(cellHeight) || cellHeight < 1) {
      throw new RangeError(`invalid glyph cell size ${cellWidth}x${cellHeight}`);
    }
    this.glyphSet = glyphSet;
    this.cellWidth = cellWidth;
    this.cellHeight = cellHeight;
    this.layout = LAYOUTS[glyphSet];
  }

  /** `ceil(h / cellHeight)` rows of `ceil(w / cellWidth)` glyphs. */
  downsample(image: RgbImage): GlyphGrid {
    const cols = Math.ceil(image.width / this.cellWidth);
    const rows = Math.ceil(image.height / this.cellHeight);
    const grid: GlyphGrid = [];
    for (let row = 0; row < rows; row += 1) {
      const line: GlyphCell[] = [];
      for (let col = 0; col < cols; col += 1) {
        line.push(this.cellGlyph(image, col * this.cellWidth, row * this.cellHeight));
      }
      grid.push(line);
    }
    return grid;
  }

  private regions(image: RgbImage, left: number, top: number): Region[] {
    const { columns, rows } = this.layout;
    const regions: Region[] = [];
    for (let ry = 0; ry < rows; ry += 1) {
      const y0 = top + Math.floor((ry * this.cellHeight) / rows);
      const y1 = top + Math.floor(((ry + 1) * this.cellHeight) / rows);
      for (let rx = 0; rx < columns; rx += 1) {
        const x0 = left + Math.floor((rx * this.cellWidth) / columns);
        const x1 = left + Math.floor(((rx + 1) * this.cellWidth) / columns);
        const region: Region = { count: 0, r: 0, g: 0, b: 0 };
        for (let y = y0; y < y1; y += 1) {
          for (let x = x0; x < x1; x += 1) {
            // Cells overhanging the image edge are padded with black.
            if (x >= image.width || y >= image.height) {
              region.count += 1;
              continue;
            }
            if (!image.isOpaque(x, y)) continue;
            const rgb = image.get(x, y);
            region.count += 1;
            region.r += red(rgb);
            region.g += green(rgb);
            region.b += blue(rgb);
          }
        }
        regions.push(region);
      }
    }
    return regions;
  }

  private cellGlyph(image: RgbImage, left: number, top: number): GlyphCell {
    const regions = this.regions(image, left, top);
    if (regions.every((region) => region.count === 0)) return { ch: ' ', fg: 0, bg: 0 };

    const full = (1 << regions.length) - 1;
    let best: { mask: number; fg: number; bg: number; error: number } | undefined;
    for (let mask = 1; mask <= full; mask += 1) {
      if (!this.layout.braille && (mask & 1) === 0) continue;
      const fgMean = meanOf(regions, mask, true);
      if (fgMean === undefined) continue;
      const bg = meanOf(regions, mask, false) ?? fgMean;
      if (this.layout.braille && luminance(fgMean) < luminance(bg)) continue;
      const error = clusterError(regions, mask, fgMean, bg);
      if (
        !best ||
        error < best.error ||
        (error === best.error && popcount(mask) > popcount(best.mask))
      ) {
        best = { mask, fg: fgMean, bg, error };
      }
    }
    if (!best) return { ch: ' ', fg: 0, bg: 0 };

    const ch = this.layout.glyph(best.mask);
    if (this.glyphSet === '6dot') {
      // One color on black: the average of both clusters.
      const avg = (a: number, b: number) => Math.floor((a + b) / 2);
      const fg = (avg(red(best.fg), red(best.bg)) << 16) | (avg(green(best.fg), green(best.bg)) << 8) | avg(blue(best.fg), blue(best.bg));
      return { ch, fg, bg: 0 };
    }
    return { ch, fg: best.fg, bg: best.bg };
  }
}

/** Render a glyph grid as truecolor ANSI text, one line per row. */
export function renderGlyphGridAnsi(grid: GlyphGrid): string {
  const chalk = new Chalk({ level: 3 });
  return grid
    .map((line) =>
      line
        .map((cell) =>
          chalk.rgb(red(cell.fg), green(cell.fg), blue(cell.fg)).bgRgb(red(cell.bg), green(cell.bg), blue(cell.bg))(cell.ch),
        )
        .join(''),
    )
    .join('\n');
}
