/**
 * High-quality sixel encoder.
 *
 * The palette comes from a median cut over sampled pixels; pixels map to it
 * through a principal-axis ordered search and are Floyd-Steinberg dithered.
 * Dithering runs in bands aligned to both sixel rows and text cells, and
 * error never crosses a band edge, so bands are independent units of work.
 * `encode` runs them in order; `encodeAsync` hands them to a pool of
 * cooperative workers. Both give the same bytes.
 */

import { setImmediate as yieldToLoop } from 'timers/promises';
import { blue, green, red, type RgbImage } from './image.js';
import { medianCutPalette, PcaColorMatcher, PALETTE_SAMPLE_TARGET, samplePixels } from './sixel-color.js';
import {
  DEFAULT_CELL_SIZE,
  resolvePaletteSize,
  TRANSPARENT_INDEX,
  writeSixelBody,
  type SixelEncodeOptions,
  type SixelEncoder,
} from './sixel-encoder.js';

export interface HqSixelEncoderSettings {
  /** Workers used by encodeAsync. */
  concurrency?: number;
  /** Approximate number of pixels sampled for the palette. */
  sampleTarget?: number;
  /** Disable error diffusion (nearest color only). */
  dither?: boolean;
}

export interface BandRange {
  top: number;
  bottom: number;
}

const DEFAULT_CONCURRENCY = 4;

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

/** Band height: the least common multiple of the sixel row (6) and the cell height. */
export function ditherBandHeight(cellHeight: number): number {
  const h = Math.max(1, Math.floor(cellHeight));
  return (6 * h) / gcd(6, h);
}

export function splitBands(height: number, bandHeight: number): BandRange[] {
  const bands: BandRange[] = [];
  for (let top = 0; top < height; top += bandHeight) {
    bands.push({ top, bottom: Math.min(height, top + bandHeight) });
  }
  return bands;
}

function clampByte(value: number): number {
  return value < 0 ? 0 : value > 255 ? 255 : value;
}

/** Working state of one encode call. Nothing here outlives the call. */
class HqEncodeJob {
  readonly palette: number[];
  readonly indices: Int32Array;
  readonly bands: BandRange[];

  constructor(
    readonly image: RgbImage,
    options: SixelEncodeOptions,
    private readonly settings: Readonly<HqSixelEncoderSettings>,
  ) {
    const size = resolvePaletteSize(options.paletteSize);
    const samples = samplePixels(image, settings.sampleTarget ?? PALETTE_SAMPLE_TARGET);
    this.palette = medianCutPalette(samples, size);
    this.indices = new Int32Array(image.width * image.height).fill(TRANSPARENT_INDEX);
    const cell = options.cellSize ?? DEFAULT_CELL_SIZE;
    this.bands = splitBands(image.height, ditherBandHeight(cell.height));
  }

  /** Map one band; each caller brings its own matcher. */
  runBand(band: BandRange, matcher: PcaColorMatcher): void {
    const { image, palette, indices } = this;
    const width = image.width;
    const rows = band.bottom - band.top;
    const work = new Int16Array(width * rows * 3);
    for (let y = 0; y < rows; y += 1) {
      for (let x = 0; x < width; x += 1) {
        const rgb = image.get(x, band.top + y);
        const w = (y * width + x) * 3;
        work[w] = red(rgb);
        work[w + 1] = green(rgb);
        work[w + 2] = blue(rgb);
      }
    }

    const spread = (x: number, y: number, er: number, eg: number, eb: number, weight: number) => {
      if (x < 0 || x >= width || y >= rows) return;
      const w = (y * width + x) * 3;
      work[w] += Math.trunc((er * weight) / 16);
      work[w + 1] += Math.trunc((eg * weight) / 16);
      work[w + 2] += Math.trunc((eb * weight) / 16);
    };

    for (let y = 0; y < rows; y += 1) {
      for (let x = 0; x < width; x += 1) {
        if (!image.isOpaque(x, band.top + y)) continue;
        const w = (y * width + x) * 3;
        const r = clampByte(work[w]);
        const g = clampByte(work[w + 1]);
        const b = clampByte(work[w + 2]);
        const index = matcher.nearest((r << 16) | (g << 8) | b);
        indices[(band.top + y) * width + x] = index;
        if (this.settings.dither === false) continue;

        const chosen = palette[index];
        const er = r - red(chosen);
        const eg = g - green(chosen);
        const eb = b - blue(chosen);
        if (er === 0 && eg === 0 && eb === 0) continue;
        spread(x + 1, y, er, eg, eb, 7);
        spread(x - 1, y + 1, er, eg, eb, 3);
        spread(x, y + 1, er, eg, eb, 5);
        spread(x + 1, y + 1, er, eg, eb, 1);
      }
    }
  }

  finish(): string {
    return writeSixelBody(this.image.width, this.image.height, this.palette, this.indices);
  }
}

export class HqSixelEncoder implements SixelEncoder {
  private readonly settings: Readonly<HqSixelEncoderSettings>;

  constructor(settings: HqSixelEncoderSettings = {}) {
    this.settings = Object.freeze({ ...settings });
  }

  encode(image: RgbImage, options: SixelEncodeOptions = {}): string {
    const job = new HqEncodeJob(image, options, this.settings);
    const matcher = new PcaColorMatcher(job.palette);
    for (const band of job.bands) job.runBand(band, matcher);
    return job.finish();
  }

  async encodeAsync(image: RgbImage, options: SixelEncodeOptions = {}): Promise<string> {
    const job = new HqEncodeJob(image, options, this.settings);
    const workers = Math.max(1, Math.min(this.settings.concurrency ?? DEFAULT_CONCURRENCY, job.bands.length));
    let next = 0;

    const worker = async (): Promise<void> => {
      const matcher = new PcaColorMatcher(job.palette);
      while (next < job.bands.length) {
        const band = job.bands[next];
        next += 1;
        job.runBand(band, matcher);
        await yieldToLoop();
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));
    return job.finish();
  }
}
