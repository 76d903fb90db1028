/**
 * Palette construction and nearest-color lookup for the sixel encoders.
 */

import { rgbCovariance, symmetricEigen3, type Vector3 } from './eigen.js';
import { blue, green, red, type RgbImage } from './image.js';

/** Target number of sampled pixels when building a palette. */
export const PALETTE_SAMPLE_TARGET = 65_536;

/** Channel distance under which a sample counts as black or white. */
const PIN_THRESHOLD = 8;

export function squaredDistance(a: number, b: number): number {
  const dr = red(a) - red(b);
  const dg = green(a) - green(b);
  const db = blue(a) - blue(b);
  return dr * dr + dg * dg + db * db;
}

/** Opaque pixels on a regular grid, about PALETTE_SAMPLE_TARGET of them. */
export function samplePixels(image: RgbImage, target = PALETTE_SAMPLE_TARGET): number[] {
  const stride = Math.max(1, Math.floor(Math.sqrt((image.width * image.height) / target)));
  const samples: number[] = [];
  for (let y = 0; y < image.height; y += stride) {
    for (let x = 0; x < image.width; x += stride) {
      if (image.isOpaque(x, y)) samples.push(image.get(x, y));
    }
  }
  return samples;
}

type Channel = 0 | 1 | 2;

function channelOf(rgb: number, channel: Channel): number {
  if (channel === 0) return red(rgb);
  if (channel === 1) return green(rgb);
  return blue(rgb);
}

class ColorBox {
  readonly widest: Channel;
  readonly range: number;

  constructor(readonly colors: number[]) {
    const min = [255, 255, 255];
    const max = [0, 0, 0];
    for (const rgb of colors) {
      const rgbChannels = [red(rgb), green(rgb), blue(rgb)];
      for (let k = 0; k < 3; k += 1) {
        if (rgbChannels[k] < min[k]) min[k] = rgbChannels[k];
        if (rgbChannels[k] > max[k]) max[k] = rgbChannels[k];
      }
    }
    const ranges = [max[0] - min[0], max[1] - min[1], max[2] - min[2]];
    let widest: Channel = 0;
    if (ranges[1] > ranges[widest]) widest = 1;
    if (ranges[2] > ranges[widest]) widest = 2;
    this.widest = widest;
    this.range = colors.length === 0 ? 0 : ranges[widest];
  }

  /** Split at the median of the widest channel; both halves are non-empty. */
  split(): [ColorBox, ColorBox] {
    const channel = this.widest;
    const sorted = [...this.colors].sort((a, b) => channelOf(a, channel) - channelOf(b, channel) || a - b);
    let cut = Math.floor(sorted.length / 2);
    const at = (i: number) => channelOf(sorted[i], channel);
    while (cut < sorted.length && at(cut) === at(cut - 1)) cut += 1;
    if (cut === sorted.length) {
      cut = Math.floor(sorted.length / 2);
      while (cut > 1 && at(cut) === at(cut - 1)) cut -= 1;
    }
    return [new ColorBox(sorted.slice(0, cut)), new ColorBox(sorted.slice(cut))];
  }

  average(): number {
    let r = 0;
    let g = 0;
    let b = 0;
    for (const rgb of this.colors) {
      r += red(rgb);
      g += green(rgb);
      b += blue(rgb);
    }
    const n = this.colors.length;
    return (Math.round(r / n) << 16) | (Math.round(g / n) << 8) | Math.round(b / n);
  }
}

/**
 * Median-cut palette of at most `size` colors. Pure black and pure white are
 * added when the samples contain colors within PIN_THRESHOLD of them, so
 * text and line art keep their extremes.
 */
export function medianCutPalette(samples: readonly number[], size: number): number[] {
  if (samples.length === 0) return [0];

  const pinned: number[] = [];
  if (size > 2) {
    if (samples.some((rgb) => Math.max(red(rgb), green(rgb), blue(rgb)) < PIN_THRESHOLD)) pinned.push(0x000000);
    if (samples.some((rgb) => Math.min(red(rgb), green(rgb), blue(rgb)) > 255 - PIN_THRESHOLD)) pinned.push(0xffffff);
  }

  const target = Math.max(1, size - pinned.length);
  let boxes = [new ColorBox([...samples])];
  while (boxes.length < target) {
    let pick = -1;
    for (let i = 0; i < boxes.length; i += 1) {
      const box = boxes[i];
      if (box.range === 0 || box.colors.length < 2) continue;
      if (pick < 0 || box.range * box.colors.length > boxes[pick].range * boxes[pick].colors.length) pick = i;
    }
    if (pick < 0) break;
    const [low, high] = boxes[pick].split();
    boxes = [...boxes.slice(0, pick), low, high, ...boxes.slice(pick + 1)];
  }

  const palette = [...pinned];
  for (const box of boxes) {
    const rgb = box.average();
    if (!palette.includes(rgb)) palette.push(rgb);
  }
  return palette.slice(0, size);
}

/**
 * Fixed palette for the single-pass encoder: a uniform color cube with as
 * many levels as fit in `size`, or a gray ramp when fewer than eight
 * registers are available.
 */
export class UniformPalette {
  readonly colors: number[] = [];
  private readonly levels: number;
  private readonly gray: boolean;

  constructor(size: number) {
    this.gray = size < 8;
    if (this.gray) {
      this.levels = Math.max(2, size);
      for (let i = 0; i < this.levels; i += 1) {
        const v = this.step(i);
        this.colors.push((v << 16) | (v << 8) | v);
      }
      return;
    }
    let levels = Math.floor(Math.cbrt(size));
    while (levels * levels * levels > size) levels -= 1;
    this.levels = levels;
    for (let r = 0; r < levels; r += 1) {
      for (let g = 0; g < levels; g += 1) {
        for (let b = 0; b < levels; b += 1) {
          this.colors.push((this.step(r) << 16) | (this.step(g) << 8) | this.step(b));
        }
      }
    }
  }

  private step(level: number): number {
    return Math.round((level * 255) / (this.levels - 1));
  }

  private level(channel: number): number {
    return Math.round((channel * (this.levels - 1)) / 255);
  }

  indexOf(rgb: number): number {
    if (this.gray) {
      const luma = (red(rgb) * 299 + green(rgb) * 587 + blue(rgb) * 114) / 1000;
      return this.level(luma);
    }
    return (this.level(red(rgb)) * this.levels + this.level(green(rgb))) * this.levels + this.level(blue(rgb));
  }
}

const CACHE_LIMIT = 4096;

/**
 * Nearest-color search ordered along the palette's principal axis. The
 * projection onto a unit axis never exceeds the true distance, so the scan
 * stops once the projected gap alone is worse than the best match.
 * Instances are per encode call; the cache is not shared.
 */
export class PcaColorMatcher {
  private readonly order: number[];
  private readonly keys: number[];
  private readonly axis: Vector3;
  private readonly mean: Vector3;
  private readonly cache = new Map<number, number>();

  constructor(readonly palette: readonly number[]) {
    const { mean, covariance } = rgbCovariance(palette);
    const [principal] = symmetricEigen3(covariance);
    this.mean = mean;
    this.axis = principal.vector;
    const projected = palette.map((rgb, index) => ({ index, key: this.project(rgb) }));
    projected.sort((a, b) => a.key - b.key || a.index - b.index);
    this.order = projected.map((entry) => entry.index);
    this.keys = projected.map((entry) => entry.key);
  }

  private project(rgb: number): number {
    return (
      (red(rgb) - this.mean[0]) * this.axis[0] +
      (green(rgb) - this.mean[1]) * this.axis[1] +
      (blue(rgb) - this.mean[2]) * this.axis[2]
    );
  }

  nearest(rgb: number): number {
    const cached = this.cache.get(rgb);
    if (cached !== undefined) return cached;

    const key = this.project(rgb);
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.keys[mid] < key) lo = mid + 1;
      else hi = mid;
    }

    let best = -1;
    let bestDistance = Infinity;
    const consider = (pos: number) => {
      const index = this.order[pos];
      const distance = squaredDistance(rgb, this.palette[index]);
      if (distance < bestDistance || (distance === bestDistance && index < best)) {
        best = index;
        bestDistance = distance;
      }
    };

    let up = lo;
    let down = lo - 1;
    while (up < this.keys.length || down >= 0) {
      const upGap = up < this.keys.length ? this.keys[up] - key : Infinity;
      const downGap = down >= 0 ? key - this.keys[down] : Infinity;
      if (upGap <= downGap) {
        if (upGap * upGap > bestDistance) break;
        consider(up);
        up += 1;
      } else {
        if (downGap * downGap > bestDistance) break;
        consider(down);
        down -= 1;
      }
    }

    if (this.cache.size >= CACHE_LIMIT) this.cache.clear();
    this.cache.set(rgb, best);
    return best;
  }
}
