/**
 * Packed 24-bit RGB bitmap shared by the sixel codec and the glyph
 * downsampler.
 */

export class RgbImage {
  readonly width: number;
  readonly height: number;
  /** Row-major `0xRRGGBB` values. */
  readonly pixels: Uint32Array;
  /** Per-pixel opacity (0 transparent, 1 opaque); absent means fully opaque. */
  readonly opacity?: Uint8Array;

  constructor(width: number, height: number, pixels?: Uint32Array, opacity?: Uint8Array) {
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
      throw new RangeError(`invalid image size ${width}x${height}`);
    }
    const size = width * height;
    if (pixels && pixels.length !== size) {
      throw new RangeError(`pixel buffer holds ${pixels.length} values, expected ${size}`);
    }
    if (opacity && opacity.length !== size) {
      throw new RangeError(`opacity mask holds ${opacity.length} values, expected ${size}`);
    }
    this.width = width;
    this.height = height;
    this.pixels = pixels ?? new Uint32Array(size);
    if (opacity) this.opacity = opacity;
  }

  static filled(width: number, height: number, rgb: number): RgbImage {
    const image = new RgbImage(width, height);
    image.pixels.fill(rgb & 0xffffff);
    return image;
  }

  get(x: number, y: number): number {
    return this.pixels[y * this.width + x];
  }

  set(x: number, y: number, rgb: number): void {
    this.pixels[y * this.width + x] = rgb & 0xffffff;
  }

  isOpaque(x: number, y: number): boolean {
    return this.opacity === undefined || this.opacity[y * this.width + x] !== 0;
  }
}

export function red(rgb: number): number {
  return (rgb >>> 16) & 0xff;
}

export function green(rgb: number): number {
  return (rgb >>> 8) & 0xff;
}

export function blue(rgb: number): number {
  return rgb & 0xff;
}

/** Euclidean distance between two colors in 8-bit RGB space. */
export function colorDistance(a: number, b: number): number {
  const dr = red(a) - red(b);
  const dg = green(a) - green(b);
  const db = blue(a) - blue(b);
  return Math.sqrt(dr * dr + dg * dg + db * db);
}
