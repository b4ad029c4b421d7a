import type { Color } from '../geometry/Vector3.js';
import type { TextureSampler } from './types.js';

import { Vector3 } from '../geometry/Vector3.js';
import { ValidationError } from '../utils/errorTypes.js';

/**
 * Nearest-texel lookup into pre-decoded linear RGB pixels (row-major, top row first).
 *
 * Addressing wraps on the fractional part of u; rows are addressed by
 * frac(1 - v), so v = 0 wraps to the top row. Decoding image files is the caller's business.
 */
export class ImageTexture implements TextureSampler {
  readonly width: number;
  readonly height: number;
  private readonly pixels: readonly Color[];

  constructor(width: number, height: number, pixels: readonly Color[]) {
    if (!Number.isInteger(width) || width < 1) {
      throw ValidationError.outOfRange('width', { min: 1, value: width });
    }
    if (!Number.isInteger(height) || height < 1) {
      throw ValidationError.outOfRange('height', { min: 1, value: height });
    }
    if (pixels.length !== width * height) {
      throw new ValidationError(
        `Expected ${width * height} pixels, got ${pixels.length}`,
        'pixels',
        { width, height, length: pixels.length }
      );
    }
    this.width = width;
    this.height = height;
    this.pixels = Object.freeze([...pixels]);
  }

  /**
   * Build from 8-bit RGB or RGBA bytes.
   */
  static fromBytes(width: number, height: number, bytes: ArrayLike<number>, channels: 3 | 4 = 4): ImageTexture {
    const pixels: Color[] = [];
    for (let i = 0; i + channels <= bytes.length; i += channels) {
      pixels.push(new Vector3(bytes[i] / 255, bytes[i + 1] / 255, bytes[i + 2] / 255));
    }
    return new ImageTexture(width, height, pixels);
  }

  /**
   * Two-tone grey checkerboard, used as a placeholder when no image is loaded.
   */
  static checker(width: number, height: number, cellSize: number = 16): ImageTexture {
    const light = new Vector3(200 / 255, 200 / 255, 200 / 255);
    const dark = new Vector3(100 / 255, 100 / 255, 100 / 255);
    const pixels: Color[] = [];
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const cell = Math.floor(x / cellSize) + Math.floor(y / cellSize);
        pixels.push(cell % 2 === 0 ? light : dark);
      }
    }
    return new ImageTexture(width, height, pixels);
  }

  sample(u: number, v: number): Color {
    const wrappedU = Math.abs(u % 1);
    const wrappedV = Math.abs((1 - v) % 1);

    const x = Math.min(Math.floor(wrappedU * (this.width - 1)), this.width - 1);
    const y = Math.min(Math.floor(wrappedV * (this.height - 1)), this.height - 1);

    return this.pixels[y * this.width + x];
  }
}
