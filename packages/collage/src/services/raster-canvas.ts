/**
 * RasterCanvas - mutable RGB pixel buffer
 */

import type { RgbColor } from '@collage/utils';
import type { Raster } from '../types/collage.types';

const CHANNELS = 3;

export class RasterCanvas implements Raster {
  readonly channels = CHANNELS;
  readonly data: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number,
    readonly background: RgbColor
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Invalid canvas size ${width}x${height}`);
    }

    this.data = new Uint8Array(width * height * CHANNELS);
    const { r, g, b } = background;
    for (let i = 0; i < this.data.length; i += CHANNELS) {
      this.data[i] = r;
      this.data[i + 1] = g;
      this.data[i + 2] = b;
    }
  }

  /**
   * Copy a raster onto the canvas with its top-left corner at (left, top)
   *
   * Parts falling outside the canvas are clipped.
   *
   * @throws RangeError when the raster's buffer does not match its size
   */
  paste(raster: Raster, left: number, top: number): void {
    const rowBytes = raster.width * CHANNELS;
    if (raster.channels !== CHANNELS || raster.data.length !== rowBytes * raster.height) {
      throw new RangeError(
        `Raster buffer holds ${raster.data.length} bytes, expected ${rowBytes * raster.height} for ` +
          `${raster.width}x${raster.height} RGB`
      );
    }

    const x0 = Math.max(0, left);
    const y0 = Math.max(0, top);
    const x1 = Math.min(this.width, left + raster.width);
    const y1 = Math.min(this.height, top + raster.height);
    if (x1 <= x0 || y1 <= y0) {
      return;
    }

    const spanBytes = (x1 - x0) * CHANNELS;
    for (let y = y0; y < y1; y++) {
      const srcStart = ((y - top) * raster.width + (x0 - left)) * CHANNELS;
      const dstStart = (y * this.width + x0) * CHANNELS;
      this.data.set(raster.data.subarray(srcStart, srcStart + spanBytes), dstStart);
    }
  }

  pixelAt(x: number, y: number): RgbColor {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside ${this.width}x${this.height}`);
    }
    const offset = (y * this.width + x) * CHANNELS;
    return { r: this.data[offset], g: this.data[offset + 1], b: this.data[offset + 2] };
  }
}
