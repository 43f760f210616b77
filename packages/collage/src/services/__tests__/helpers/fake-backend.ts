/**
 * In-memory ImageBackend for pipeline tests
 *
 * Files are looked up by base name. Every rendered image is a solid color
 * of the planned output size, and encoding records the raster instead of
 * compressing it.
 */

import * as path from 'node:path';
import type { RgbColor } from '@collage/utils';
import type { EncodeOptions, ImageBackend } from '../../../backends/image-backend';
import type { FitPlan, Raster, Size } from '../../../types/collage.types';

export interface FakeImage {
  width: number;
  height: number;
  color: RgbColor;
  /** Fail decoding with this message */
  corrupt?: string;
}

export class FakeImageBackend implements ImageBackend {
  readonly name = 'fake';
  readonly reads: string[] = [];
  readonly encoded: Array<{ raster: Raster; options: EncodeOptions }> = [];
  encodeFailure: string | null = null;

  constructor(private readonly images: Record<string, FakeImage> = {}) {}

  async readSize(filePath: string): Promise<Size> {
    this.reads.push(path.basename(filePath));
    const image = this.lookup(filePath);
    return { width: image.width, height: image.height };
  }

  async render(filePath: string, plan: FitPlan): Promise<Raster> {
    const { color } = this.lookup(filePath);
    const { width, height } = plan.output;
    const data = new Uint8Array(width * height * 3);
    for (let i = 0; i < data.length; i += 3) {
      data[i] = color.r;
      data[i + 1] = color.g;
      data[i + 2] = color.b;
    }
    return { width, height, channels: 3, data };
  }

  async encode(raster: Raster, options: EncodeOptions): Promise<Uint8Array> {
    if (this.encodeFailure) {
      throw new Error(this.encodeFailure);
    }
    this.encoded.push({ raster, options });
    return new TextEncoder().encode(`${options.format}:${raster.width}x${raster.height}`);
  }

  private lookup(filePath: string): FakeImage {
    const name = path.basename(filePath);
    const image = this.images[name];
    if (!image) {
      throw new Error(`unknown image ${name}`);
    }
    if (image.corrupt) {
      throw new Error(image.corrupt);
    }
    return image;
  }
}
