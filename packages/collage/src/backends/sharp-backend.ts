/**
 * SharpImageBackend - ImageBackend on top of sharp (libvips)
 */

import sharp from 'sharp';
import type { FitPlan, Raster, Size } from '../types/collage.types';
import type { EncodeOptions, ImageBackend } from './image-backend';

const RGB_CHANNELS = 3;

export class SharpImageBackend implements ImageBackend {
  readonly name = 'sharp';

  async readSize(filePath: string): Promise<Size> {
    const metadata = await sharp(filePath).metadata();
    const width = metadata.width;
    // Multi-page inputs (animated GIF/WebP) report one frame's height as pageHeight
    const height = metadata.pageHeight ?? metadata.height;

    if (!width || !height) {
      throw new Error(`Missing dimensions in ${metadata.format ?? 'unknown'} image`);
    }
    return { width, height };
  }

  async render(filePath: string, plan: FitPlan): Promise<Raster> {
    let image = sharp(filePath, { failOn: 'error' }).removeAlpha().toColourspace('srgb');

    if (plan.resize) {
      image = image.resize(plan.resize.width, plan.resize.height, {
        fit: 'fill',
        kernel: sharp.kernel.lanczos3,
      });
    }
    if (plan.crop) {
      image = image.extract(plan.crop);
    }

    const { data, info } = await image.raw({ depth: 'uchar' }).toBuffer({ resolveWithObject: true });

    if (info.channels !== RGB_CHANNELS) {
      throw new Error(`Expected ${RGB_CHANNELS} channels, got ${info.channels}`);
    }
    if (info.width !== plan.output.width || info.height !== plan.output.height) {
      throw new Error(
        `Expected ${plan.output.width}x${plan.output.height}, got ${info.width}x${info.height}`
      );
    }

    return { width: info.width, height: info.height, channels: RGB_CHANNELS, data };
  }

  async encode(raster: Raster, options: EncodeOptions): Promise<Uint8Array> {
    const image = sharp(raster.data, {
      raw: { width: raster.width, height: raster.height, channels: raster.channels },
    });

    switch (options.format) {
      case 'jpeg':
        image.jpeg({ quality: options.quality });
        break;
      case 'png':
        image.png();
        break;
      case 'webp':
        image.webp({ quality: options.quality });
        break;
      case 'tiff':
        image.tiff({ quality: options.quality });
        break;
    }

    return image.toBuffer();
  }
}
