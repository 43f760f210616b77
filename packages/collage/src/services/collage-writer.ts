/**
 * CollageWriter - encodes the canvas and writes it to disk
 *
 * The whole file is encoded in memory, written to a temporary file beside
 * the target and renamed into place. A failed encode or write leaves no
 * partial file and keeps any earlier file at the target.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { createLogger, type Logger } from '@collage/utils';
import type { ImageBackend } from '../backends/image-backend';
import { WriteError, describeError } from '../domain/collage-error';
import type { OutputFormat, Raster, WriteResult } from '../types/collage.types';

const FORMAT_BY_EXTENSION: Readonly<Record<string, OutputFormat>> = {
  jpg: 'jpeg',
  jpeg: 'jpeg',
  png: 'png',
  webp: 'webp',
  tif: 'tiff',
  tiff: 'tiff',
};

export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'jpeg';

/**
 * Pick the output encoding from a file name
 *
 * Unknown or missing extensions fall back to JPEG.
 *
 * @example
 * ```typescript
 * resolveOutputFormat('collage.PNG'); // 'png'
 * resolveOutputFormat('collage.bmp'); // 'jpeg'
 * ```
 */
export function resolveOutputFormat(filePath: string): OutputFormat {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return Object.prototype.hasOwnProperty.call(FORMAT_BY_EXTENSION, ext)
    ? FORMAT_BY_EXTENSION[ext]
    : DEFAULT_OUTPUT_FORMAT;
}

export interface CollageWriterOptions {
  /** Quality for lossy formats (1-100) */
  quality: number;
  logger?: Logger;
}

export class CollageWriter {
  private readonly logger: Logger;
  private readonly quality: number;

  constructor(
    private readonly backend: ImageBackend,
    options: CollageWriterOptions
  ) {
    this.quality = options.quality;
    this.logger = options.logger ?? createLogger('Writer');
  }

  /**
   * Encode and persist a raster
   *
   * Creates missing parent directories.
   *
   * @throws WriteError on any encode or file system failure
   */
  async write(raster: Raster, outputPath: string): Promise<WriteResult> {
    const target = path.resolve(outputPath);
    const format = resolveOutputFormat(target);

    let bytes: Uint8Array;
    try {
      bytes = await this.backend.encode(raster, { format, quality: this.quality });
    } catch (error) {
      throw WriteError.failed(outputPath, `encoding as ${format} failed: ${describeError(error)}`, error);
    }

    const temporary = `${target}.${process.pid}.tmp`;
    try {
      await this.ensureParentDirectory(target);
      await fs.writeFile(temporary, bytes);
      await fs.rename(temporary, target);
    } catch (error) {
      await this.discard(temporary);
      throw WriteError.failed(outputPath, describeError(error), error);
    }

    this.logger.debug(`Wrote ${bytes.length} bytes of ${format} to ${target}`);
    return { path: target, format, bytes: bytes.length };
  }

  private async discard(temporary: string): Promise<void> {
    try {
      await fs.rm(temporary, { force: true });
    } catch (error) {
      this.logger.warn(`Could not remove ${temporary}: ${describeError(error)}`);
    }
  }

  private async ensureParentDirectory(target: string): Promise<void> {
    const parent = path.dirname(target);
    const created = await fs.mkdir(parent, { recursive: true });
    if (created !== undefined) {
      this.logger.info(`Created directory: ${parent}`);
    }
  }
}
