/**
 * ImageBackend - the imaging library seen by the pipeline
 *
 * The pipeline never imports an imaging library directly; a backend is
 * injected at startup so tests can substitute an in-memory one.
 */

import type { FitPlan, OutputFormat, Raster, Size } from '../types/collage.types';

export interface EncodeOptions {
  format: OutputFormat;
  /** Quality for lossy formats (1-100) */
  quality: number;
}

export interface ImageBackend {
  /** Name used in log messages */
  readonly name: string;

  /**
   * Read the pixel size of an image file (first frame for animations)
   */
  readSize(filePath: string): Promise<Size>;

  /**
   * Decode a file and apply a fit plan
   *
   * The result is opaque 3-channel RGB: alpha and palettes are dropped,
   * not blended.
   */
  render(filePath: string, plan: FitPlan): Promise<Raster>;

  /**
   * Encode an RGB raster into the bytes of an image file
   */
  encode(raster: Raster, options: EncodeOptions): Promise<Uint8Array>;
}
