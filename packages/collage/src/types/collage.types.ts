/**
 * Collage type definitions
 *
 * Shared by the scanner, fitter, compositor, writer and pipeline:
 * 1. Scan a directory into ImageRefs
 * 2. Fit each image into a fixed-size cell
 * 3. Paste the cells onto one canvas and write it out
 */

import type { RgbColor } from '@collage/utils';
import type { CollageError } from '../domain/collage-error';

/**
 * Extensions recognised as images (lowercase, without the dot)
 */
export const SUPPORTED_EXTENSIONS = ['jpg', 'jpeg', 'png', 'bmp', 'gif', 'webp'] as const;

/**
 * A discovered source image
 */
export interface ImageRef {
  /** Absolute file path; identity of the reference */
  path: string;
  /** Base file name, used in progress and error messages */
  name: string;
  /** 0-based position in scan order */
  index: number;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Interleaved 8-bit RGB pixels, row-major, no row padding
 */
export interface Raster extends Size {
  channels: 3;
  data: Uint8Array;
}

/**
 * A source image resized and cropped for one cell
 *
 * Usually exactly cell-sized; smaller when the source was smaller than
 * the cell (sources are never upscaled or padded).
 */
export interface FittedImage extends Raster {
  ref: ImageRef;
}

/**
 * Rectangle to keep from a resized image
 */
export interface CropBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Resize-then-crop instructions for one source image
 */
export interface FitPlan {
  /** Size of the decoded source */
  source: Size;
  /** Target size of the resize step, or null when no resize is needed */
  resize: Size | null;
  /** Crop applied after the resize, or null when the whole image is kept */
  crop: CropBox | null;
  /** Size of the fitted result */
  output: Size;
}

/**
 * Grid layout of the output canvas
 */
export interface GridGeometry {
  columns: number;
  rows: number;
  cellWidth: number;
  cellHeight: number;
  padding: number;
  canvasWidth: number;
  canvasHeight: number;
}

export interface CellOrigin {
  left: number;
  top: number;
}

/**
 * Output encodings the writer can produce
 */
export type OutputFormat = 'jpeg' | 'png' | 'webp' | 'tiff';

/**
 * User-facing collage options; every field is optional on input
 */
export interface CollageOptions {
  /** Directory scanned for images */
  inputDir: string;
  /** Output file path; its extension selects the format */
  output: string;
  /** Number of grid columns */
  columns: number;
  /** Cell width in pixels */
  cellWidth: number;
  /** Cell height in pixels */
  cellHeight: number;
  /** Gap between adjacent cells in pixels */
  padding: number;
  /** Canvas background as a named, hex or rgb() color */
  background: string;
  /** Quality for lossy output formats (1-100) */
  quality: number;
}

/**
 * Validated options with the background already parsed
 */
export interface CollageConfig extends CollageOptions {
  backgroundColor: RgbColor;
}

export const COLLAGE_DEFAULTS: CollageOptions = {
  inputDir: '.',
  output: 'collage_output.jpg',
  columns: 5,
  cellWidth: 350,
  cellHeight: 600,
  padding: 10,
  background: 'white',
  quality: 95,
};

/**
 * Per-image result of the fit step
 */
export type FitOutcome =
  | { ok: true; image: FittedImage }
  | { ok: false; ref: ImageRef; error: CollageError };

/**
 * Per-image result of the paste step
 */
export type PlaceOutcome = { ok: true } | { ok: false; error: CollageError };

export interface SkippedImage {
  ref: ImageRef;
  /** Error code of the failure (DECODE_FAILED or COMPOSITE_FAILED) */
  code: string;
  reason: string;
}

export interface CollageProgress {
  /** 1-based position of the image being processed */
  index: number;
  total: number;
  ref: ImageRef;
}

export interface WriteResult {
  path: string;
  format: OutputFormat;
  bytes: number;
}

export type CollageRunResult =
  | {
      status: 'empty';
      inputDir: string;
      total: 0;
      placed: 0;
      skipped: [];
      durationMs: number;
    }
  | {
      status: 'written';
      inputDir: string;
      total: number;
      placed: number;
      skipped: SkippedImage[];
      geometry: GridGeometry;
      output: WriteResult;
      durationMs: number;
    };
