/**
 * CanvasCompositor - pastes fitted images into their grid cells
 *
 * Owns the canvas for one run. Each image lands in the cell of its scan
 * index, so a skipped image leaves its cell showing the background.
 */

import type { RgbColor } from '@collage/utils';
import { CompositeError, describeError } from '../domain/collage-error';
import type { FittedImage, GridGeometry, PlaceOutcome } from '../types/collage.types';
import { cellOrigin } from './grid-geometry';
import { RasterCanvas } from './raster-canvas';

export class CanvasCompositor {
  readonly canvas: RasterCanvas;
  private placedCount = 0;

  constructor(
    readonly geometry: GridGeometry,
    background: RgbColor
  ) {
    this.canvas = new RasterCanvas(geometry.canvasWidth, geometry.canvasHeight, background);
  }

  get placed(): number {
    return this.placedCount;
  }

  /**
   * Paste an image at the cell of its scan index
   *
   * @returns A failed outcome with a CompositeError instead of throwing
   */
  place(image: FittedImage): PlaceOutcome {
    const { index, name } = image.ref;
    const cellCount = this.geometry.columns * this.geometry.rows;
    if (index < 0 || index >= cellCount) {
      return {
        ok: false,
        error: CompositeError.failed(name, `index ${index} is outside a grid of ${cellCount} cells`),
      };
    }

    const { left, top } = cellOrigin(index, this.geometry);
    try {
      this.canvas.paste(image, left, top);
    } catch (error) {
      return { ok: false, error: CompositeError.failed(name, describeError(error), error) };
    }

    this.placedCount++;
    return { ok: true };
  }
}
