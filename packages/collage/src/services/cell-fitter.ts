/**
 * CellFitter - turns one source image into one cell-sized raster
 *
 * Failures never escape: a file that cannot be read, decoded or resized
 * becomes a failed FitOutcome carrying a DecodeError, so the batch loop
 * can skip it and continue.
 */

import { createLogger, type Logger } from '@collage/utils';
import type { ImageBackend } from '../backends/image-backend';
import { DecodeError, describeError } from '../domain/collage-error';
import type { FitOutcome, ImageRef, Size } from '../types/collage.types';
import { computeFitPlan } from './fit-plan';

export class CellFitter {
  private readonly logger: Logger;

  constructor(
    private readonly backend: ImageBackend,
    private readonly cell: Size,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('CellFitter');
  }

  /**
   * Fit a source image into the cell
   *
   * @param ref - Source image
   * @returns The fitted image, or the DecodeError that prevented it
   */
  async fit(ref: ImageRef): Promise<FitOutcome> {
    try {
      const source = await this.backend.readSize(ref.path);
      const plan = computeFitPlan(source, this.cell);
      this.logger.debug(
        `${ref.name}: ${source.width}x${source.height} -> ${plan.output.width}x${plan.output.height}`,
        plan.resize ? 'resized' : 'not resized',
        plan.crop ? 'cropped' : 'not cropped'
      );

      const raster = await this.backend.render(ref.path, plan);
      return { ok: true, image: { ...raster, ref } };
    } catch (error) {
      return {
        ok: false,
        ref,
        error: DecodeError.failed(ref.name, describeError(error), error),
      };
    }
  }
}
