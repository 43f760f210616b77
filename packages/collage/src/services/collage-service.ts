/**
 * CollageService - runs the collage pipeline
 *
 * Strictly linear: resolve config -> scan -> fit and paste each image in
 * scan order -> write. Config, scan and write failures are thrown; images
 * that fail to decode or paste are logged, recorded as skipped and left
 * as empty cells.
 */

import { createLogger, formatDimensions, toHexColor, type Logger } from '@collage/utils';
import type { ImageBackend } from '../backends/image-backend';
import { SharpImageBackend } from '../backends/sharp-backend';
import { resolveCollageConfig } from '../config/collage-config';
import type {
  CollageOptions,
  CollageProgress,
  CollageRunResult,
  SkippedImage,
} from '../types/collage.types';
import { CanvasCompositor } from './canvas-compositor';
import { CellFitter } from './cell-fitter';
import { CollageWriter } from './collage-writer';
import { scanDirectory } from './directory-scanner';
import { computeGridGeometry } from './grid-geometry';

export interface CollageServiceOptions {
  /** Imaging implementation; defaults to sharp */
  backend?: ImageBackend;
  logger?: Logger;
  /** Clock used for the run duration */
  now?: () => number;
}

export interface CreateCollageHooks {
  /** Called before each image is processed */
  onProgress?: (progress: CollageProgress) => void;
}

export class CollageService {
  private readonly backend: ImageBackend;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: CollageServiceOptions = {}) {
    this.backend = options.backend ?? new SharpImageBackend();
    this.logger = options.logger ?? createLogger('Collage');
    this.now = options.now ?? Date.now;
  }

  /**
   * Build a collage from the images in a directory
   *
   * @param options - Collage options; missing fields take COLLAGE_DEFAULTS
   * @param hooks - Optional progress callback
   * @returns `empty` when no image was found, otherwise `written`
   * @throws ConfigError, ScanError or WriteError
   */
  async create(
    options: Partial<CollageOptions> = {},
    hooks: CreateCollageHooks = {}
  ): Promise<CollageRunResult> {
    const startedAt = this.now();
    const config = resolveCollageConfig(options);
    this.logger.debug(
      `Using ${this.backend.name} backend, background ${toHexColor(config.backgroundColor)}`
    );

    const refs = await scanDirectory(config.inputDir, { logger: this.logger });
    if (refs.length === 0) {
      this.logger.info(`No supported image files found in ${config.inputDir}`);
      return {
        status: 'empty',
        inputDir: config.inputDir,
        total: 0,
        placed: 0,
        skipped: [],
        durationMs: this.now() - startedAt,
      };
    }

    const geometry = computeGridGeometry({
      imageCount: refs.length,
      columns: config.columns,
      cellWidth: config.cellWidth,
      cellHeight: config.cellHeight,
      padding: config.padding,
    });
    const compositor = new CanvasCompositor(geometry, config.backgroundColor);
    const fitter = new CellFitter(
      this.backend,
      { width: config.cellWidth, height: config.cellHeight },
      this.logger
    );

    this.logger.info(`Creating collage with ${refs.length} images...`);
    this.logger.info(
      `Canvas size: ${formatDimensions(geometry.canvasWidth, geometry.canvasHeight)} pixels`
    );

    const skipped: SkippedImage[] = [];
    for (const ref of refs) {
      const progress = { index: ref.index + 1, total: refs.length, ref };
      this.logger.info(`Processing image ${progress.index}/${progress.total}: ${ref.name}`);
      hooks.onProgress?.(progress);

      const fitted = await fitter.fit(ref);
      const placed = fitted.ok ? compositor.place(fitted.image) : fitted;
      if (!placed.ok) {
        const { error } = placed;
        this.logger.warn(`Error processing ${ref.name}: ${error.message}`);
        this.logger.warn('Skipping this image and continuing...');
        skipped.push({ ref, code: error.code, reason: error.message });
      }
    }

    const writer = new CollageWriter(this.backend, {
      quality: config.quality,
      logger: this.logger,
    });
    const output = await writer.write(compositor.canvas, config.output);

    return {
      status: 'written',
      inputDir: config.inputDir,
      total: refs.length,
      placed: compositor.placed,
      skipped,
      geometry,
      output,
      durationMs: this.now() - startedAt,
    };
  }
}
