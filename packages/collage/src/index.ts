/**
 * @collage/core
 *
 * Fixed-grid photo collage: scan a directory, fit every image into a
 * uniform cell and composite the cells onto one canvas.
 */

export * from './types/collage.types';
export * from './domain/collage-error';
export { resolveCollageConfig } from './config/collage-config';

export type { ImageBackend, EncodeOptions } from './backends/image-backend';
export { SharpImageBackend } from './backends/sharp-backend';

export { scanDirectory, ensureDirectory, isSupportedImage } from './services/directory-scanner';
export type { ScanOptions } from './services/directory-scanner';
export { computeThumbnailSize, computeCenterCrop, computeFitPlan } from './services/fit-plan';
export { CellFitter } from './services/cell-fitter';
export { computeGridGeometry, cellOrigin } from './services/grid-geometry';
export type { GridGeometryParams } from './services/grid-geometry';
export { RasterCanvas } from './services/raster-canvas';
export { CanvasCompositor } from './services/canvas-compositor';
export { CollageWriter, resolveOutputFormat, DEFAULT_OUTPUT_FORMAT } from './services/collage-writer';
export type { CollageWriterOptions } from './services/collage-writer';
export { CollageService } from './services/collage-service';
export type { CollageServiceOptions, CreateCollageHooks } from './services/collage-service';
