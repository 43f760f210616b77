/**
 * Fit planning - pure resize and crop arithmetic for one cell
 *
 * A source is first shrunk (never enlarged) to fit inside the cell while
 * keeping its aspect ratio, then center-cropped to the cell. Because the
 * shrink already fits the image inside the cell, the crop only ever
 * truncates to the overlap; small sources stay small and are not padded.
 */

import type { CropBox, FitPlan, Size } from '../types/collage.types';

/**
 * Pick floor or ceil of `value`, whichever scores lower, never below 1
 *
 * Ties keep the floor.
 */
function roundAspect(value: number, score: (n: number) => number): number {
  const low = Math.floor(value);
  const high = Math.ceil(value);
  const best = score(high) < score(low) ? high : low;
  return Math.max(best, 1);
}

/**
 * Size of a source shrunk to fit inside a box, preserving aspect ratio
 *
 * @returns The new size, or null when the box already holds the source
 *
 * @example
 * ```typescript
 * computeThumbnailSize({ width: 1000, height: 1000 }, { width: 350, height: 600 });
 * // { width: 350, height: 350 }
 * computeThumbnailSize({ width: 100, height: 50 }, { width: 350, height: 600 });
 * // null
 * ```
 */
export function computeThumbnailSize(source: Size, box: Size): Size | null {
  const boxWidth = Math.floor(box.width);
  const boxHeight = Math.floor(box.height);

  if (boxWidth >= source.width && boxHeight >= source.height) {
    return null;
  }

  const aspect = source.width / source.height;
  if (boxWidth / boxHeight >= aspect) {
    const width = roundAspect(boxHeight * aspect, (n) => Math.abs(aspect - n / boxHeight));
    return { width, height: boxHeight };
  }

  const height = roundAspect(boxWidth / aspect, (n) =>
    n === 0 ? 0 : Math.abs(aspect - boxWidth / n)
  );
  return { width: boxWidth, height };
}

/**
 * Center crop of an image to a box
 *
 * Offsets are `max(0, floor((size - box) / 2))`; the crop is clipped to
 * the image, so a dimension smaller than the box is kept whole.
 *
 * @returns The crop rectangle, or null when it would keep the whole image
 *
 * @example
 * ```typescript
 * computeCenterCrop({ width: 500, height: 700 }, { width: 350, height: 600 });
 * // { left: 75, top: 50, width: 350, height: 600 }
 * ```
 */
export function computeCenterCrop(size: Size, box: Size): CropBox | null {
  if (size.width === box.width && size.height === box.height) {
    return null;
  }

  const left = Math.max(0, Math.floor((size.width - box.width) / 2));
  const top = Math.max(0, Math.floor((size.height - box.height) / 2));
  const width = Math.min(box.width, size.width - left);
  const height = Math.min(box.height, size.height - top);

  if (left === 0 && top === 0 && width === size.width && height === size.height) {
    return null;
  }
  return { left, top, width, height };
}

/**
 * Plan the fit of a source image into a cell
 *
 * Deterministic: the same source size and cell always give the same plan.
 */
export function computeFitPlan(source: Size, cell: Size): FitPlan {
  const resize = computeThumbnailSize(source, cell);
  const resized = resize ?? { width: source.width, height: source.height };
  const crop = computeCenterCrop(resized, cell);
  const output = crop ? { width: crop.width, height: crop.height } : resized;

  return { source, resize, crop, output };
}
