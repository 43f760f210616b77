/**
 * Fit planning tests
 */

import { describe, it, expect } from 'vitest';
import { computeCenterCrop, computeFitPlan, computeThumbnailSize } from '../fit-plan';

const CELL = { width: 350, height: 600 };

describe('computeThumbnailSize', () => {
  it('should shrink a square source to the cell width', () => {
    expect(computeThumbnailSize({ width: 1000, height: 1000 }, CELL)).toEqual({
      width: 350,
      height: 350,
    });
  });

  it('should shrink a landscape source to the cell width', () => {
    expect(computeThumbnailSize({ width: 2000, height: 1000 }, CELL)).toEqual({
      width: 350,
      height: 175,
    });
  });

  it('should shrink a tall source to the cell height', () => {
    expect(computeThumbnailSize({ width: 200, height: 1000 }, CELL)).toEqual({
      width: 120,
      height: 600,
    });
  });

  it('should keep an exact aspect match at the cell size', () => {
    expect(computeThumbnailSize({ width: 700, height: 1200 }, CELL)).toEqual(CELL);
  });

  it('should pick the rounding that keeps the aspect ratio closest', () => {
    // 350 / 4 = 87.5; 88 keeps 350/88 closer to 4 than 350/87 does
    expect(computeThumbnailSize({ width: 400, height: 100 }, CELL)).toEqual({
      width: 350,
      height: 88,
    });
  });

  it('should never go below one pixel', () => {
    expect(computeThumbnailSize({ width: 10000, height: 1 }, CELL)).toEqual({
      width: 350,
      height: 1,
    });
  });

  it('should not upscale a source that already fits', () => {
    expect(computeThumbnailSize({ width: 100, height: 50 }, CELL)).toBeNull();
    expect(computeThumbnailSize({ width: 350, height: 600 }, CELL)).toBeNull();
  });

  it('should shrink when only one dimension overflows', () => {
    expect(computeThumbnailSize({ width: 100, height: 1200 }, CELL)).toEqual({
      width: 50,
      height: 600,
    });
  });
});

describe('computeCenterCrop', () => {
  it('should return null when the size matches the box', () => {
    expect(computeCenterCrop(CELL, CELL)).toBeNull();
  });

  it('should center the crop window on larger images', () => {
    expect(computeCenterCrop({ width: 500, height: 700 }, CELL)).toEqual({
      left: 75,
      top: 50,
      width: 350,
      height: 600,
    });
  });

  it('should round odd offsets down', () => {
    expect(computeCenterCrop({ width: 353, height: 600 }, CELL)).toEqual({
      left: 1,
      top: 0,
      width: 350,
      height: 600,
    });
  });

  it('should keep a smaller dimension whole', () => {
    expect(computeCenterCrop({ width: 500, height: 300 }, CELL)).toEqual({
      left: 75,
      top: 0,
      width: 350,
      height: 300,
    });
  });

  it('should return null when the image fits entirely inside the box', () => {
    expect(computeCenterCrop({ width: 350, height: 350 }, CELL)).toBeNull();
    expect(computeCenterCrop({ width: 10, height: 10 }, CELL)).toBeNull();
  });
});

describe('computeFitPlan', () => {
  it('should resize without cropping when the aspect ratio matches', () => {
    expect(computeFitPlan({ width: 700, height: 1200 }, CELL)).toEqual({
      source: { width: 700, height: 1200 },
      resize: { width: 350, height: 600 },
      crop: null,
      output: { width: 350, height: 600 },
    });
  });

  it('should leave a letterboxed result smaller than the cell', () => {
    const plan = computeFitPlan({ width: 1000, height: 1000 }, CELL);
    expect(plan.resize).toEqual({ width: 350, height: 350 });
    expect(plan.crop).toBeNull();
    expect(plan.output).toEqual({ width: 350, height: 350 });
  });

  it('should keep small sources unscaled and unpadded', () => {
    const plan = computeFitPlan({ width: 100, height: 50 }, CELL);
    expect(plan.resize).toBeNull();
    expect(plan.crop).toBeNull();
    expect(plan.output).toEqual({ width: 100, height: 50 });
  });

  it('should be deterministic', () => {
    const source = { width: 1234, height: 987 };
    expect(computeFitPlan(source, CELL)).toEqual(computeFitPlan(source, CELL));
  });
});
