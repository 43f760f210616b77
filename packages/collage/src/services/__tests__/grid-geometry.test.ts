/**
 * Grid geometry tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../domain/collage-error';
import { cellOrigin, computeGridGeometry } from '../grid-geometry';

describe('computeGridGeometry', () => {
  it('should size the canvas without an outer margin', () => {
    const geometry = computeGridGeometry({
      imageCount: 7,
      columns: 5,
      cellWidth: 350,
      cellHeight: 600,
      padding: 10,
    });

    expect(geometry).toEqual({
      columns: 5,
      rows: 2,
      cellWidth: 350,
      cellHeight: 600,
      padding: 10,
      canvasWidth: 1790,
      canvasHeight: 1210,
    });
  });

  it('should keep every column even when the last row is short', () => {
    const geometry = computeGridGeometry({
      imageCount: 1,
      columns: 4,
      cellWidth: 100,
      cellHeight: 50,
      padding: 5,
    });

    expect(geometry.rows).toBe(1);
    expect(geometry.canvasWidth).toBe(415);
    expect(geometry.canvasHeight).toBe(50);
  });

  it('should handle zero padding', () => {
    const geometry = computeGridGeometry({
      imageCount: 6,
      columns: 3,
      cellWidth: 10,
      cellHeight: 20,
      padding: 0,
    });

    expect(geometry.rows).toBe(2);
    expect(geometry.canvasWidth).toBe(30);
    expect(geometry.canvasHeight).toBe(40);
  });

  it('should reject invalid parameters with every problem listed', () => {
    let caught: unknown;
    try {
      computeGridGeometry({ imageCount: 0, columns: 0, cellWidth: 10, cellHeight: 10, padding: -1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: 'INVALID_CONFIG',
      problems: [
        'image count must be at least 1',
        'columns must be at least 1',
        'padding cannot be negative',
      ],
    });
  });
});

describe('cellOrigin', () => {
  const geometry = computeGridGeometry({
    imageCount: 7,
    columns: 3,
    cellWidth: 100,
    cellHeight: 200,
    padding: 10,
  });

  it('should place the first image at the origin', () => {
    expect(cellOrigin(0, geometry)).toEqual({ left: 0, top: 0 });
  });

  it('should fill rows left to right', () => {
    expect(cellOrigin(1, geometry)).toEqual({ left: 110, top: 0 });
    expect(cellOrigin(2, geometry)).toEqual({ left: 220, top: 0 });
  });

  it('should wrap to the next row', () => {
    expect(cellOrigin(3, geometry)).toEqual({ left: 0, top: 210 });
    expect(cellOrigin(6, geometry)).toEqual({ left: 0, top: 420 });
  });
});
