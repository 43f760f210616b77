import { describe, it, expect } from 'vitest';
import type { Raster } from '../../types/collage.types';
import { RasterCanvas } from '../raster-canvas';

const WHITE = { r: 255, g: 255, b: 255 };
const RED = { r: 255, g: 0, b: 0 };

function solid(width: number, height: number, color: { r: number; g: number; b: number }): Raster {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < data.length; i += 3) {
    data[i] = color.r;
    data[i + 1] = color.g;
    data[i + 2] = color.b;
  }
  return { width, height, channels: 3, data };
}

describe('RasterCanvas', () => {
  it('should start filled with the background', () => {
    const canvas = new RasterCanvas(4, 3, { r: 1, g: 2, b: 3 });

    expect(canvas.data.length).toBe(36);
    expect(canvas.pixelAt(0, 0)).toEqual({ r: 1, g: 2, b: 3 });
    expect(canvas.pixelAt(3, 2)).toEqual({ r: 1, g: 2, b: 3 });
  });

  it('should reject empty or fractional sizes', () => {
    expect(() => new RasterCanvas(0, 10, WHITE)).toThrow(RangeError);
    expect(() => new RasterCanvas(10, 2.5, WHITE)).toThrow('Invalid canvas size 10x2.5');
  });

  it('should paste a raster at an offset', () => {
    const canvas = new RasterCanvas(5, 5, WHITE);
    canvas.paste(solid(2, 2, RED), 1, 2);

    expect(canvas.pixelAt(1, 2)).toEqual(RED);
    expect(canvas.pixelAt(2, 3)).toEqual(RED);
    expect(canvas.pixelAt(0, 2)).toEqual(WHITE);
    expect(canvas.pixelAt(3, 2)).toEqual(WHITE);
    expect(canvas.pixelAt(1, 4)).toEqual(WHITE);
  });

  it('should keep the row order of the pasted raster', () => {
    const raster: Raster = {
      width: 1,
      height: 2,
      channels: 3,
      data: Uint8Array.from([10, 20, 30, 40, 50, 60]),
    };
    const canvas = new RasterCanvas(2, 2, WHITE);
    canvas.paste(raster, 1, 0);

    expect(canvas.pixelAt(1, 0)).toEqual({ r: 10, g: 20, b: 30 });
    expect(canvas.pixelAt(1, 1)).toEqual({ r: 40, g: 50, b: 60 });
  });

  it('should clip what falls outside the canvas', () => {
    const canvas = new RasterCanvas(3, 3, WHITE);
    canvas.paste(solid(3, 3, RED), 2, -1);

    expect(canvas.pixelAt(2, 0)).toEqual(RED);
    expect(canvas.pixelAt(2, 1)).toEqual(RED);
    expect(canvas.pixelAt(2, 2)).toEqual(WHITE);
    expect(canvas.pixelAt(1, 0)).toEqual(WHITE);
  });

  it('should ignore a raster entirely outside the canvas', () => {
    const canvas = new RasterCanvas(2, 2, WHITE);
    canvas.paste(solid(2, 2, RED), 5, 5);

    expect(canvas.data.every((value) => value === 255)).toBe(true);
  });

  it('should reject a buffer that does not match its size', () => {
    const canvas = new RasterCanvas(4, 4, WHITE);
    const broken: Raster = { width: 2, height: 2, channels: 3, data: new Uint8Array(5) };

    expect(() => canvas.paste(broken, 0, 0)).toThrow(
      'Raster buffer holds 5 bytes, expected 12 for 2x2 RGB'
    );
  });

  it('should reject reads outside the canvas', () => {
    const canvas = new RasterCanvas(2, 2, WHITE);
    expect(() => canvas.pixelAt(2, 0)).toThrow('Pixel (2, 0) is outside 2x2');
  });
});
