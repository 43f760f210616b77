/**
 * Grid geometry - canvas size and cell placement
 *
 * Cells are laid out row by row. Padding separates adjacent cells only;
 * there is no outer margin, so the canvas is
 * `columns * (cellWidth + padding) - padding` wide.
 */

import { ConfigError } from '../domain/collage-error';
import type { CellOrigin, GridGeometry } from '../types/collage.types';

export interface GridGeometryParams {
  imageCount: number;
  columns: number;
  cellWidth: number;
  cellHeight: number;
  padding: number;
}

/**
 * Compute the grid for a number of images
 *
 * @throws ConfigError when an invariant does not hold
 *
 * @example
 * ```typescript
 * computeGridGeometry({ imageCount: 7, columns: 5, cellWidth: 350, cellHeight: 600, padding: 10 });
 * // { columns: 5, rows: 2, ..., canvasWidth: 1790, canvasHeight: 1210 }
 * ```
 */
export function computeGridGeometry(params: GridGeometryParams): GridGeometry {
  const { imageCount, columns, cellWidth, cellHeight, padding } = params;

  const problems: string[] = [];
  if (!Number.isInteger(imageCount) || imageCount < 1) problems.push('image count must be at least 1');
  if (!Number.isInteger(columns) || columns < 1) problems.push('columns must be at least 1');
  if (!Number.isInteger(cellWidth) || cellWidth < 1) problems.push('cell width must be at least 1');
  if (!Number.isInteger(cellHeight) || cellHeight < 1) problems.push('cell height must be at least 1');
  if (!Number.isInteger(padding) || padding < 0) problems.push('padding cannot be negative');
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  const rows = Math.ceil(imageCount / columns);

  return {
    columns,
    rows,
    cellWidth,
    cellHeight,
    padding,
    canvasWidth: columns * (cellWidth + padding) - padding,
    canvasHeight: rows * (cellHeight + padding) - padding,
  };
}

/**
 * Top-left pixel of the cell for a 0-based image index
 */
export function cellOrigin(index: number, geometry: GridGeometry): CellOrigin {
  const row = Math.floor(index / geometry.columns);
  const col = index % geometry.columns;
  return {
    left: col * (geometry.cellWidth + geometry.padding),
    top: row * (geometry.cellHeight + geometry.padding),
  };
}
