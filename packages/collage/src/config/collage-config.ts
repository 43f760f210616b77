/**
 * Collage configuration
 *
 * Merges caller options over COLLAGE_DEFAULTS and validates them. All
 * problems are collected and reported in one ConfigError, before any
 * directory is touched or image read.
 */

import { parseColor } from '@collage/utils';
import { ConfigError } from '../domain/collage-error';
import type { CollageConfig, CollageOptions } from '../types/collage.types';
import { COLLAGE_DEFAULTS } from '../types/collage.types';

function validateInteger(
  value: number,
  fieldName: string,
  options: { min: number; max?: number }
): string[] {
  if (!Number.isInteger(value)) {
    return [`${fieldName} must be a whole number (got ${value})`];
  }
  if (value < options.min) {
    return [
      options.min === 0
        ? `${fieldName} cannot be negative (got ${value})`
        : `${fieldName} must be at least ${options.min} (got ${value})`,
    ];
  }
  if (options.max !== undefined && value > options.max) {
    return [`${fieldName} must be at most ${options.max} (got ${value})`];
  }
  return [];
}

function validatePath(value: string, fieldName: string): string[] {
  return value.trim() ? [] : [`${fieldName} must not be empty`];
}

/**
 * Resolve and validate collage options
 *
 * @param options - Partial options; missing fields take their defaults
 * @returns Complete configuration with the parsed background color
 * @throws ConfigError listing every invalid field
 *
 * @example
 * ```typescript
 * const config = resolveCollageConfig({ columns: 3, background: '#000' });
 * config.backgroundColor; // { r: 0, g: 0, b: 0 }
 * ```
 */
export function resolveCollageConfig(options: Partial<CollageOptions> = {}): CollageConfig {
  const merged: CollageOptions = { ...COLLAGE_DEFAULTS };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined && Object.prototype.hasOwnProperty.call(merged, key)) {
      Object.assign(merged, { [key]: value });
    }
  }

  const problems = [
    ...validatePath(merged.inputDir, 'Input directory'),
    ...validatePath(merged.output, 'Output path'),
    ...validateInteger(merged.columns, 'Number of columns', { min: 1 }),
    ...validateInteger(merged.cellWidth, 'Width', { min: 1 }),
    ...validateInteger(merged.cellHeight, 'Height', { min: 1 }),
    ...validateInteger(merged.padding, 'Padding', { min: 0 }),
    ...validateInteger(merged.quality, 'Quality', { min: 1, max: 100 }),
  ];

  const backgroundColor = parseColor(merged.background);
  if (!backgroundColor) {
    problems.push(
      `Invalid background color: ${merged.background} ` +
        `(use a color name such as 'white' or 'black', or a hex value such as '#FFFFFF')`
    );
  }

  if (problems.length > 0 || !backgroundColor) {
    throw new ConfigError(problems);
  }

  return { ...merged, backgroundColor };
}
