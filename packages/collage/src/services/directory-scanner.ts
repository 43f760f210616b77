/**
 * DirectoryScanner - finds the source images of a collage
 *
 * Lists the regular files directly inside a directory whose extension is
 * a supported image type, ordered by code point. Dot-named files are
 * included. A missing
 * directory is created and yields an empty result.
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { glob } from 'glob';
import { createLogger, type Logger } from '@collage/utils';
import { ScanError, describeError } from '../domain/collage-error';
import type { ImageRef } from '../types/collage.types';
import { SUPPORTED_EXTENSIONS } from '../types/collage.types';

const SUPPORTED_SUFFIXES = SUPPORTED_EXTENSIONS.map((ext) => `.${ext}`);

export interface ScanOptions {
  logger?: Logger;
}

/**
 * Check whether a file name ends in a supported image extension
 *
 * Case-insensitive, the same match as a `*.<ext>` glob.
 *
 * @example
 * ```typescript
 * isSupportedImage('cover.JPG'); // true
 * isSupportedImage('notes.txt'); // false
 * isSupportedImage('.thumb.png'); // true
 * ```
 */
export function isSupportedImage(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return SUPPORTED_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

/**
 * Ensure a directory exists, creating it (and its parents) when missing
 *
 * @returns true when the directory was created
 * @throws ScanError when the path is not a directory or cannot be created
 */
export async function ensureDirectory(dir: string, logger?: Logger): Promise<boolean> {
  try {
    const stats = await fs.stat(dir);
    if (!stats.isDirectory()) {
      throw ScanError.notADirectory(dir);
    }
    return false;
  } catch (error) {
    if (error instanceof ScanError) {
      throw error;
    }
    if (!isMissing(error)) {
      throw ScanError.unreadable(dir, describeError(error), error);
    }
  }

  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (error) {
    throw ScanError.cannotCreate(dir, describeError(error), error);
  }
  logger?.info(`Created directory: ${dir}`);
  return true;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a, (char) => char.codePointAt(0) ?? 0);
  const right = Array.from(b, (char) => char.codePointAt(0) ?? 0);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) {
      return left[i] - right[i];
    }
  }
  return left.length - right.length;
}

/**
 * Scan a directory for supported images
 *
 * @param dir - Directory to scan; created when it does not exist
 * @returns ImageRefs sorted by path, indexed in that order
 * @throws ScanError when the directory cannot be created or listed
 *
 * @example
 * ```typescript
 * const refs = await scanDirectory('./photos');
 * refs.map((ref) => ref.name); // ['a.png', 'b.jpg', 'c.gif']
 * ```
 */
export async function scanDirectory(dir: string, options: ScanOptions = {}): Promise<ImageRef[]> {
  const logger = options.logger ?? createLogger('Scanner');
  const root = path.resolve(dir);

  const created = await ensureDirectory(root, logger);
  if (created) {
    return [];
  }

  let fileNames: string[];
  try {
    fileNames = await glob('*', { cwd: root, nodir: true, dot: true });
  } catch (error) {
    throw ScanError.unreadable(root, describeError(error), error);
  }

  const paths = fileNames
    .filter(isSupportedImage)
    .map((fileName) => path.join(root, fileName))
    .sort(compareCodePoints);

  logger.debug(`Found ${paths.length} image(s) in ${root}`);

  return paths.map((filePath, index) => ({
    path: filePath,
    name: path.basename(filePath),
    index,
  }));
}
