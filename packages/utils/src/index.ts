/**
 * @collage/utils
 *
 * Framework-agnostic helpers shared by the collage packages.
 */

export * from './logger';
export * from './color';
export * from './format';
