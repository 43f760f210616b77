/**
 * Color Utilities
 *
 * Pure functions for parsing color strings into opaque RGB triples and
 * formatting them back to hex. Accepts CSS named colors, hex notation
 * (with or without alpha) and `rgb()` / `rgba()` functions.
 */

import namedColorTable from './named-colors.json';

/**
 * Opaque 8-bit RGB color
 */
export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

const NAMED_COLORS: Readonly<Record<string, string>> = namedColorTable;

const HEX_PATTERN = /^#(?:[0-9A-F]{3}|[0-9A-F]{6})$/;
const RGB_FUNCTION_PATTERN = /^(rgba?)\(([^()]*)\)$/;
const INTEGER_CHANNEL_PATTERN = /^\d{1,3}$/;
const PERCENT_CHANNEL_PATTERN = /^(\d{1,3}(?:\.\d+)?)%$/;
const ALPHA_PATTERN = /^(?:\d+(?:\.\d+)?|\.\d+)%?$/;

/**
 * Remove alpha channel from hex color
 *
 * @param hexColor - Hex color with or without alpha
 * @returns Hex color without alpha channel (always 6 or 3 digits with #)
 *
 * @example
 * ```typescript
 * removeHexAlpha('#FF0000FF'); // '#FF0000'
 * removeHexAlpha('#FF000080'); // '#FF0000'
 * removeHexAlpha('#F008'); // '#F00'
 * removeHexAlpha('#FF0000'); // '#FF0000' (unchanged)
 * ```
 */
export function removeHexAlpha(hexColor: string): string {
  // Remove possible # prefix and convert to uppercase
  const hexColorClone = hexColor.replace(/^#/, '').toUpperCase();

  if (hexColorClone.length === 8) {
    // 8-digit hex, remove last 2 digits
    return '#' + hexColorClone.slice(0, 6);
  } else if (hexColorClone.length === 4) {
    // 4-digit hex (shorthand), remove last digit
    return '#' + hexColorClone.slice(0, 3);
  } else if (hexColorClone.length === 6 || hexColorClone.length === 3) {
    // Already standard 6 or 3 digit form, return as-is
    return '#' + hexColorClone;
  } else {
    return hexColor;
  }
}

/**
 * Parse a hex color into RGB, ignoring any alpha digits
 *
 * @param hexColor - `#rgb`, `#rgba`, `#rrggbb` or `#rrggbbaa`
 * @returns RGB triple, or null when the string is not valid hex
 *
 * @example
 * ```typescript
 * parseHexColor('#FF8000'); // { r: 255, g: 128, b: 0 }
 * parseHexColor('#0f08'); // { r: 0, g: 255, b: 0 }
 * parseHexColor('#12345'); // null
 * ```
 */
export function parseHexColor(hexColor: string): RgbColor | null {
  if (!hexColor.startsWith('#')) {
    return null;
  }

  const opaque = removeHexAlpha(hexColor);
  if (!HEX_PATTERN.test(opaque)) {
    return null;
  }

  const digits = opaque.slice(1);
  const full =
    digits.length === 3
      ? digits
          .split('')
          .map((digit) => digit + digit)
          .join('')
      : digits;

  return {
    r: parseInt(full.slice(0, 2), 16),
    g: parseInt(full.slice(2, 4), 16),
    b: parseInt(full.slice(4, 6), 16),
  };
}

function parseChannel(value: string): number | null {
  if (INTEGER_CHANNEL_PATTERN.test(value)) {
    const channel = parseInt(value, 10);
    return channel <= 255 ? channel : null;
  }

  const percent = PERCENT_CHANNEL_PATTERN.exec(value);
  if (percent) {
    const ratio = parseFloat(percent[1]);
    return ratio <= 100 ? Math.round((ratio * 255) / 100) : null;
  }

  return null;
}

/**
 * Parse an `rgb(r, g, b)` or `rgba(r, g, b, a)` string
 *
 * Channels are 0-255 integers or 0-100% percentages. Alpha is validated
 * but dropped.
 *
 * @example
 * ```typescript
 * parseRgbFunction('rgb(255, 0, 0)'); // { r: 255, g: 0, b: 0 }
 * parseRgbFunction('rgb(100%, 50%, 0%)'); // { r: 255, g: 128, b: 0 }
 * parseRgbFunction('rgba(0, 0, 255, 0.5)'); // { r: 0, g: 0, b: 255 }
 * ```
 */
export function parseRgbFunction(value: string): RgbColor | null {
  const match = RGB_FUNCTION_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, fn, body] = match;
  const parts = body.split(',').map((part) => part.trim());
  const expected = fn === 'rgba' ? 4 : 3;
  if (parts.length !== expected) {
    return null;
  }
  if (expected === 4 && !ALPHA_PATTERN.test(parts[3])) {
    return null;
  }

  const r = parseChannel(parts[0]);
  const g = parseChannel(parts[1]);
  const b = parseChannel(parts[2]);
  if (r === null || g === null || b === null) {
    return null;
  }
  return { r, g, b };
}

/**
 * Parse any supported color string into an opaque RGB triple
 *
 * Matching is case-insensitive and ignores surrounding whitespace.
 *
 * @param input - Named color, hex color or rgb()/rgba() function
 * @returns RGB triple, or null when the string cannot be parsed
 *
 * @example
 * ```typescript
 * parseColor('white'); // { r: 255, g: 255, b: 255 }
 * parseColor('  SteelBlue '); // { r: 70, g: 130, b: 180 }
 * parseColor('#000'); // { r: 0, g: 0, b: 0 }
 * parseColor('not-a-color'); // null
 * ```
 */
export function parseColor(input: string): RgbColor | null {
  const normalized = input.trim().toLowerCase();
  if (!normalized) {
    return null;
  }

  if (Object.prototype.hasOwnProperty.call(NAMED_COLORS, normalized)) {
    return parseHexColor(NAMED_COLORS[normalized]);
  }
  if (normalized.startsWith('#')) {
    return parseHexColor(normalized);
  }
  return parseRgbFunction(normalized);
}

/**
 * Format an RGB triple as an uppercase `#RRGGBB` string
 *
 * @example
 * ```typescript
 * toHexColor({ r: 255, g: 255, b: 255 }); // '#FFFFFF'
 * toHexColor({ r: 0, g: 128, b: 10 }); // '#00800A'
 * ```
 */
export function toHexColor(color: RgbColor): string {
  const hex = [color.r, color.g, color.b]
    .map((channel) => channel.toString(16).padStart(2, '0'))
    .join('');
  return `#${hex.toUpperCase()}`;
}
