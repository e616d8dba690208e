/**
 * Fixed track palette. Walls and buttons share the same color indices;
 * index 0 is the erase/default color.
 */

export type Rgba = readonly [r: number, g: number, b: number, a: number];

export const PALETTE = [
  '#ffffff',
  '#000000',
  '#d20000',
  '#de9f00',
  '#00ae00',
  '#0000cd',
  '#8b008b',
  '#739f9f',
] as const;

export const PALETTE_NAMES = [
  'white',
  'black',
  'red',
  'orange',
  'green',
  'blue',
  'magenta',
  'gray',
] as const;

export const BACKGROUND_COLOR = '#ffffff';
export const GRID_LINE_COLOR = '#000000';
export const TARGET_COLOR = '#ffc61a';
export const SPAWN_COLOR = '#278b00';

/** Hex color for a palette index. Throws RangeError for unknown indices. */
export function paletteColor(index: number): string {
  const color = PALETTE[index];
  if (color === undefined || !Number.isInteger(index)) {
    throw new RangeError(`No palette color at index ${index}`);
  }
  return color;
}

/** Parse `#rrggbb` into an opaque RGBA tuple. */
export function hexToRgba(hex: string): Rgba {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) throw new Error(`Invalid hex color: ${hex}`);
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16), 255];
}
