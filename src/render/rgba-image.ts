/**
 * In-memory RGBA raster with the handful of primitives the track renderer
 * needs. Pixel layout matches the browser's ImageData, so a rendered image
 * can be blitted onto a canvas unchanged.
 *
 * Coverage rule: a pixel is painted when its centre (px + 0.5, py + 0.5)
 * lies inside the shape. Shapes are clipped to the image.
 */

import type { Rgba } from './palette.js';

export interface Point {
  x: number;
  y: number;
}

export interface RgbaImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

export function createImage(width: number, height: number, fill?: Rgba): RgbaImage {
  if (!(Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0)) {
    throw new RangeError(`Image size must be positive integers, got ${width}x${height}`);
  }
  const data = new Uint8ClampedArray(width * height * 4);
  if (fill) {
    for (let i = 0; i < data.length; i += 4) {
      data[i] = fill[0];
      data[i + 1] = fill[1];
      data[i + 2] = fill[2];
      data[i + 3] = fill[3];
    }
  }
  return { width, height, data };
}

export function getPixel(image: RgbaImage, x: number, y: number): Rgba {
  if (!(Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < image.width && y >= 0 && y < image.height)) {
    throw new RangeError(`Pixel (${x}, ${y}) is outside the ${image.width}x${image.height} image`);
  }
  const i = (y * image.width + x) * 4;
  const d = image.data;
  return [d[i], d[i + 1], d[i + 2], d[i + 3]];
}

export function imagesEqual(a: RgbaImage, b: RgbaImage): boolean {
  if (a.width !== b.width || a.height !== b.height) return false;
  for (let i = 0; i < a.data.length; i++) {
    if (a.data[i] !== b.data[i]) return false;
  }
  return true;
}

export function fillRect(
  image: RgbaImage,
  x: number,
  y: number,
  width: number,
  height: number,
  color: Rgba,
): void {
  const [x0, x1] = span(x, x + width, image.width);
  const [y0, y1] = span(y, y + height, image.height);
  for (let py = y0; py < y1; py++) {
    for (let px = x0; px < x1; px++) {
      put(image, px, py, color);
    }
  }
}

/**
 * Outline a rectangle with a border of `thickness` drawn inward.
 * A border thick enough to meet itself fills the rectangle.
 */
export function strokeRect(
  image: RgbaImage,
  x: number,
  y: number,
  width: number,
  height: number,
  thickness: number,
  color: Rgba,
): void {
  if (thickness * 2 >= Math.min(width, height)) {
    fillRect(image, x, y, width, height, color);
    return;
  }
  fillRect(image, x, y, width, thickness, color);
  fillRect(image, x, y + height - thickness, width, thickness, color);
  fillRect(image, x, y + thickness, thickness, height - 2 * thickness, color);
  fillRect(image, x + width - thickness, y + thickness, thickness, height - 2 * thickness, color);
}

export function fillCircle(image: RgbaImage, cx: number, cy: number, radius: number, color: Rgba): void {
  const [x0, x1] = span(cx - radius - 1, cx + radius + 1, image.width);
  const [y0, y1] = span(cy - radius - 1, cy + radius + 1, image.height);
  const r2 = radius * radius;
  for (let py = y0; py < y1; py++) {
    const dy = py + 0.5 - cy;
    for (let px = x0; px < x1; px++) {
      const dx = px + 0.5 - cx;
      if (dx * dx + dy * dy <= r2) put(image, px, py, color);
    }
  }
}

/** Fill a simple or self-intersecting polygon using the even-odd rule. */
export function fillPolygon(image: RgbaImage, points: readonly Point[], color: Rgba): void {
  if (points.length < 3) return;
  const xs = points.map(p => p.x);
  const ys = points.map(p => p.y);
  const [x0, x1] = span(Math.min(...xs), Math.max(...xs), image.width);
  const [y0, y1] = span(Math.min(...ys), Math.max(...ys), image.height);
  for (let py = y0; py < y1; py++) {
    for (let px = x0; px < x1; px++) {
      if (insidePolygon(px + 0.5, py + 0.5, points)) put(image, px, py, color);
    }
  }
}

function insidePolygon(x: number, y: number, points: readonly Point[]): boolean {
  let inside = false;
  for (let i = 0, j = points.length - 1; i < points.length; j = i++) {
    const a = points[i];
    const b = points[j];
    if ((a.y > y) !== (b.y > y) && x < ((b.x - a.x) * (y - a.y)) / (b.y - a.y) + a.x) {
      inside = !inside;
    }
  }
  return inside;
}

/** Pixel indices [start, end) whose centres fall in [from, to), clipped to [0, limit). */
function span(from: number, to: number, limit: number): [number, number] {
  const start = Math.max(0, Math.ceil(from - 0.5));
  const end = Math.min(limit, Math.ceil(to - 0.5));
  return [start, end];
}

function put(image: RgbaImage, x: number, y: number, color: Rgba): void {
  const i = (y * image.width + x) * 4;
  image.data[i] = color[0];
  image.data[i + 1] = color[1];
  image.data[i + 2] = color[2];
  image.data[i + 3] = color[3];
}
