import type { Point } from './rgba-image.js';

/** Box an icon is drawn into, in canvas pixels. */
export interface IconBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

const STAR_POINTS = 5;
const STAR_INNER_RATIO = 0.4;

/** Five-pointed star filling `box`, first point straight up. */
export function starPolygon(box: IconBox): Point[] {
  const cx = box.x + box.width / 2;
  const cy = box.y + box.height / 2;
  const rx = box.width / 2;
  const ry = box.height / 2;
  const points: Point[] = [];
  for (let i = 0; i < STAR_POINTS * 2; i++) {
    const angle = -Math.PI / 2 + (i * Math.PI) / STAR_POINTS;
    const scale = i % 2 === 0 ? 1 : STAR_INNER_RATIO;
    points.push({
      x: cx + Math.cos(angle) * rx * scale,
      y: cy + Math.sin(angle) * ry * scale,
    });
  }
  return points;
}

/** Upward triangle: apex at the top centre, base along the bottom edge. */
export function trianglePolygon(box: IconBox): Point[] {
  return [
    { x: box.x + box.width / 2, y: box.y },
    { x: box.x + box.width, y: box.y + box.height },
    { x: box.x, y: box.y + box.height },
  ];
}
