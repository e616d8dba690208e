/**
 * Track renderer: draws a RaceTrack into an RGBA image.
 *
 * The canvas is split into rows x cols equal cells. Per cell, in row-major
 * order:
 * - active wall: filled rectangle in its palette color
 * - inactive wall: outline, 20% of the cell width thick
 * - otherwise a button: filled circle
 * - otherwise the target: star
 * - the spawn triangle on top, whatever else the cell holds
 * - a 2px black border last
 *
 * Output depends only on the track's fields and the requested size.
 */

import type { RaceTrack } from '../track/race-track.js';
import { starPolygon, trianglePolygon } from './icons.js';
import type { IconBox } from './icons.js';
import {
  BACKGROUND_COLOR,
  GRID_LINE_COLOR,
  SPAWN_COLOR,
  TARGET_COLOR,
  hexToRgba,
  paletteColor,
} from './palette.js';
import type { Rgba } from './palette.js';
import { createImage, fillCircle, fillPolygon, fillRect, strokeRect } from './rgba-image.js';
import type { RgbaImage } from './rgba-image.js';

const GRID_LINE_WIDTH = 2;
const INACTIVE_WALL_RATIO = 0.2;
const BUTTON_RADIUS_RATIO = 0.4;
const ICON_INSET_RATIO = 0.1;
const ICON_SIZE_RATIO = 0.8;

const BACKGROUND = hexToRgba(BACKGROUND_COLOR);
const GRID_LINE = hexToRgba(GRID_LINE_COLOR);
const TARGET = hexToRgba(TARGET_COLOR);
const SPAWN = hexToRgba(SPAWN_COLOR);

export function renderTrack(track: RaceTrack, width: number, height: number): RgbaImage {
  const image = createImage(width, height, BACKGROUND);
  const { rows, cols } = track.shape;
  const w = width / cols;
  const h = height / rows;
  const { target, spawn } = track;

  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const x = col * w;
      const y = row * h;
      const color = cellColor(track.colors[row][col]);
      const iconBox: IconBox = {
        x: x + ICON_INSET_RATIO * w,
        y: y + ICON_INSET_RATIO * h,
        width: ICON_SIZE_RATIO * w,
        height: ICON_SIZE_RATIO * h,
      };

      if (track.walls[row][col] !== 0) {
        if (track.active[row][col]) {
          fillRect(image, x, y, w + 1, h + 1, color);
        } else {
          const thickness = Math.max(1, Math.trunc(INACTIVE_WALL_RATIO * w));
          strokeRect(image, x, y, w + 1, h + 1, thickness, color);
        }
      } else if (track.buttons[row][col]) {
        fillCircle(image, x + w / 2, y + h / 2, BUTTON_RADIUS_RATIO * Math.min(w, h), color);
      } else if (row === target.row && col === target.col) {
        fillPolygon(image, starPolygon(iconBox), TARGET);
      }

      if (row === spawn.row && col === spawn.col) {
        fillPolygon(image, trianglePolygon(iconBox), SPAWN);
      }

      strokeRect(image, x, y, w + 1, h + 1, GRID_LINE_WIDTH, GRID_LINE);
    }
  }
  return image;
}

/** Re-render at the size the track was last rendered at. */
export function renderAtCanvasSize(track: RaceTrack): RgbaImage {
  return renderTrack(track, track.canvasSize.width, track.canvasSize.height);
}

function cellColor(index: number): Rgba {
  return hexToRgba(paletteColor(index));
}
