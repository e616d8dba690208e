export { renderTrack, renderAtCanvasSize } from './track-renderer.js';
export {
  createImage,
  getPixel,
  imagesEqual,
  fillRect,
  strokeRect,
  fillCircle,
  fillPolygon,
} from './rgba-image.js';
export type { RgbaImage, Point } from './rgba-image.js';
export { starPolygon, trianglePolygon } from './icons.js';
export type { IconBox } from './icons.js';
export {
  PALETTE,
  PALETTE_NAMES,
  BACKGROUND_COLOR,
  GRID_LINE_COLOR,
  TARGET_COLOR,
  SPAWN_COLOR,
  paletteColor,
  hexToRgba,
} from './palette.js';
export type { Rgba } from './palette.js';
