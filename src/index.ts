/**
 * Grid race track editor: track model, renderer, binary persistence,
 * editor loop and random bot.
 */

// Track
export { RaceTrack, blankTrack, parseSnapshot } from "./track/index.js";
export { ShapeMismatchError, BoundsError, PersistenceError } from "./track/index.js";
export type {
  CanvasSize,
  Cell,
  GridShape,
  Layer,
  PaintKind,
  TrackSnapshot,
  WallOptions,
} from "./track/index.js";

// Rendering
export {
  renderTrack,
  renderAtCanvasSize,
  createImage,
  getPixel,
  imagesEqual,
  PALETTE,
  PALETTE_NAMES,
  paletteColor,
  hexToRgba,
} from "./render/index.js";
export type { RgbaImage, Rgba, Point } from "./render/index.js";

// Persistence
export {
  encodeTrack,
  decodeTrack,
  saveTrack,
  loadTrack,
  TRACK_FILE_EXTENSION,
} from "./persistence/index.js";

// Editor
export {
  createEditorState,
  selectColor,
  selectKind,
  beginStroke,
  endStroke,
  paintAt,
  handleKeyDown,
  handleKeyUp,
  brushCells,
} from "./editor/index.js";
export type { EditorState, EditorCommand } from "./editor/index.js";

// Bot
export { createBot, randomMove, stepBot, createRng } from "./bot/index.js";
export type { BotState, Direction } from "./bot/index.js";

// Configuration
export { createEditorConfig, loadServerConfig } from "./config.js";
export type { EditorConfig, ServerConfig } from "./config.js";
