/**
 * Editor and server configuration.
 *
 * Everything that used to be a module-level constant (window size, grid
 * size, palette size, starting track) is an explicit value here, built
 * once and passed to whatever needs it.
 */

import { PALETTE } from './render/palette.js';

export interface EditorConfig {
  /** Width of the rendered track in pixels. */
  canvasWidth: number;
  /** Height of the rendered track in pixels. */
  canvasHeight: number;
  gridRows: number;
  gridCols: number;
  /** How many palette entries the toolbar offers (index 0 erases). */
  paletteSize: number;
  /** Track file opened at startup instead of a blank track. */
  startingTrackPath?: string;
}

export interface ServerConfig {
  port: number;
  /** Directory holding saved `.track` files. */
  tracksDir: string;
  editor: EditorConfig;
}

const DEFAULT_CANVAS_WIDTH = 600;
const DEFAULT_GRID_ROWS = 15;
const DEFAULT_GRID_COLS = 10;
const MIN_PALETTE_SIZE = 2;

/**
 * Fill in defaults and validate. When only the width is given, the height
 * follows the grid's aspect ratio so cells stay square.
 */
export function createEditorConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  const gridRows = overrides.gridRows ?? DEFAULT_GRID_ROWS;
  const gridCols = overrides.gridCols ?? DEFAULT_GRID_COLS;
  const canvasWidth = overrides.canvasWidth ?? DEFAULT_CANVAS_WIDTH;
  const canvasHeight = overrides.canvasHeight ?? Math.round((canvasWidth * gridRows) / gridCols);
  const paletteSize = overrides.paletteSize ?? PALETTE.length;

  requirePositiveInteger('gridRows', gridRows);
  requirePositiveInteger('gridCols', gridCols);
  requirePositiveInteger('canvasWidth', canvasWidth);
  requirePositiveInteger('canvasHeight', canvasHeight);
  if (!Number.isInteger(paletteSize) || paletteSize < MIN_PALETTE_SIZE || paletteSize > PALETTE.length) {
    throw new Error(`paletteSize must be between ${MIN_PALETTE_SIZE} and ${PALETTE.length}, got ${paletteSize}`);
  }

  const config: EditorConfig = { canvasWidth, canvasHeight, gridRows, gridCols, paletteSize };
  if (overrides.startingTrackPath) config.startingTrackPath = overrides.startingTrackPath;
  return config;
}

/**
 * Read server configuration from environment variables:
 * PORT, TRACKS_DIR, STARTING_TRACK, GRID_ROWS, GRID_COLS,
 * CANVAS_WIDTH, CANVAS_HEIGHT, PALETTE_SIZE.
 */
export function loadServerConfig(env: Record<string, string | undefined>): ServerConfig {
  const port = parseIntVar(env, 'PORT') ?? 3000;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be between 0 and 65535, got ${port}`);
  }
  return {
    port,
    tracksDir: env['TRACKS_DIR'] || 'tracks',
    editor: createEditorConfig({
      gridRows: parseIntVar(env, 'GRID_ROWS'),
      gridCols: parseIntVar(env, 'GRID_COLS'),
      canvasWidth: parseIntVar(env, 'CANVAS_WIDTH'),
      canvasHeight: parseIntVar(env, 'CANVAS_HEIGHT'),
      paletteSize: parseIntVar(env, 'PALETTE_SIZE'),
      startingTrackPath: env['STARTING_TRACK'] || undefined,
    }),
  };
}

function parseIntVar(env: Record<string, string | undefined>, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
}
