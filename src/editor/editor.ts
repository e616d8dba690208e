/**
 * Editor loop logic, independent of any DOM.
 *
 * Translates pointer and key input into typed edits on a RaceTrack.
 * A stroke runs from pointer-down to pointer-up; within one stroke each
 * cell is edited at most once, however often the pointer passes over it.
 */

import type { EditorConfig } from '../config.js';
import type { RaceTrack } from '../track/race-track.js';
import type { Cell, PaintKind } from '../track/types.js';
import { brushCells, cellKey } from './brush.js';

export const PAINT_KINDS: readonly PaintKind[] = ['wall', 'button', 'target', 'spawn'];

export interface EditorState {
  selectedColor: number;
  selectedKind: PaintKind;
  /** Brush radius in cells; 1 paints a single cell. */
  brushRadius: number;
  /** True between pointer-down and pointer-up. */
  painting: boolean;
  /** While held, new walls are placed inactive. */
  placeInactive: boolean;
  /** Cells already edited during the current stroke. */
  handled: Set<string>;
  paletteSize: number;
}

/** Something the editor asks its host to do in response to input. */
export type EditorCommand = { type: 'save' };

export const SAVE_KEY = 'Enter';
export const GROW_BRUSH_KEY = 'ArrowUp';
export const SHRINK_BRUSH_KEY = 'ArrowDown';
export const INACTIVE_WALL_KEY = 'a';

export function createEditorState(config: Pick<EditorConfig, 'paletteSize'>): EditorState {
  return {
    selectedColor: 1,
    selectedKind: 'wall',
    brushRadius: 1,
    painting: false,
    placeInactive: false,
    handled: new Set(),
    paletteSize: config.paletteSize,
  };
}

export function selectColor(state: EditorState, color: number): void {
  if (!Number.isInteger(color) || color < 0 || color >= state.paletteSize) {
    throw new RangeError(`Color ${color} is not in the ${state.paletteSize}-color palette`);
  }
  state.selectedColor = color;
}

export function selectKind(state: EditorState, kind: PaintKind): void {
  state.selectedKind = kind;
}

export function beginStroke(state: EditorState): void {
  state.painting = true;
}

export function endStroke(state: EditorState): void {
  state.painting = false;
  state.handled.clear();
}

/**
 * Apply the selected tool under pixel (x, y). Does nothing unless a stroke
 * is in progress and the point lies on the canvas.
 * Returns the number of cells edited.
 */
export function paintAt(track: RaceTrack, state: EditorState, x: number, y: number): number {
  if (!state.painting) return 0;
  const { width, height } = track.canvasSize;
  if (!(x >= 0 && x < width && y >= 0 && y < height)) return 0;

  const center = track.gridCoordFromPixel(x, y);
  let edited = 0;
  for (const cell of brushCells(center, state.brushRadius, track.shape)) {
    const key = cellKey(cell);
    if (state.handled.has(key)) continue;
    state.handled.add(key);
    applyTool(track, state, cell);
    edited++;
  }
  return edited;
}

export function handleKeyDown(state: EditorState, key: string): EditorCommand | null {
  switch (normalizeKey(key)) {
    case GROW_BRUSH_KEY:
      state.brushRadius += 1;
      return null;
    case SHRINK_BRUSH_KEY:
      state.brushRadius = Math.max(1, state.brushRadius - 1);
      return null;
    case SAVE_KEY:
      return { type: 'save' };
    case INACTIVE_WALL_KEY:
      state.placeInactive = true;
      return null;
    default:
      return null;
  }
}

export function handleKeyUp(state: EditorState, key: string): void {
  if (normalizeKey(key) === INACTIVE_WALL_KEY) state.placeInactive = false;
}

/** Letter keys match whatever Shift or Caps Lock did to them. */
function normalizeKey(key: string): string {
  return key.length === 1 ? key.toLowerCase() : key;
}

function applyTool(track: RaceTrack, state: EditorState, cell: Cell): void {
  switch (state.selectedKind) {
    case 'wall':
      track.placeWall(cell, state.selectedColor, { active: !state.placeInactive });
      break;
    case 'button':
      track.placeButton(cell, state.selectedColor);
      break;
    case 'target':
      track.placeTarget(cell);
      break;
    case 'spawn':
      track.placeSpawn(cell);
      break;
  }
}
