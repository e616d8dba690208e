/**
 * A grid coordinate. Rows grow downward, columns grow to the right.
 */
export interface Cell {
  row: number;
  col: number;
}

/** Grid dimensions, fixed for the lifetime of a track. */
export interface GridShape {
  rows: number;
  cols: number;
}

/** Pixel dimensions of the surface a track is rendered onto. */
export interface CanvasSize {
  width: number;
  height: number;
}

/** One of the four parallel 2D arrays, indexed `[row][col]`. */
export type Layer<T> = readonly (readonly T[])[];

/** What a typed edit places at a cell. */
export type PaintKind = "wall" | "button" | "target" | "spawn";

export interface WallOptions {
  /** Whether the new wall blocks movement. Defaults to true. */
  active?: boolean;
}

/**
 * Plain JSON form of a track. Field order matches the persisted record.
 */
export interface TrackSnapshot {
  walls: number[][];
  active: boolean[][];
  buttons: boolean[][];
  colors: number[][];
  target: Cell;
  spawn: Cell;
  canvasSize: CanvasSize;
}
