import { PALETTE } from "../render/palette.js";
import { BoundsError, ShapeMismatchError } from "./errors.js";
import type { CanvasSize, Cell, GridShape, Layer, TrackSnapshot, WallOptions } from "./types.js";

/**
 * RaceTrack holds the four grid layers plus the spawn and target markers
 * and answers masked spatial queries over them.
 *
 * The constructor copies the layers it is given and exposes them
 * read-only. All mutation goes through `toggle` and the
 * typed `place*` edits, which keep a cell from being both a wall and a
 * button. Every mutation bumps `revision`, which views use to decide when
 * to re-render.
 */
export class RaceTrack {
  readonly shape: GridShape;
  readonly canvasSize: CanvasSize;
  private readonly _walls: number[][];
  private readonly _active: boolean[][];
  private readonly _buttons: boolean[][];
  private readonly _colors: number[][];
  private _target: Cell;
  private _spawn: Cell;
  private _revision = 0;

  constructor(
    walls: Layer<number>,
    active: Layer<boolean>,
    buttons: Layer<boolean>,
    colors: Layer<number>,
    target: Cell,
    spawn: Cell,
    canvasSize: CanvasSize,
  ) {
    const shape = shapeOf(walls, "walls");
    for (const [name, layer] of [
      ["active", active],
      ["buttons", buttons],
      ["colors", colors],
    ] as const) {
      const other = shapeOf(layer, name);
      if (other.rows !== shape.rows || other.cols !== shape.cols) {
        throw new ShapeMismatchError(
          `All map layers must be same shape: walls is ${shape.rows}x${shape.cols}, ${name} is ${other.rows}x${other.cols}`,
        );
      }
    }
    const { width, height } = canvasSize;
    if (!(Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0)) {
      throw new RangeError(`Canvas size must be positive integers, got ${width}x${height}`);
    }
    colors.forEach((row, r) => row.forEach((color, c) => checkColor(color, `at (${r}, ${c})`)));

    this.shape = shape;
    this._walls = walls.map(r => [...r]);
    this._active = active.map(r => [...r]);
    this._buttons = buttons.map(r => [...r]);
    this._colors = colors.map(r => [...r]);
    this._target = { ...this.checkCell(target, "target") };
    this._spawn = { ...this.checkCell(spawn, "spawn") };
    this.canvasSize = { ...canvasSize };
  }

  get walls(): Layer<number> { return this._walls; }
  get active(): Layer<boolean> { return this._active; }
  get buttons(): Layer<boolean> { return this._buttons; }
  get colors(): Layer<number> { return this._colors; }
  get target(): Cell { return { ...this._target }; }
  get spawn(): Cell { return { ...this._spawn }; }
  get revision(): number { return this._revision; }

  /** Pixel size of one cell at the stored canvas size. */
  get cellSize(): { width: number; height: number } {
    return {
      width: this.canvasSize.width / this.shape.cols,
      height: this.canvasSize.height / this.shape.rows,
    };
  }

  inBounds(cell: Cell): boolean {
    return (
      Number.isInteger(cell.row) &&
      Number.isInteger(cell.col) &&
      cell.row >= 0 &&
      cell.row < this.shape.rows &&
      cell.col >= 0 &&
      cell.col < this.shape.cols
    );
  }

  /**
   * Cells holding a wall, optionally narrowed to one color and/or one
   * active state. Row-major order.
   */
  findWalls(color?: number, active?: boolean): Cell[] {
    return this.collect((row, col) =>
      this._walls[row][col] !== 0 &&
      (color === undefined || this._colors[row][col] === color) &&
      (active === undefined || this._active[row][col] === active),
    );
  }

  /** Cells holding a button, optionally of one color. Row-major order. */
  findButtons(color?: number): Cell[] {
    return this.collect((row, col) =>
      this._buttons[row][col] &&
      (color === undefined || this._colors[row][col] === color),
    );
  }

  /**
   * Cells an entity may currently occupy: empty cells, buttons and
   * deactivated walls.
   */
  findTraversableCells(): Cell[] {
    return this.collect((row, col) => this.traversableAt(row, col));
  }

  isTraversable(cell: Cell): boolean {
    return this.inBounds(cell) && this.traversableAt(cell.row, cell.col);
  }

  /** Flip the active state of every wall of `color`. */
  toggle(color: number): void {
    for (const { row, col } of this.findWalls(color)) {
      this._active[row][col] = !this._active[row][col];
    }
    this._revision++;
  }

  /**
   * Map a pixel on the rendered canvas to the cell under it.
   * Throws BoundsError for points outside the canvas.
   */
  gridCoordFromPixel(x: number, y: number): Cell {
    const { width, height } = this.canvasSize;
    if (!(x >= 0 && x < width && y >= 0 && y < height)) {
      throw new BoundsError(`Pixel (${x}, ${y}) is outside the ${width}x${height} canvas`);
    }
    const cell = this.cellSize;
    // y / cell.height can round up to `rows` just inside the bottom edge
    return {
      row: Math.min(this.shape.rows - 1, Math.trunc(y / cell.height)),
      col: Math.min(this.shape.cols - 1, Math.trunc(x / cell.width)),
    };
  }

  /**
   * Place a wall of `color` at `cell`, or clear the wall there when
   * `color` is 0. Any button at the cell is removed.
   */
  placeWall(cell: Cell, color: number, options: WallOptions = {}): void {
    const { row, col } = this.checkCell(cell, "wall");
    checkColor(color, "for a wall");
    if (color === 0) {
      this._walls[row][col] = 0;
    } else {
      this._walls[row][col] = 1;
      this._active[row][col] = options.active ?? true;
    }
    this._colors[row][col] = color;
    this._buttons[row][col] = false;
    this._revision++;
  }

  /**
   * Place a button of `color` at `cell`, or clear the button there when
   * `color` is 0. Any wall at the cell is removed.
   */
  placeButton(cell: Cell, color: number): void {
    const { row, col } = this.checkCell(cell, "button");
    checkColor(color, "for a button");
    this._buttons[row][col] = color !== 0;
    this._walls[row][col] = 0;
    this._colors[row][col] = color;
    this._active[row][col] = true;
    this._revision++;
  }

  placeTarget(cell: Cell): void {
    this._target = { ...this.checkCell(cell, "target") };
    this.clearCell(this._target);
  }

  placeSpawn(cell: Cell): void {
    this._spawn = { ...this.checkCell(cell, "spawn") };
    this.clearCell(this._spawn);
  }

  /** Deep copy: the clone shares no arrays with this track. */
  clone(): RaceTrack {
    return RaceTrack.fromSnapshot(this.toSnapshot());
  }

  toSnapshot(): TrackSnapshot {
    return {
      walls: this._walls.map(r => [...r]),
      active: this._active.map(r => [...r]),
      buttons: this._buttons.map(r => [...r]),
      colors: this._colors.map(r => [...r]),
      target: this.target,
      spawn: this.spawn,
      canvasSize: { ...this.canvasSize },
    };
  }

  static fromSnapshot(snapshot: TrackSnapshot): RaceTrack {
    return new RaceTrack(
      snapshot.walls,
      snapshot.active,
      snapshot.buttons,
      snapshot.colors,
      snapshot.target,
      snapshot.spawn,
      snapshot.canvasSize,
    );
  }

  private traversableAt(row: number, col: number): boolean {
    return this._walls[row][col] === 0 || !this._active[row][col];
  }

  private collect(predicate: (row: number, col: number) => boolean): Cell[] {
    const cells: Cell[] = [];
    for (let row = 0; row < this.shape.rows; row++) {
      for (let col = 0; col < this.shape.cols; col++) {
        if (predicate(row, col)) cells.push({ row, col });
      }
    }
    return cells;
  }

  private clearCell({ row, col }: Cell): void {
    this._walls[row][col] = 0;
    this._buttons[row][col] = false;
    this._colors[row][col] = 0;
    this._active[row][col] = true;
    this._revision++;
  }

  private checkCell(cell: Cell, what: string): Cell {
    if (!this.inBounds(cell)) {
      throw new BoundsError(
        `Cannot place ${what} at (${cell.row}, ${cell.col}): grid is ${this.shape.rows}x${this.shape.cols}`,
      );
    }
    return cell;
  }
}

/**
 * Create an empty track: no walls, buttons or colors, every cell active,
 * spawn in the top-left corner and target in the bottom-right.
 */
export function blankTrack(gridSize: GridShape, canvasSize: CanvasSize): RaceTrack {
  const { rows, cols } = gridSize;
  if (!(Number.isInteger(rows) && Number.isInteger(cols) && rows > 0 && cols > 0)) {
    throw new RangeError(`Grid size must be positive integers, got ${rows}x${cols}`);
  }
  const fill = <T>(value: T): T[][] =>
    Array.from({ length: rows }, () => new Array<T>(cols).fill(value));
  return new RaceTrack(
    fill(0),
    fill(true),
    fill(false),
    fill(0),
    { row: rows - 1, col: cols - 1 },
    { row: 0, col: 0 },
    canvasSize,
  );
}

function checkColor(color: number, where: string): void {
  if (!(Number.isInteger(color) && color >= 0 && color < PALETTE.length)) {
    throw new RangeError(`Color ${color} ${where} is not in the ${PALETTE.length}-color palette`);
  }
}

/** Rows × cols of a layer; throws if the layer is empty or ragged. */
function shapeOf(layer: readonly (readonly unknown[])[], name: string): GridShape {
  const rows = layer.length;
  const cols = rows > 0 ? layer[0].length : 0;
  if (rows === 0 || cols === 0) {
    throw new ShapeMismatchError(`Layer ${name} is empty`);
  }
  for (let r = 1; r < rows; r++) {
    if (layer[r].length !== cols) {
      throw new ShapeMismatchError(
        `Layer ${name} is ragged: row ${r} has ${layer[r].length} columns, expected ${cols}`,
      );
    }
  }
  return { rows, cols };
}
