import type { Cell, GridShape } from '../track/types.js';

/**
 * Cells covered by a square brush of `radius` around `center`: the
 * (2 * radius - 1) wide square, clipped to the grid. Radius 1 is the
 * centre cell alone. Row-major order.
 */
export function brushCells(center: Cell, radius: number, shape: GridShape): Cell[] {
  if (!Number.isInteger(radius) || radius < 1) {
    throw new RangeError(`Brush radius must be a positive integer, got ${radius}`);
  }
  const cells: Cell[] = [];
  const rowEnd = Math.min(shape.rows, center.row + radius);
  const colEnd = Math.min(shape.cols, center.col + radius);
  for (let row = Math.max(0, center.row - radius + 1); row < rowEnd; row++) {
    for (let col = Math.max(0, center.col - radius + 1); col < colEnd; col++) {
      cells.push({ row, col });
    }
  }
  return cells;
}

export function cellKey(cell: Cell): string {
  return `${cell.row},${cell.col}`;
}
