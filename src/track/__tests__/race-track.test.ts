import { describe, it, expect } from "vitest";
import { RaceTrack, blankTrack } from "../race-track.js";
import { BoundsError, ShapeMismatchError } from "../errors.js";
import type { Cell } from "../types.js";

const CANVAS = { width: 600, height: 900 };

function key(cells: Cell[]): string[] {
  return cells.map(c => `${c.row},${c.col}`);
}

function layer<T>(rows: number, cols: number, value: T): T[][] {
  return Array.from({ length: rows }, () => new Array<T>(cols).fill(value));
}

describe("RaceTrack", () => {
  describe("construction", () => {
    it("creates a blank 15x10 track with spawn top-left and target bottom-right", () => {
      const track = blankTrack({ rows: 15, cols: 10 }, CANVAS);
      expect(track.shape).toEqual({ rows: 15, cols: 10 });
      expect(track.target).toEqual({ row: 14, col: 9 });
      expect(track.spawn).toEqual({ row: 0, col: 0 });
      expect(track.findWalls()).toEqual([]);
      expect(track.findButtons()).toEqual([]);
      expect(track.findTraversableCells()).toHaveLength(150);
      expect(track.revision).toBe(0);
    });

    it("rejects layers of different shapes", () => {
      expect(() => new RaceTrack(
        layer(5, 5, 0),
        layer(5, 4, true),
        layer(5, 5, false),
        layer(5, 5, 0),
        { row: 4, col: 4 },
        { row: 0, col: 0 },
        CANVAS,
      )).toThrow(ShapeMismatchError);
    });

    it("rejects a colors layer with a different row count", () => {
      expect(() => new RaceTrack(
        layer(5, 5, 0),
        layer(5, 5, true),
        layer(5, 5, false),
        layer(4, 5, 0),
        { row: 4, col: 4 },
        { row: 0, col: 0 },
        CANVAS,
      )).toThrow("colors is 4x5");
    });

    it("rejects ragged layers", () => {
      const walls = layer(3, 3, 0);
      walls[1] = [0, 0];
      expect(() => new RaceTrack(
        walls,
        layer(3, 3, true),
        layer(3, 3, false),
        layer(3, 3, 0),
        { row: 2, col: 2 },
        { row: 0, col: 0 },
        CANVAS,
      )).toThrow(ShapeMismatchError);
    });

    it("rejects a target outside the grid", () => {
      expect(() => new RaceTrack(
        layer(3, 3, 0),
        layer(3, 3, true),
        layer(3, 3, false),
        layer(3, 3, 0),
        { row: 3, col: 0 },
        { row: 0, col: 0 },
        CANVAS,
      )).toThrow(BoundsError);
    });

    it("rejects colors outside the palette", () => {
      const colors = layer(3, 3, 0);
      colors[0][1] = 8;
      expect(() => new RaceTrack(
        layer(3, 3, 0),
        layer(3, 3, true),
        layer(3, 3, false),
        colors,
        { row: 2, col: 2 },
        { row: 0, col: 0 },
        CANVAS,
      )).toThrow("Color 8 at (0, 1) is not in the 8-color palette");
    });

    it("rejects a fractional canvas size", () => {
      expect(() => blankTrack({ rows: 3, cols: 3 }, { width: 600.5, height: 900 })).toThrow(
        "Canvas size must be positive integers, got 600.5x900",
      );
    });

    it("copies the layers it is given", () => {
      const walls = layer(2, 2, 0);
      const track = new RaceTrack(
        walls,
        layer(2, 2, true),
        layer(2, 2, false),
        layer(2, 2, 0),
        { row: 1, col: 1 },
        { row: 0, col: 0 },
        CANVAS,
      );
      walls[0][1] = 1;
      expect(track.walls[0][1]).toBe(0);
      expect(track.findWalls()).toEqual([]);
    });

    it("rejects a non-positive grid size", () => {
      expect(() => blankTrack({ rows: 0, cols: 4 }, CANVAS)).toThrow(RangeError);
    });
  });

  describe("queries", () => {
    it("finds a placed wall by color and excludes it from traversable cells", () => {
      const track = blankTrack({ rows: 15, cols: 10 }, CANVAS);
      track.placeWall({ row: 2, col: 3 }, 1);

      expect(track.findWalls(1)).toEqual([{ row: 2, col: 3 }]);
      expect(track.findWalls(2)).toEqual([]);
      expect(track.findTraversableCells()).toHaveLength(149);
      expect(key(track.findTraversableCells())).not.toContain("2,3");
      expect(track.isTraversable({ row: 2, col: 3 })).toBe(false);
    });

    it("filters walls by active state", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeWall({ row: 0, col: 1 }, 2);
      track.placeWall({ row: 1, col: 1 }, 2, { active: false });
      track.placeWall({ row: 2, col: 1 }, 3, { active: false });

      expect(track.findWalls(2, true)).toEqual([{ row: 0, col: 1 }]);
      expect(track.findWalls(2, false)).toEqual([{ row: 1, col: 1 }]);
      expect(track.findWalls(undefined, false)).toEqual([
        { row: 1, col: 1 },
        { row: 2, col: 1 },
      ]);
      expect(track.findWalls()).toHaveLength(3);
    });

    it("finds buttons by color", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeButton({ row: 1, col: 0 }, 4);
      track.placeButton({ row: 2, col: 2 }, 5);

      expect(track.findButtons()).toEqual([{ row: 1, col: 0 }, { row: 2, col: 2 }]);
      expect(track.findButtons(5)).toEqual([{ row: 2, col: 2 }]);
    });

    it("treats buttons, empty cells and inactive walls as traversable", () => {
      const track = blankTrack({ rows: 2, cols: 3 }, CANVAS);
      track.placeButton({ row: 0, col: 0 }, 2);
      track.placeWall({ row: 0, col: 1 }, 2, { active: false });
      track.placeWall({ row: 0, col: 2 }, 3);

      expect(key(track.findTraversableCells())).toEqual(["0,0", "0,1", "1,0", "1,1", "1,2"]);
    });

    it("reports cells outside the grid as not traversable", () => {
      const track = blankTrack({ rows: 2, cols: 2 }, CANVAS);
      expect(track.isTraversable({ row: -1, col: 0 })).toBe(false);
      expect(track.isTraversable({ row: 0, col: 2 })).toBe(false);
    });
  });

  describe("toggle", () => {
    it("makes a toggled wall traversable", () => {
      const track = blankTrack({ rows: 15, cols: 10 }, CANVAS);
      track.placeWall({ row: 2, col: 3 }, 1);
      track.toggle(1);

      expect(key(track.findTraversableCells())).toContain("2,3");
      expect(track.findWalls(1, false)).toEqual([{ row: 2, col: 3 }]);
    });

    it("inverts only walls of the toggled color", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeWall({ row: 0, col: 0 }, 2);
      track.placeWall({ row: 0, col: 1 }, 2, { active: false });
      track.placeWall({ row: 1, col: 1 }, 3);

      track.toggle(2);

      expect(track.active[0][0]).toBe(false);
      expect(track.active[0][1]).toBe(true);
      expect(track.active[1][1]).toBe(true);
    });

    it("restores the original state when applied twice", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeWall({ row: 2, col: 0 }, 6);
      const before = track.toSnapshot();
      track.toggle(6);
      track.toggle(6);
      expect(track.toSnapshot()).toEqual(before);
    });

    it("bumps the revision", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.toggle(1);
      expect(track.revision).toBe(1);
    });
  });

  describe("typed edits", () => {
    it("clears a button when a wall is placed over it", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeButton({ row: 1, col: 1 }, 3);
      track.placeWall({ row: 1, col: 1 }, 5);

      expect(track.buttons[1][1]).toBe(false);
      expect(track.walls[1][1]).toBe(1);
      expect(track.colors[1][1]).toBe(5);
    });

    it("clears a wall and reactivates the cell when a button is placed over it", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeWall({ row: 1, col: 1 }, 3, { active: false });
      track.placeButton({ row: 1, col: 1 }, 4);

      expect(track.walls[1][1]).toBe(0);
      expect(track.active[1][1]).toBe(true);
      expect(track.buttons[1][1]).toBe(true);
      expect(track.colors[1][1]).toBe(4);
    });

    it("erases walls and buttons with color 0", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeWall({ row: 0, col: 0 }, 2);
      track.placeButton({ row: 0, col: 1 }, 2);
      track.placeWall({ row: 0, col: 0 }, 0);
      track.placeButton({ row: 0, col: 1 }, 0);

      expect(track.findWalls()).toEqual([]);
      expect(track.findButtons()).toEqual([]);
      expect(track.colors[0][0]).toBe(0);
    });

    it("clears the cell under a moved target and spawn", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeWall({ row: 1, col: 2 }, 2, { active: false });
      track.placeButton({ row: 2, col: 0 }, 3);

      track.placeTarget({ row: 1, col: 2 });
      track.placeSpawn({ row: 2, col: 0 });

      expect(track.target).toEqual({ row: 1, col: 2 });
      expect(track.spawn).toEqual({ row: 2, col: 0 });
      expect(track.walls[1][2]).toBe(0);
      expect(track.active[1][2]).toBe(true);
      expect(track.buttons[2][0]).toBe(false);
      expect(track.colors[2][0]).toBe(0);
    });

    it("rejects edits outside the grid", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      expect(() => track.placeWall({ row: 3, col: 0 }, 1)).toThrow(BoundsError);
      expect(() => track.placeSpawn({ row: 0, col: -1 })).toThrow(BoundsError);
    });

    it("rejects colors outside the palette and leaves the track untouched", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      expect(() => track.placeWall({ row: 0, col: 0 }, 9)).toThrow(
        "Color 9 for a wall is not in the 8-color palette",
      );
      expect(() => track.placeButton({ row: 0, col: 0 }, -1)).toThrow(RangeError);
      expect(track.revision).toBe(0);
      expect(track.colors[0][0]).toBe(0);
    });

    it("does not expose the markers for direct mutation", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      const target = track.target;
      target.row = 0;
      expect(track.target).toEqual({ row: 2, col: 2 });
    });
  });

  describe("gridCoordFromPixel", () => {
    const track = blankTrack({ rows: 15, cols: 10 }, CANVAS);

    it("truncates pixel positions to cells", () => {
      // cells are 60 x 60
      expect(track.gridCoordFromPixel(0, 0)).toEqual({ row: 0, col: 0 });
      expect(track.gridCoordFromPixel(59.9, 60)).toEqual({ row: 1, col: 0 });
      expect(track.gridCoordFromPixel(599, 899)).toEqual({ row: 14, col: 9 });
      expect(track.gridCoordFromPixel(185, 130)).toEqual({ row: 2, col: 3 });
    });

    it("keeps points just inside the far edges in the last cell", () => {
      // 399 / 39 rounds, so y / cellHeight reaches 39 here
      const uneven = blankTrack({ rows: 39, cols: 39 }, { width: 399, height: 399 });
      const edge = 398.99999999999994;
      expect(uneven.gridCoordFromPixel(edge, edge)).toEqual({ row: 38, col: 38 });
    });

    it("rejects points outside the canvas", () => {
      expect(() => track.gridCoordFromPixel(600, 10)).toThrow(BoundsError);
      expect(() => track.gridCoordFromPixel(10, -1)).toThrow(BoundsError);
    });
  });

  describe("snapshots", () => {
    it("clones without sharing layers", () => {
      const track = blankTrack({ rows: 3, cols: 3 }, CANVAS);
      track.placeWall({ row: 0, col: 1 }, 2);
      const copy = track.clone();
      copy.toggle(2);

      expect(track.active[0][1]).toBe(true);
      expect(copy.active[0][1]).toBe(false);
    });

    it("round-trips through toSnapshot and fromSnapshot", () => {
      const track = blankTrack({ rows: 2, cols: 4 }, { width: 400, height: 200 });
      track.placeButton({ row: 0, col: 3 }, 7);
      track.placeSpawn({ row: 1, col: 1 });

      const restored = RaceTrack.fromSnapshot(track.toSnapshot());
      expect(restored.toSnapshot()).toEqual(track.toSnapshot());
      expect(restored.canvasSize).toEqual({ width: 400, height: 200 });
    });
  });
});
