import { PALETTE } from "../render/palette.js";
import type { CanvasSize, Cell, TrackSnapshot } from "./types.js";

/**
 * Validate an untrusted JSON value (e.g. from the wire) as a TrackSnapshot.
 * Shape agreement between layers is left to the RaceTrack constructor.
 */
export function parseSnapshot(value: unknown): TrackSnapshot {
  if (!isRecord(value)) throw new Error("Track must be an object");
  return {
    walls: parseLayer(value.walls, "walls", isInteger),
    active: parseLayer(value.active, "active", isBoolean),
    buttons: parseLayer(value.buttons, "buttons", isBoolean),
    colors: parseLayer(value.colors, "colors", isPaletteIndex),
    target: parseCell(value.target, "target"),
    spawn: parseCell(value.spawn, "spawn"),
    canvasSize: parseCanvasSize(value.canvasSize),
  };
}

function parseLayer<T>(value: unknown, name: string, check: (v: unknown) => v is T): T[][] {
  if (!Array.isArray(value)) throw new Error(`Layer ${name} must be an array of rows`);
  return value.map((row: unknown, r) => {
    if (!Array.isArray(row)) throw new Error(`Layer ${name} row ${r} must be an array`);
    return row.map((v: unknown, c) => {
      if (!check(v)) throw new Error(`Layer ${name} has an invalid value at (${r}, ${c})`);
      return v;
    });
  });
}

function parseCell(value: unknown, name: string): Cell {
  if (!isRecord(value) || !isInteger(value.row) || !isInteger(value.col)) {
    throw new Error(`${name} must be a { row, col } pair of integers`);
  }
  return { row: value.row, col: value.col };
}

function parseCanvasSize(value: unknown): CanvasSize {
  if (!isRecord(value) || !isInteger(value.width) || !isInteger(value.height)) {
    throw new Error("canvasSize must be a { width, height } pair of integers");
  }
  return { width: value.width, height: value.height };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function isPaletteIndex(value: unknown): value is number {
  return isInteger(value) && value >= 0 && value < PALETTE.length;
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}
