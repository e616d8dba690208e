/**
 * Binary track format.
 *
 * Layout (big-endian):
 *   magic "RTRK" | u16 version | u16 rows | u16 cols
 *   walls[rows*cols] u8 | active[rows*cols] u8 | buttons[rows*cols] u8 | colors[rows*cols] u8
 *   u16 target row | u16 target col | u16 spawn row | u16 spawn col
 *   u32 canvas width | u32 canvas height
 *
 * The version field lets later formats add fields without misreading
 * older files.
 */

import { RaceTrack } from '../track/race-track.js';
import { PersistenceError } from '../track/errors.js';
import type { Layer } from '../track/types.js';

export const TRACK_MAGIC = 'RTRK';
export const TRACK_FORMAT_VERSION = 1;

const HEADER_BYTES = 4 + 2 + 2 + 2;
const FOOTER_BYTES = 4 * 2 + 2 * 4;
const U8_MAX = 0xff;
const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

/** Total record size for a grid of the given shape. */
export function encodedSize(rows: number, cols: number): number {
  return HEADER_BYTES + 4 * rows * cols + FOOTER_BYTES;
}

export function encodeTrack(track: RaceTrack): Uint8Array {
  const { rows, cols } = track.shape;
  const { width, height } = track.canvasSize;
  checkFits(rows, U16_MAX, 'row count');
  checkFits(cols, U16_MAX, 'column count');
  checkFits(width, U32_MAX, 'canvas width');
  checkFits(height, U32_MAX, 'canvas height');

  const bytes = new Uint8Array(encodedSize(rows, cols));
  const view = new DataView(bytes.buffer);
  let offset = 0;

  for (let i = 0; i < TRACK_MAGIC.length; i++) {
    view.setUint8(offset++, TRACK_MAGIC.charCodeAt(i));
  }
  view.setUint16(offset, TRACK_FORMAT_VERSION); offset += 2;
  view.setUint16(offset, rows); offset += 2;
  view.setUint16(offset, cols); offset += 2;

  offset = writeLayer(bytes, offset, track.walls, v => v, 'walls');
  offset = writeLayer(bytes, offset, track.active, v => (v ? 1 : 0), 'active');
  offset = writeLayer(bytes, offset, track.buttons, v => (v ? 1 : 0), 'buttons');
  offset = writeLayer(bytes, offset, track.colors, v => v, 'colors');

  const { target, spawn } = track;
  for (const value of [target.row, target.col, spawn.row, spawn.col]) {
    view.setUint16(offset, value); offset += 2;
  }
  view.setUint32(offset, width); offset += 4;
  view.setUint32(offset, height);
  return bytes;
}

/**
 * Rebuild a track from a record produced by `encodeTrack`.
 * Any malformed input raises PersistenceError.
 */
export function decodeTrack(bytes: Uint8Array): RaceTrack {
  if (bytes.length < HEADER_BYTES) {
    throw new PersistenceError(`Track record is truncated: ${bytes.length} bytes`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let offset = 0;

  const magic = String.fromCharCode(...bytes.subarray(0, TRACK_MAGIC.length));
  offset += TRACK_MAGIC.length;
  if (magic !== TRACK_MAGIC) {
    throw new PersistenceError('Not a track file: bad magic');
  }
  const version = view.getUint16(offset); offset += 2;
  if (version !== TRACK_FORMAT_VERSION) {
    throw new PersistenceError(`Unsupported track format version ${version}`);
  }
  const rows = view.getUint16(offset); offset += 2;
  const cols = view.getUint16(offset); offset += 2;
  const expected = encodedSize(rows, cols);
  if (bytes.length !== expected) {
    throw new PersistenceError(
      `Track record for a ${rows}x${cols} grid must be ${expected} bytes, got ${bytes.length}`,
    );
  }

  const walls = readLayer(bytes, offset, rows, cols, v => v);
  offset += rows * cols;
  const active = readLayer(bytes, offset, rows, cols, v => toBoolean(v, 'active'));
  offset += rows * cols;
  const buttons = readLayer(bytes, offset, rows, cols, v => toBoolean(v, 'buttons'));
  offset += rows * cols;
  const colors = readLayer(bytes, offset, rows, cols, v => v);
  offset += rows * cols;

  const read16 = () => {
    const value = view.getUint16(offset);
    offset += 2;
    return value;
  };
  const target = { row: read16(), col: read16() };
  const spawn = { row: read16(), col: read16() };
  const width = view.getUint32(offset);
  const height = view.getUint32(offset + 4);

  try {
    return new RaceTrack(walls, active, buttons, colors, target, spawn, { width, height });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PersistenceError(`Track record is corrupt: ${reason}`, { cause: err });
  }
}

function writeLayer<T>(
  bytes: Uint8Array,
  offset: number,
  layer: Layer<T>,
  toByte: (value: T) => number,
  name: string,
): number {
  for (const row of layer) {
    for (const value of row) {
      const byte = toByte(value);
      if (!Number.isInteger(byte) || byte < 0 || byte > U8_MAX) {
        throw new PersistenceError(`Layer ${name} holds ${String(value)}, which does not fit in a byte`);
      }
      bytes[offset++] = byte;
    }
  }
  return offset;
}

function readLayer<T>(
  bytes: Uint8Array,
  offset: number,
  rows: number,
  cols: number,
  fromByte: (value: number) => T,
): T[][] {
  const layer: T[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: T[] = [];
    for (let c = 0; c < cols; c++) {
      row.push(fromByte(bytes[offset + r * cols + c]));
    }
    layer.push(row);
  }
  return layer;
}

function toBoolean(byte: number, name: string): boolean {
  if (byte > 1) throw new PersistenceError(`Layer ${name} holds ${byte}; expected 0 or 1`);
  return byte === 1;
}

function checkFits(value: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new PersistenceError(`Cannot store ${what} ${value}: out of range for the track format`);
  }
}
