import { readFileSync, writeFileSync } from 'fs';
import { PersistenceError } from '../track/errors.js';
import type { RaceTrack } from '../track/race-track.js';
import { decodeTrack, encodeTrack } from './codec.js';

/** Extension used for saved tracks. */
export const TRACK_FILE_EXTENSION = '.track';

/**
 * Write the whole track to `path`, replacing any existing file.
 */
export function saveTrack(track: RaceTrack, path: string): void {
  const bytes = encodeTrack(track);
  try {
    writeFileSync(path, bytes);
  } catch (err) {
    throw new PersistenceError(`Could not write track to ${path}: ${reason(err)}`, { cause: err });
  }
}

/**
 * Read a track saved by `saveTrack`. The stored canvas size comes back
 * with it, so the caller can re-render at the original dimensions.
 */
export function loadTrack(path: string): RaceTrack {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    throw new PersistenceError(`Could not read track from ${path}: ${reason(err)}`, { cause: err });
  }
  return decodeTrack(bytes);
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
