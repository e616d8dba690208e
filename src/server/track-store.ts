import { existsSync, mkdirSync, readdirSync } from 'fs';
import { join } from 'path';
import { RaceTrack } from '../track/race-track.js';
import { TRACK_FILE_EXTENSION, loadTrack, saveTrack } from '../persistence/track-file.js';
import { isValidTrackName } from './track-name.js';

/**
 * A directory of `<name>.track` files.
 */
export interface TrackStore {
  readonly dir: string;
  /** Saved track names, sorted. */
  list(): string[];
  load(name: string): RaceTrack;
  save(name: string, track: RaceTrack): void;
}

export function createTrackStore(dir: string): TrackStore {
  function pathFor(name: string): string {
    if (!isValidTrackName(name)) {
      throw new Error(`Invalid track name: ${JSON.stringify(name)}`);
    }
    return join(dir, name + TRACK_FILE_EXTENSION);
  }

  return {
    dir,

    list() {
      if (!existsSync(dir)) return [];
      return readdirSync(dir)
        .filter(file => file.endsWith(TRACK_FILE_EXTENSION))
        .map(file => file.slice(0, -TRACK_FILE_EXTENSION.length))
        .filter(isValidTrackName)
        .sort();
    },

    load(name) {
      return loadTrack(pathFor(name));
    },

    save(name, track) {
      const path = pathFor(name);
      mkdirSync(dir, { recursive: true });
      saveTrack(track, path);
    },
  };
}
