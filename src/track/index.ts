export { RaceTrack, blankTrack } from "./race-track.js";
export { parseSnapshot } from "./snapshot.js";
export { ShapeMismatchError, BoundsError, PersistenceError } from "./errors.js";
export type {
  CanvasSize,
  Cell,
  GridShape,
  Layer,
  PaintKind,
  TrackSnapshot,
  WallOptions,
} from "./types.js";
