/**
 * Message protocol between the editor client and the track server.
 *
 * The server owns the tracks directory; the browser editor asks it to
 * list, load and save tracks. Tracks travel as JSON snapshots and are
 * stored on disk in the binary track format.
 */

import type { EditorConfig } from '../config.js';
import type { TrackSnapshot } from '../track/types.js';

// -- Client → Server --

export type ClientMessage =
  | { type: 'list-tracks' }
  | { type: 'load-track'; name: string }
  | { type: 'save-track'; name: string; track: TrackSnapshot }
  | { type: 'ping' };

// -- Server → Client --

export type ServerMessage =
  | { type: 'welcome'; config: EditorConfig; tracks: string[] }
  | { type: 'track-list'; tracks: string[] }
  | { type: 'track-loaded'; name: string; track: TrackSnapshot }
  | { type: 'track-saved'; name: string; tracks: string[] }
  | { type: 'error'; message: string }
  | { type: 'pong' };

/** Minimal logging surface; `console` satisfies it. */
export type Logger = Pick<Console, 'log' | 'error'>;
