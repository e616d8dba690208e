/**
 * Track server: lets the browser editor list, load and save tracks in a
 * directory on disk over a WebSocket.
 */

export type { TrackServer, TrackServerOptions } from './ws-server.js';
export { createTrackServer, parseClientMessage } from './ws-server.js';
export type { TrackStore } from './track-store.js';
export { createTrackStore } from './track-store.js';
export { isValidTrackName } from './track-name.js';
export type { ClientMessage, ServerMessage, Logger } from './types.js';
