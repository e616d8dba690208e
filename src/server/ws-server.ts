/**
 * WebSocket server for the track editor.
 *
 * Thin adapter layer: maps JSON messages from editor clients onto the
 * track store. Uses the `ws` library for WebSocket support.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { basename, extname } from 'path';
import type { ServerConfig } from '../config.js';
import { RaceTrack } from '../track/race-track.js';
import { parseSnapshot } from '../track/snapshot.js';
import { loadTrack } from '../persistence/track-file.js';
import { createTrackStore } from './track-store.js';
import type { TrackStore } from './track-store.js';
import type { ClientMessage, Logger, ServerMessage } from './types.js';

const LOG_PREFIX = '[track-server]';

export interface TrackServerOptions {
  /** Defaults to `console`. */
  logger?: Logger;
}

export interface TrackServer {
  /** The underlying WebSocket server. */
  wss: WebSocketServer;
  store: TrackStore;
  /** Shut down the server and drop every client. */
  close(): void;
}

/**
 * Create and start a track server on `config.port`.
 */
export function createTrackServer(config: ServerConfig, options: TrackServerOptions = {}): TrackServer {
  const logger = options.logger ?? console;
  const store = createTrackStore(config.tracksDir);
  const wss = new WebSocketServer({ port: config.port });

  wss.on('connection', (ws: WebSocket) => {
    sendJson(ws, { type: 'welcome', config: config.editor, tracks: store.list() });

    const startingTrack = config.editor.startingTrackPath;
    if (startingTrack) {
      try {
        const track = loadTrack(startingTrack);
        sendJson(ws, { type: 'track-loaded', name: trackNameFromPath(startingTrack), track: track.toSnapshot() });
      } catch (err) {
        const message = errorMessage(err);
        logger.error(`${LOG_PREFIX} could not open starting track: ${message}`);
        sendJson(ws, { type: 'error', message });
      }
    }

    // Frames that break the protocol surface here
    ws.on('error', (err: Error) => {
      logger.error(`${LOG_PREFIX} socket error: ${errorMessage(err)}`);
    });

    ws.on('message', (data: RawData) => {
      try {
        const message = parseClientMessage(data.toString());
        handleMessage(ws, message, store, logger);
      } catch (err) {
        const message = errorMessage(err);
        logger.error(`${LOG_PREFIX} ${message}`);
        sendJson(ws, { type: 'error', message });
      }
    });
  });

  return {
    wss,
    store,
    close() {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close();
    },
  };
}

// -- Message Handling --

function handleMessage(ws: WebSocket, message: ClientMessage, store: TrackStore, logger: Logger): void {
  switch (message.type) {
    case 'ping':
      sendJson(ws, { type: 'pong' });
      break;

    case 'list-tracks':
      sendJson(ws, { type: 'track-list', tracks: store.list() });
      break;

    case 'load-track': {
      const track = store.load(message.name);
      logger.log(`${LOG_PREFIX} loaded ${message.name}`);
      sendJson(ws, { type: 'track-loaded', name: message.name, track: track.toSnapshot() });
      break;
    }

    case 'save-track': {
      const track = RaceTrack.fromSnapshot(message.track);
      store.save(message.name, track);
      logger.log(`${LOG_PREFIX} saved ${message.name} (${track.shape.rows}x${track.shape.cols})`);
      sendJson(ws, { type: 'track-saved', name: message.name, tracks: store.list() });
      break;
    }
  }
}

/**
 * Parse and validate a raw client frame. Throws with a message suitable
 * for sending back to the client.
 */
export function parseClientMessage(raw: string): ClientMessage {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new Error('Invalid message: not JSON');
  }
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    throw new Error('Invalid message: missing type');
  }

  switch (value.type) {
    case 'ping':
      return { type: 'ping' };
    case 'list-tracks':
      return { type: 'list-tracks' };
    case 'load-track':
      return { type: 'load-track', name: requireName(value) };
    case 'save-track': {
      const name = requireName(value);
      if (!('track' in value)) throw new Error('Invalid message: save-track needs a track');
      return { type: 'save-track', name, track: parseSnapshot(value.track) };
    }
    default:
      throw new Error(`Unknown message type: ${String(value.type)}`);
  }
}

function requireName(value: object): string {
  if (!('name' in value) || typeof value.name !== 'string' || value.name === '') {
    throw new Error('Track name is required');
  }
  return value.name;
}

function trackNameFromPath(path: string): string {
  return basename(path, extname(path));
}

function sendJson(ws: WebSocket, data: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
