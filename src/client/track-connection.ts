/**
 * Track Connection: the browser's link to the track server.
 *
 * Holds at most one socket at a time. A dropped socket is replaced after a
 * doubling delay; a ping left unanswered closes the socket so the same path
 * replaces it.
 */

import { createEditorConfig, type EditorConfig } from '../config.js';
import { parseSnapshot } from '../track/snapshot.js';
import type { ClientMessage, ServerMessage } from '../server/types.js';

export type ConnectionStatus = 'connecting' | 'connected' | 'disconnected' | 'reconnecting';

export interface TrackConnectionOptions {
  url: string;
  onMessage?: (message: ServerMessage) => void;
  onStatusChange?: (status: ConnectionStatus) => void;
}

export interface TrackConnection {
  /** Send if the socket is open. Returns whether the message went out. */
  send(message: ClientMessage): boolean;
  /** Close the socket and stop reconnecting. */
  destroy(): void;
}

export const FIRST_RETRY_DELAY = 500;
export const MAX_RETRY_DELAY = 10_000;
export const PING_INTERVAL = 25_000;
/** A ping without a pong inside this window marks the socket dead. */
export const PONG_TIMEOUT = 10_000;

const LOG_PREFIX = '[track-client]';

/** `ws(s)://<host>/ws` for the page the editor was served from. */
export function defaultTrackServerUrl(location: Pick<Location, 'protocol' | 'host'>): string {
  const scheme = location.protocol === 'https:' ? 'wss:' : 'ws:';
  return `${scheme}//${location.host}/ws`;
}

export function createTrackConnection(options: TrackConnectionOptions): TrackConnection {
  const { url, onMessage, onStatusChange } = options;

  let socket: WebSocket | null = null;
  let destroyed = false;
  let retryDelay = FIRST_RETRY_DELAY;
  let retryTimer: ReturnType<typeof setTimeout> | null = null;
  let pingTimer: ReturnType<typeof setInterval> | null = null;
  let pongTimer: ReturnType<typeof setTimeout> | null = null;

  function clearHeartbeat(): void {
    if (pingTimer) clearInterval(pingTimer);
    if (pongTimer) clearTimeout(pongTimer);
    pingTimer = null;
    pongTimer = null;
  }

  function open(retrying: boolean): void {
    const ws = new WebSocket(url);
    socket = ws;
    onStatusChange?.(retrying ? 'reconnecting' : 'connecting');

    ws.onopen = () => {
      retryDelay = FIRST_RETRY_DELAY;
      onStatusChange?.('connected');
      pingTimer = setInterval(() => {
        if (ws.readyState !== WebSocket.OPEN || pongTimer) return;
        ws.send(JSON.stringify({ type: 'ping' }));
        pongTimer = setTimeout(() => ws.close(), PONG_TIMEOUT);
      }, PING_INTERVAL);
    };

    ws.onmessage = (event: MessageEvent) => {
      if (typeof event.data !== 'string') return;
      let message: ServerMessage;
      try {
        message = parseServerMessage(event.data);
      } catch (err) {
        console.error(`${LOG_PREFIX} dropped server message: ${err instanceof Error ? err.message : String(err)}`);
        return;
      }
      if (message.type === 'pong') {
        if (pongTimer) clearTimeout(pongTimer);
        pongTimer = null;
        return;
      }
      onMessage?.(message);
    };

    ws.onclose = () => {
      clearHeartbeat();
      socket = null;
      onStatusChange?.('disconnected');
      const delay = retryDelay;
      retryDelay = Math.min(delay * 2, MAX_RETRY_DELAY);
      retryTimer = setTimeout(() => {
        retryTimer = null;
        open(true);
      }, delay);
    };
  }

  open(false);

  return {
    send(message) {
      if (destroyed || !socket || socket.readyState !== WebSocket.OPEN) return false;
      socket.send(JSON.stringify(message));
      return true;
    },

    destroy() {
      if (destroyed) return;
      destroyed = true;
      clearHeartbeat();
      if (retryTimer) clearTimeout(retryTimer);
      retryTimer = null;
      if (socket) {
        socket.onopen = null;
        socket.onmessage = null;
        socket.onclose = null;
        socket.close();
        socket = null;
      }
    },
  };
}

// -- Message Parsing --

/** Validate a frame from the server. Throws on anything off-protocol. */
export function parseServerMessage(raw: string): ServerMessage {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new Error('Invalid message: not JSON');
  }
  if (!isRecord(value)) throw new Error('Invalid message: missing type');

  const type = value.type;
  switch (type) {
    case 'pong':
      return { type: 'pong' };
    case 'welcome':
      return { type: 'welcome', config: requireConfig(value.config), tracks: requireNames(value.tracks) };
    case 'track-list':
      return { type: 'track-list', tracks: requireNames(value.tracks) };
    case 'track-loaded':
      return { type: 'track-loaded', name: requireString(value.name, 'name'), track: parseSnapshot(value.track) };
    case 'track-saved':
      return { type: 'track-saved', name: requireString(value.name, 'name'), tracks: requireNames(value.tracks) };
    case 'error':
      return { type: 'error', message: requireString(value.message, 'message') };
    default:
      throw new Error(`Unknown message type: ${String(type)}`);
  }
}

const CONFIG_NUMBERS = ['canvasWidth', 'canvasHeight', 'gridRows', 'gridCols', 'paletteSize'] as const;

function requireConfig(value: unknown): EditorConfig {
  if (!isRecord(value)) throw new Error('Invalid message: welcome needs a config');
  const overrides: Partial<EditorConfig> = {};
  for (const key of CONFIG_NUMBERS) {
    const n = value[key];
    if (typeof n !== 'number') throw new Error(`Invalid message: config.${key} must be a number`);
    overrides[key] = n;
  }
  if (typeof value.startingTrackPath === 'string') overrides.startingTrackPath = value.startingTrackPath;
  return createEditorConfig(overrides);
}

function requireNames(value: unknown): string[] {
  if (!Array.isArray(value)) throw new Error('Invalid message: tracks must be a list of names');
  return value.map((name: unknown) => requireString(name, 'tracks'));
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') throw new Error(`Invalid message: ${field} must be a string`);
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
