import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createTrackConnection,
  defaultTrackServerUrl,
  parseServerMessage,
  type TrackConnection,
} from '../track-connection.js';
import { MockWebSocket } from './mock-websocket.js';

const CONFIG = { canvasWidth: 600, canvasHeight: 900, gridRows: 15, gridCols: 10, paletteSize: 8 };

describe('parseServerMessage', () => {
  it('reads a welcome', () => {
    const raw = JSON.stringify({ type: 'welcome', config: CONFIG, tracks: ['loop'] });
    expect(parseServerMessage(raw)).toEqual({ type: 'welcome', config: CONFIG, tracks: ['loop'] });
  });

  it('reads a loaded track', () => {
    const track = {
      walls: [[1]],
      active: [[true]],
      buttons: [[false]],
      colors: [[2]],
      target: { row: 0, col: 0 },
      spawn: { row: 0, col: 0 },
      canvasSize: { width: 40, height: 40 },
    };
    const raw = JSON.stringify({ type: 'track-loaded', name: 'loop', track });
    expect(parseServerMessage(raw)).toEqual({ type: 'track-loaded', name: 'loop', track });
  });

  it('reads errors and pongs', () => {
    expect(parseServerMessage('{"type":"error","message":"nope"}')).toEqual({ type: 'error', message: 'nope' });
    expect(parseServerMessage('{"type":"pong"}')).toEqual({ type: 'pong' });
  });

  it('rejects frames that are not JSON', () => {
    expect(() => parseServerMessage('not json')).toThrow('Invalid message: not JSON');
  });

  it('rejects unknown message types', () => {
    expect(() => parseServerMessage('{"type":"shout"}')).toThrow('Unknown message type: shout');
    expect(() => parseServerMessage('[]')).toThrow('Invalid message: missing type');
  });

  it('rejects track lists holding anything but names', () => {
    expect(() => parseServerMessage('{"type":"track-list","tracks":["a",1]}'))
      .toThrow('Invalid message: tracks must be a string');
    expect(() => parseServerMessage('{"type":"track-saved","name":"a"}'))
      .toThrow('Invalid message: tracks must be a list of names');
  });

  it('rejects a welcome whose config the editor cannot use', () => {
    const raw = JSON.stringify({ type: 'welcome', config: { ...CONFIG, paletteSize: 12 }, tracks: [] });
    expect(() => parseServerMessage(raw)).toThrow('paletteSize must be between 2 and 8, got 12');
  });

  it('rejects a loaded track with colors off the palette', () => {
    const track = {
      walls: [[1]],
      active: [[true]],
      buttons: [[false]],
      colors: [[9]],
      target: { row: 0, col: 0 },
      spawn: { row: 0, col: 0 },
      canvasSize: { width: 40, height: 40 },
    };
    const raw = JSON.stringify({ type: 'track-loaded', name: 'loop', track });
    expect(() => parseServerMessage(raw)).toThrow('Layer colors has an invalid value at (0, 0)');
  });
});

describe('defaultTrackServerUrl', () => {
  it('follows the page scheme', () => {
    expect(defaultTrackServerUrl({ protocol: 'http:', host: 'localhost:5173' })).toBe('ws://localhost:5173/ws');
    expect(defaultTrackServerUrl({ protocol: 'https:', host: 'tracks.test' })).toBe('wss://tracks.test/ws');
  });
});

describe('createTrackConnection', () => {
  let connection: TrackConnection | null = null;

  beforeEach(() => {
    MockWebSocket.instances = [];
    vi.stubGlobal('WebSocket', MockWebSocket);
    vi.useFakeTimers();
  });

  afterEach(() => {
    connection?.destroy();
    connection = null;
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  function connect(onMessage = vi.fn()) {
    const onStatusChange = vi.fn();
    connection = createTrackConnection({ url: 'ws://test/ws', onMessage, onStatusChange });
    return { connection, onMessage, onStatusChange };
  }

  it('reports connecting, then connected', () => {
    const { onStatusChange } = connect();
    expect(MockWebSocket.latest().url).toBe('ws://test/ws');
    MockWebSocket.latest().open();
    expect(onStatusChange.mock.calls).toEqual([['connecting'], ['connected']]);
  });

  it('sends only while the socket is open', () => {
    const { connection } = connect();
    expect(connection.send({ type: 'list-tracks' })).toBe(false);

    MockWebSocket.latest().open();
    expect(connection.send({ type: 'load-track', name: 'loop' })).toBe(true);
    expect(MockWebSocket.latest().sent).toEqual(['{"type":"load-track","name":"loop"}']);
  });

  it('forwards parsed messages but not pongs', () => {
    const { onMessage } = connect();
    const ws = MockWebSocket.latest();
    ws.open();

    ws.receive('{"type":"pong"}');
    ws.receive('{"type":"track-list","tracks":["a"]}');

    expect(onMessage).toHaveBeenCalledOnce();
    expect(onMessage).toHaveBeenCalledWith({ type: 'track-list', tracks: ['a'] });
  });

  it('logs and drops messages off the protocol', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { onMessage } = connect();
    MockWebSocket.latest().open();

    MockWebSocket.latest().receive('{"type":"shout"}');

    expect(onMessage).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[track-client] dropped server message: Unknown message type: shout');
  });

  it('keeps a socket that answers its pings', () => {
    connect();
    const ws = MockWebSocket.latest();
    ws.open();

    vi.advanceTimersByTime(25_000);
    expect(ws.sent).toEqual(['{"type":"ping"}']);
    ws.receive('{"type":"pong"}');

    vi.advanceTimersByTime(25_000);
    expect(ws.sent).toEqual(['{"type":"ping"}', '{"type":"ping"}']);
    expect(MockWebSocket.instances).toHaveLength(1);
  });

  it('replaces a socket whose ping goes unanswered', () => {
    const { onStatusChange } = connect();
    MockWebSocket.latest().open();

    vi.advanceTimersByTime(25_000 + 10_000);
    expect(onStatusChange).toHaveBeenLastCalledWith('disconnected');

    vi.advanceTimersByTime(500);
    expect(MockWebSocket.instances).toHaveLength(2);
    expect(onStatusChange).toHaveBeenLastCalledWith('reconnecting');
  });

  it('doubles the retry delay until a socket opens', () => {
    connect();
    MockWebSocket.latest().close();
    vi.advanceTimersByTime(500);
    expect(MockWebSocket.instances).toHaveLength(2);

    MockWebSocket.latest().close();
    vi.advanceTimersByTime(500);
    expect(MockWebSocket.instances).toHaveLength(2);
    vi.advanceTimersByTime(500);
    expect(MockWebSocket.instances).toHaveLength(3);

    MockWebSocket.latest().open();
    MockWebSocket.latest().close();
    vi.advanceTimersByTime(500);
    expect(MockWebSocket.instances).toHaveLength(4);
  });

  it('stops for good when destroyed', () => {
    const { connection, onStatusChange } = connect();
    const ws = MockWebSocket.latest();
    ws.open();

    connection.destroy();
    vi.advanceTimersByTime(60_000);

    expect(ws.readyState).toBe(3);
    expect(MockWebSocket.instances).toHaveLength(1);
    expect(onStatusChange.mock.calls).toEqual([['connecting'], ['connected']]);
    expect(connection.send({ type: 'ping' })).toBe(false);
  });
});
