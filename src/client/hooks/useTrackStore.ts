import { useReducer, useCallback } from 'react';
import type { ServerMessage } from '../../server/types.js';
import { createEditorConfig, type EditorConfig } from '../../config.js';
import { RaceTrack, blankTrack } from '../../track/race-track.js';
import type { TrackSnapshot } from '../../track/types.js';

export interface TrackStoreState {
  /** Editor settings; defaults until the server's welcome arrives. */
  config: EditorConfig;
  /** Saved track names known to the server. */
  tracks: string[];
  /** Name the current track is saved under; empty for a new track. */
  trackName: string;
  /** The track being edited. Replaced, never mutated, by the store. */
  track: RaceTrack;
  /** Name of the most recent successful save. */
  lastSaved: string | null;
  /** Last error from the server or from a rejected track. */
  error: string | null;
}

function blankFor(config: EditorConfig): RaceTrack {
  return blankTrack(
    { rows: config.gridRows, cols: config.gridCols },
    { width: config.canvasWidth, height: config.canvasHeight },
  );
}

export function createInitialState(config: EditorConfig = createEditorConfig()): TrackStoreState {
  return {
    config,
    tracks: [],
    trackName: '',
    track: blankFor(config),
    lastSaved: null,
    error: null,
  };
}

type Action =
  | { type: 'WELCOME'; config: EditorConfig; tracks: string[] }
  | { type: 'TRACK_LIST'; tracks: string[] }
  | { type: 'TRACK_LOADED'; name: string; track: RaceTrack }
  | { type: 'TRACK_SAVED'; name: string; tracks: string[] }
  | { type: 'NEW_TRACK' }
  | { type: 'SET_NAME'; name: string }
  | { type: 'ERROR'; message: string }
  | { type: 'CLEAR_ERROR' };

function reducer(state: TrackStoreState, action: Action): TrackStoreState {
  switch (action.type) {
    case 'WELCOME': {
      // An untouched blank track follows the server's grid settings.
      const untouched = state.trackName === '' && state.track.revision === 0;
      return {
        ...state,
        config: action.config,
        tracks: action.tracks,
        track: untouched ? blankFor(action.config) : state.track,
      };
    }
    case 'TRACK_LIST':
      return { ...state, tracks: action.tracks };
    case 'TRACK_LOADED':
      return { ...state, track: action.track, trackName: action.name, error: null };
    case 'TRACK_SAVED':
      return { ...state, tracks: action.tracks, trackName: action.name, lastSaved: action.name, error: null };
    case 'NEW_TRACK':
      return { ...state, track: blankFor(state.config), trackName: '', lastSaved: null };
    case 'SET_NAME':
      return { ...state, trackName: action.name };
    case 'ERROR':
      return { ...state, error: action.message };
    case 'CLEAR_ERROR':
      return { ...state, error: null };
    default:
      return state;
  }
}

function trackFromSnapshot(snapshot: TrackSnapshot): RaceTrack | string {
  try {
    return RaceTrack.fromSnapshot(snapshot);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

export function useTrackStore(initialConfig?: EditorConfig) {
  const [state, dispatch] = useReducer(reducer, initialConfig, createInitialState);

  const handleServerMessage = useCallback((message: ServerMessage) => {
    switch (message.type) {
      case 'welcome':
        dispatch({ type: 'WELCOME', config: message.config, tracks: message.tracks });
        break;
      case 'track-list':
        dispatch({ type: 'TRACK_LIST', tracks: message.tracks });
        break;
      case 'track-loaded': {
        const track = trackFromSnapshot(message.track);
        if (typeof track === 'string') {
          dispatch({ type: 'ERROR', message: `Could not open ${message.name}: ${track}` });
        } else {
          dispatch({ type: 'TRACK_LOADED', name: message.name, track });
        }
        break;
      }
      case 'track-saved':
        dispatch({ type: 'TRACK_SAVED', name: message.name, tracks: message.tracks });
        break;
      case 'error':
        dispatch({ type: 'ERROR', message: message.message });
        break;
    }
  }, []);

  const newTrack = useCallback(() => dispatch({ type: 'NEW_TRACK' }), []);
  const setTrackName = useCallback((name: string) => dispatch({ type: 'SET_NAME', name }), []);
  const reportError = useCallback((message: string) => dispatch({ type: 'ERROR', message }), []);
  const clearError = useCallback(() => dispatch({ type: 'CLEAR_ERROR' }), []);

  return { state, handleServerMessage, newTrack, setTrackName, reportError, clearError };
}
