import { createContext, useContext, useCallback, useMemo } from 'react';
import { useTrackConnection } from '../hooks/useTrackConnection.js';
import type { ConnectionStatus } from '../track-connection.js';
import { useTrackStore, type TrackStoreState } from '../hooks/useTrackStore.js';
import { isValidTrackName } from '../../server/track-name.js';
import type { ServerMessage } from '../../server/types.js';

interface TrackServerContextValue {
  status: ConnectionStatus;
  store: TrackStoreState;
  /** Ask the server to save the current track under `name`. */
  saveTrack: (name: string) => void;
  loadTrack: (name: string) => void;
  refreshTracks: () => void;
  newTrack: () => void;
  setTrackName: (name: string) => void;
  clearError: () => void;
}

const TrackServerContext = createContext<TrackServerContextValue | null>(null);

export function TrackServerProvider({ children, url }: { children: React.ReactNode; url?: string }) {
  const { state: store, handleServerMessage, newTrack, setTrackName, reportError, clearError } = useTrackStore();

  const onMessage = useCallback((message: ServerMessage) => {
    handleServerMessage(message);
    if (message.type === 'error') {
      console.error(`[track-client] ${message.message}`);
    }
  }, [handleServerMessage]);

  const { status, send } = useTrackConnection({ url, onMessage });

  const { track } = store;
  const saveTrack = useCallback((name: string) => {
    if (!isValidTrackName(name)) {
      reportError('Track names use letters, digits, "-" and "_" (at most 64)');
      return;
    }
    if (!send({ type: 'save-track', name, track: track.toSnapshot() })) {
      reportError('Not connected to the track server');
    }
  }, [send, track, reportError]);

  const loadTrack = useCallback((name: string) => {
    send({ type: 'load-track', name });
  }, [send]);

  const refreshTracks = useCallback(() => {
    send({ type: 'list-tracks' });
  }, [send]);

  const contextValue = useMemo(
    () => ({ status, store, saveTrack, loadTrack, refreshTracks, newTrack, setTrackName, clearError }),
    [status, store, saveTrack, loadTrack, refreshTracks, newTrack, setTrackName, clearError],
  );

  return (
    <TrackServerContext.Provider value={contextValue}>
      {children}
    </TrackServerContext.Provider>
  );
}

export function useTrackServer(): TrackServerContextValue {
  const ctx = useContext(TrackServerContext);
  if (!ctx) {
    throw new Error('useTrackServer must be used within a TrackServerProvider');
  }
  return ctx;
}
