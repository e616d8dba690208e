import { useEffect, useRef, useState, useCallback } from 'react';
import type { ClientMessage, ServerMessage } from '../../server/types.js';
import {
  createTrackConnection,
  defaultTrackServerUrl,
  type ConnectionStatus,
  type TrackConnection,
} from '../track-connection.js';

export interface UseTrackConnectionOptions {
  /** Defaults to `/ws` on the page's own host. */
  url?: string;
  onMessage?: (message: ServerMessage) => void;
}

/** One track-server connection for the lifetime of the component. */
export function useTrackConnection({ url, onMessage }: UseTrackConnectionOptions = {}) {
  const [status, setStatus] = useState<ConnectionStatus>('disconnected');
  const connectionRef = useRef<TrackConnection | null>(null);

  // Latest handler, so a new callback doesn't reopen the socket
  const onMessageRef = useRef(onMessage);
  onMessageRef.current = onMessage;

  useEffect(() => {
    const connection = createTrackConnection({
      url: url ?? defaultTrackServerUrl(window.location),
      onMessage: (message) => onMessageRef.current?.(message),
      onStatusChange: setStatus,
    });
    connectionRef.current = connection;
    return () => {
      connection.destroy();
      connectionRef.current = null;
    };
  }, [url]);

  const send = useCallback(
    (message: ClientMessage) => connectionRef.current?.send(message) ?? false,
    [],
  );

  return { status, send };
}
