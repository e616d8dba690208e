import type { ConnectionStatus } from '../track-connection.js';

export interface StatusBarProps {
  status: ConnectionStatus;
  trackName: string;
  lastSaved: string | null;
  error: string | null;
  onDismissError?: () => void;
}

const STATUS_COLORS: Record<ConnectionStatus, string> = {
  connected: '#22c55e',
  connecting: '#eab308',
  reconnecting: '#eab308',
  disconnected: '#ef4444',
};

const barStyle: React.CSSProperties = {
  display: 'flex',
  alignItems: 'center',
  gap: 16,
  padding: '8px 12px',
  borderRadius: 8,
  background: 'rgba(255, 255, 255, 0.05)',
  fontSize: 13,
  color: '#cbd5e1',
};

export function StatusBar({ status, trackName, lastSaved, error, onDismissError }: StatusBarProps) {
  return (
    <div style={barStyle} data-testid="status-bar">
      <span data-testid="connection-status">
        <span style={{ color: STATUS_COLORS[status] }}>●</span> {status}
      </span>
      <span data-testid="track-name">{trackName === '' ? 'Untitled track' : trackName}</span>
      {lastSaved !== null && lastSaved === trackName && (
        <span style={{ color: '#22c55e' }} data-testid="saved">Saved</span>
      )}
      {error && (
        <span role="alert" style={{ color: '#f87171', marginLeft: 'auto' }}>
          {error}
          {onDismissError && (
            <button
              type="button"
              onClick={onDismissError}
              aria-label="Dismiss error"
              style={{ marginLeft: 8, background: 'none', border: 'none', color: '#f87171', cursor: 'pointer' }}
            >
              ×
            </button>
          )}
        </span>
      )}
    </div>
  );
}
