import { useRef, useEffect, useState } from 'react';
import { Link } from 'react-router-dom';
import { useTrackServer } from '../providers/TrackServerProvider.js';
import { createEditorBoard, type EditorBoard, type ToolState } from '../editor-board.js';
import { Toolbar } from '../components/Toolbar.js';
import { StatusBar } from '../components/StatusBar.js';

const styles = {
  container: {
    display: 'flex',
    flexDirection: 'column' as const,
    gap: 12,
    padding: '1.5rem',
    minHeight: '100vh',
  },
  header: {
    display: 'flex',
    alignItems: 'center',
    gap: 16,
  },
  title: {
    fontSize: '1.8rem',
    fontWeight: 'bold' as const,
    color: '#ff6b35',
    margin: 0,
  },
  link: {
    color: '#93c5fd',
    fontSize: '0.95rem',
  },
  controls: {
    display: 'flex',
    flexWrap: 'wrap' as const,
    alignItems: 'center',
    gap: 8,
  },
  input: {
    padding: '0.5rem 0.75rem',
    borderRadius: '8px',
    border: '1px solid #333',
    background: '#0f3460',
    color: '#e0e0e0',
    fontSize: '0.95rem',
    outline: 'none',
  },
  button: {
    padding: '0.5rem 1rem',
    borderRadius: '8px',
    border: 'none',
    background: '#ff6b35',
    color: '#fff',
    fontSize: '0.95rem',
    fontWeight: 'bold' as const,
    cursor: 'pointer',
  },
  secondaryButton: {
    padding: '0.5rem 1rem',
    borderRadius: '8px',
    border: '1px solid #334155',
    background: '#1e293b',
    color: '#cbd5e1',
    fontSize: '0.95rem',
    cursor: 'pointer',
  },
  workspace: {
    display: 'flex',
    alignItems: 'flex-start',
    gap: 16,
  },
  board: {
    border: '1px solid #334155',
    lineHeight: 0,
    cursor: 'crosshair',
  },
};

const INITIAL_TOOLS: ToolState = {
  selectedColor: 1,
  selectedKind: 'wall',
  brushRadius: 1,
  placeInactive: false,
};

export function Editor() {
  const { status, store, saveTrack, loadTrack, newTrack, setTrackName, clearError } = useTrackServer();
  const { config, track, trackName, tracks } = store;

  const boardContainerRef = useRef<HTMLDivElement>(null);
  const boardRef = useRef<EditorBoard | null>(null);
  const [tools, setTools] = useState<ToolState>(INITIAL_TOOLS);
  const [selectedTrack, setSelectedTrack] = useState('');

  // Latest values for the board's callbacks, without rebuilding the board
  const trackRef = useRef(track);
  trackRef.current = track;
  const saveRef = useRef(() => saveTrack(trackName));
  saveRef.current = () => saveTrack(trackName);

  useEffect(() => {
    const container = boardContainerRef.current;
    if (!container) return;

    const board = createEditorBoard(container, trackRef.current, {
      paletteSize: config.paletteSize,
      onSave: () => saveRef.current(),
      onToolChange: setTools,
    });
    boardRef.current = board;
    setTools(board.getTools());

    return () => {
      board.destroy();
      boardRef.current = null;
    };
  }, [config.paletteSize]);

  useEffect(() => {
    const board = boardRef.current;
    if (board && board.getTrack() !== track) {
      board.setTrack(track);
    }
  }, [track]);

  return (
    <div style={styles.container}>
      <div style={styles.header}>
        <h1 style={styles.title}>Track Editor</h1>
        <Link to="/preview" style={styles.link}>Preview with bot →</Link>
      </div>

      <StatusBar
        status={status}
        trackName={trackName}
        lastSaved={store.lastSaved}
        error={store.error}
        onDismissError={clearError}
      />

      <div style={styles.controls}>
        <input
          style={styles.input}
          type="text"
          placeholder="track-name"
          aria-label="Track name"
          value={trackName}
          maxLength={64}
          onChange={e => setTrackName(e.target.value)}
          data-testid="track-name-input"
        />
        <button type="button" style={styles.button} onClick={() => saveTrack(trackName)} data-testid="save-button">
          Save
        </button>
        <select
          style={styles.input}
          aria-label="Saved tracks"
          value={selectedTrack}
          onChange={e => setSelectedTrack(e.target.value)}
          data-testid="track-select"
        >
          <option value="">Saved tracks…</option>
          {tracks.map(name => (
            <option key={name} value={name}>{name}</option>
          ))}
        </select>
        <button
          type="button"
          style={styles.secondaryButton}
          disabled={selectedTrack === ''}
          onClick={() => loadTrack(selectedTrack)}
          data-testid="load-button"
        >
          Load
        </button>
        <button type="button" style={styles.secondaryButton} onClick={newTrack} data-testid="new-button">
          New
        </button>
      </div>

      <div style={styles.workspace}>
        <div ref={boardContainerRef} style={styles.board} data-testid="board" />
        <Toolbar
          paletteSize={config.paletteSize}
          tools={tools}
          onSelectColor={color => boardRef.current?.selectColor(color)}
          onSelectKind={kind => boardRef.current?.selectKind(kind)}
        />
      </div>
    </div>
  );
}
