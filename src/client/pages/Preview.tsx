import { useRef, useEffect, useState } from 'react';
import { Link } from 'react-router-dom';
import { useTrackServer } from '../providers/TrackServerProvider.js';
import { createBotRun, renderBotRun, type BotRun } from '../preview.js';
import { blit, createCanvas } from '../canvas.js';

/** Delay between bot steps while running (ms). */
const STEP_INTERVAL = 150;

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
    alignItems: 'center',
    gap: 8,
    color: '#cbd5e1',
    fontSize: '0.95rem',
  },
  input: {
    width: 90,
    padding: '0.5rem 0.75rem',
    borderRadius: '8px',
    border: '1px solid #333',
    background: '#0f3460',
    color: '#e0e0e0',
    fontSize: '0.95rem',
  },
  button: {
    padding: '0.5rem 1rem',
    borderRadius: '8px',
    border: '1px solid #334155',
    background: '#1e293b',
    color: '#cbd5e1',
    fontSize: '0.95rem',
    cursor: 'pointer',
  },
  board: {
    border: '1px solid #334155',
    lineHeight: 0,
    alignSelf: 'flex-start',
  },
};

export function Preview() {
  const { store } = useTrackServer();
  const { track, trackName } = store;

  const boardContainerRef = useRef<HTMLDivElement>(null);
  const ctxRef = useRef<CanvasRenderingContext2D | null>(null);
  const [seed, setSeed] = useState(1);
  const [run, setRun] = useState<BotRun>(() => createBotRun(track, seed));
  const [steps, setSteps] = useState(0);
  const [running, setRunning] = useState(false);

  function restart() {
    setRunning(false);
    setRun(createBotRun(track, seed));
    setSteps(0);
  }

  const restartRef = useRef(restart);
  restartRef.current = restart;

  useEffect(() => {
    restartRef.current();
  }, [track, seed]);

  // One canvas per track size
  const { width, height } = track.canvasSize;
  useEffect(() => {
    const container = boardContainerRef.current;
    if (!container) return;
    const { canvas, ctx } = createCanvas(container, width, height);
    ctxRef.current = ctx;
    return () => {
      ctxRef.current = null;
      canvas.remove();
    };
  }, [width, height]);

  useEffect(() => {
    const ctx = ctxRef.current;
    if (ctx) blit(ctx, renderBotRun(run));
  }, [run, steps, width, height]);

  useEffect(() => {
    if (!running) return;
    const timer = setInterval(() => {
      const bot = run.step();
      setSteps(bot.steps);
      if (bot.finished || run.stuck) setRunning(false);
    }, STEP_INTERVAL);
    return () => clearInterval(timer);
  }, [running, run]);

  function stepOnce() {
    setSteps(run.step().steps);
  }

  const done = run.bot.finished || run.stuck;
  let outcome = 'Ready';
  if (run.bot.finished) outcome = `Reached the target in ${steps} steps`;
  else if (run.stuck) outcome = `Boxed in after ${steps} steps`;
  else if (steps > 0) outcome = `${steps} steps`;

  return (
    <div style={styles.container}>
      <div style={styles.header}>
        <h1 style={styles.title}>Bot Preview</h1>
        <Link to="/" style={styles.link}>← Back to editor</Link>
      </div>

      <div style={styles.controls}>
        <span data-testid="preview-track">{trackName === '' ? 'Untitled track' : trackName}</span>
        <label>
          Seed{' '}
          <input
            style={styles.input}
            type="number"
            value={seed}
            onChange={e => setSeed(Number.parseInt(e.target.value, 10) || 0)}
            data-testid="seed-input"
          />
        </label>
        <button
          type="button"
          style={styles.button}
          disabled={done}
          onClick={() => setRunning(r => !r)}
          data-testid="run-button"
        >
          {running ? 'Pause' : 'Run'}
        </button>
        <button type="button" style={styles.button} disabled={done || running} onClick={stepOnce} data-testid="step-button">
          Step
        </button>
        <button type="button" style={styles.button} onClick={restart} data-testid="reset-button">
          Reset
        </button>
        <span data-testid="bot-outcome">{outcome}</span>
      </div>

      <div ref={boardContainerRef} style={styles.board} data-testid="preview-board" />
    </div>
  );
}
