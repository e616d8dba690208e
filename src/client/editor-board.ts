/**
 * Editor Board: the browser side of the editor loop.
 *
 * Owns a canvas sized to the track, feeds mouse and key input through the
 * editor functions, and re-renders whenever the track's revision moves.
 */

import type { RaceTrack } from '../track/race-track.js';
import type { PaintKind } from '../track/types.js';
import {
  createEditorState,
  selectColor as selectStateColor,
  selectKind as selectStateKind,
  beginStroke,
  endStroke,
  paintAt,
  handleKeyDown,
  handleKeyUp,
  type EditorState,
} from '../editor/editor.js';
import { renderAtCanvasSize } from '../render/track-renderer.js';
import { blit, createCanvas, eventToCanvasPixel } from './canvas.js';

/** The parts of the editor state a toolbar displays. */
export type ToolState = Pick<EditorState, 'selectedColor' | 'selectedKind' | 'brushRadius' | 'placeInactive'>;

export interface EditorBoardOptions {
  paletteSize: number;
  /** Called when the user presses the save key. */
  onSave?: (track: RaceTrack) => void;
  /** Called with a fresh copy whenever the tool state changes. */
  onToolChange?: (tools: ToolState) => void;
}

export interface EditorBoard {
  /** Swap in another track, e.g. after a load. Resizes the canvas. */
  setTrack(track: RaceTrack): void;
  getTrack(): RaceTrack;
  getTools(): ToolState;
  selectColor(color: number): void;
  selectKind(kind: PaintKind): void;
  /** Schedule a frame; it draws only if the track changed. */
  refresh(): void;
  getCanvas(): HTMLCanvasElement;
  /** Remove the canvas and every listener. */
  destroy(): void;
}

export function createEditorBoard(
  container: HTMLElement,
  initialTrack: RaceTrack,
  options: EditorBoardOptions,
): EditorBoard {
  let track = initialTrack;
  const state = createEditorState({ paletteSize: options.paletteSize });
  const { canvas, ctx } = createCanvas(container, track.canvasSize.width, track.canvasSize.height);

  let drawnRevision = -1;
  let renderFrameId = 0;

  function requestRender() {
    if (!renderFrameId) {
      renderFrameId = requestAnimationFrame(renderFrame);
    }
  }

  function renderFrame() {
    renderFrameId = 0;
    if (track.revision === drawnRevision) return;
    drawnRevision = track.revision;
    if (ctx) blit(ctx, renderAtCanvasSize(track));
  }

  function tools(): ToolState {
    return {
      selectedColor: state.selectedColor,
      selectedKind: state.selectedKind,
      brushRadius: state.brushRadius,
      placeInactive: state.placeInactive,
    };
  }

  function notifyTools() {
    options.onToolChange?.(tools());
  }

  function paint(e: MouseEvent) {
    const { x, y } = eventToCanvasPixel(canvas, e);
    if (paintAt(track, state, x, y) > 0) requestRender();
  }

  function onMouseDown(e: MouseEvent) {
    if (e.button !== 0) return;
    beginStroke(state);
    paint(e);
  }

  function onMouseMove(e: MouseEvent) {
    paint(e);
  }

  function onMouseUp() {
    endStroke(state);
  }

  function onKeyDown(e: KeyboardEvent) {
    if (isTextEntry(e.target)) return;
    const before = state.brushRadius;
    const wasInactive = state.placeInactive;
    const command = handleKeyDown(state, e.key);
    if (command?.type === 'save') {
      e.preventDefault();
      options.onSave?.(track);
    }
    if (state.brushRadius !== before || state.placeInactive !== wasInactive) {
      e.preventDefault();
      notifyTools();
    }
  }

  function onKeyUp(e: KeyboardEvent) {
    const wasInactive = state.placeInactive;
    handleKeyUp(state, e.key);
    if (state.placeInactive !== wasInactive) notifyTools();
  }

  canvas.addEventListener('mousedown', onMouseDown);
  canvas.addEventListener('mousemove', onMouseMove);
  window.addEventListener('mouseup', onMouseUp);
  window.addEventListener('keydown', onKeyDown);
  window.addEventListener('keyup', onKeyUp);

  requestRender();

  return {
    setTrack(next: RaceTrack) {
      track = next;
      endStroke(state);
      canvas.width = next.canvasSize.width;
      canvas.height = next.canvasSize.height;
      drawnRevision = -1;
      requestRender();
    },
    getTrack() {
      return track;
    },
    getTools: tools,
    selectColor(color: number) {
      selectStateColor(state, color);
      notifyTools();
    },
    selectKind(kind: PaintKind) {
      selectStateKind(state, kind);
      notifyTools();
    },
    refresh: requestRender,
    getCanvas() {
      return canvas;
    },
    destroy() {
      canvas.removeEventListener('mousedown', onMouseDown);
      canvas.removeEventListener('mousemove', onMouseMove);
      window.removeEventListener('mouseup', onMouseUp);
      window.removeEventListener('keydown', onKeyDown);
      window.removeEventListener('keyup', onKeyUp);
      if (renderFrameId) cancelAnimationFrame(renderFrameId);
      renderFrameId = 0;
      canvas.remove();
    },
  };
}

function isTextEntry(target: EventTarget | null): boolean {
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLSelectElement
  );
}
