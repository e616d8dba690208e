export {
  createEditorState,
  selectColor,
  selectKind,
  beginStroke,
  endStroke,
  paintAt,
  handleKeyDown,
  handleKeyUp,
  PAINT_KINDS,
  SAVE_KEY,
  GROW_BRUSH_KEY,
  SHRINK_BRUSH_KEY,
  INACTIVE_WALL_KEY,
} from './editor.js';
export type { EditorState, EditorCommand } from './editor.js';
export { brushCells, cellKey } from './brush.js';
