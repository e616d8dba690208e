/**
 * Browser client for the track editor: the editor board, the bot preview
 * and the React app around them.
 */

export type { EditorBoard, EditorBoardOptions, ToolState } from './editor-board.js';
export { createEditorBoard } from './editor-board.js';
export type { BotRun } from './preview.js';
export { createBotRun, renderBotRun, BOT_COLOR } from './preview.js';
export type { ConnectionStatus, TrackConnection, TrackConnectionOptions } from './track-connection.js';
export { createTrackConnection, defaultTrackServerUrl, parseServerMessage } from './track-connection.js';
export { blit, createCanvas, eventToCanvasPixel } from './canvas.js';
export { App } from './App.js';
