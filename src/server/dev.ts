/**
 * Local development server entry point.
 *
 * Starts the track server; run `npm run dev` alongside it for the editor.
 *
 * Usage:
 *   npx tsx src/server/dev.ts
 *   PORT=9000 TRACKS_DIR=./my-tracks npx tsx src/server/dev.ts
 */

import { loadServerConfig } from '../config.js';
import { createTrackServer } from './ws-server.js';

const config = loadServerConfig(process.env);
const server = createTrackServer(config);

console.log(`Track server listening on ws://localhost:${config.port}`);
console.log(`Tracks directory: ${config.tracksDir}`);
if (config.editor.startingTrackPath) {
  console.log(`Starting track: ${config.editor.startingTrackPath}`);
}
console.log('Press Ctrl+C to stop.');

function shutdown() {
  console.log('\nShutting down...');
  server.close();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
