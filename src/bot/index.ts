export { createBot, randomMove, stepBot, DIRECTIONS } from './random-bot.js';
export type { BotState, Direction } from './random-bot.js';
export { createRng } from './rng.js';
