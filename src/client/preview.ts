/**
 * Bot preview: runs the random bot over a copy of a track and renders the
 * track with the bot drawn on top.
 */

import type { RaceTrack } from '../track/race-track.js';
import { createBot, stepBot, type BotState } from '../bot/random-bot.js';
import { createRng } from '../bot/rng.js';
import { renderAtCanvasSize } from '../render/track-renderer.js';
import { fillCircle, type RgbaImage } from '../render/rgba-image.js';
import { hexToRgba } from '../render/palette.js';

export const BOT_COLOR = '#ff6b35';
/** Bot marker radius as a fraction of the smaller cell side. */
const BOT_RADIUS = 0.3;

export interface BotRun {
  /** The run's own copy of the track; buttons toggle walls on it. */
  readonly track: RaceTrack;
  readonly bot: BotState;
  /** True once the bot can make no further move. */
  readonly stuck: boolean;
  step(): BotState;
}

export function createBotRun(source: RaceTrack, seed: number): BotRun {
  const track = source.clone();
  const rng = createRng(seed);
  let bot = createBot(track);
  let stuck = false;

  return {
    track,
    get bot() {
      return bot;
    },
    get stuck() {
      return stuck;
    },
    step() {
      if (bot.finished || stuck) return bot;
      const next = stepBot(bot, track, rng);
      stuck = next === bot;
      bot = next;
      return bot;
    },
  };
}

/** Render the run's track at its canvas size with the bot marker. */
export function renderBotRun(run: BotRun): RgbaImage {
  const image = renderAtCanvasSize(run.track);
  const cell = run.track.cellSize;
  const { row, col } = run.bot.position;
  fillCircle(
    image,
    (col + 0.5) * cell.width,
    (row + 0.5) * cell.height,
    BOT_RADIUS * Math.min(cell.width, cell.height),
    hexToRgba(BOT_COLOR),
  );
  return image;
}
