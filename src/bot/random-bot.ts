/**
 * Random bot: a placeholder mover that wanders the track.
 *
 * Each step picks uniformly among the orthogonal neighbours it can
 * currently stand on. Landing on a button toggles the walls of that
 * button's color; reaching the target finishes the run.
 */

import type { RaceTrack } from '../track/race-track.js';
import type { Cell } from '../track/types.js';

export interface Direction {
  dRow: number;
  dCol: number;
}

export const DIRECTIONS: readonly Direction[] = [
  { dRow: -1, dCol: 0 },
  { dRow: 1, dCol: 0 },
  { dRow: 0, dCol: -1 },
  { dRow: 0, dCol: 1 },
];

export interface BotState {
  position: Cell;
  steps: number;
  finished: boolean;
  /** Colors toggled so far, in order. */
  toggles: number[];
}

export function createBot(track: RaceTrack): BotState {
  const position = track.spawn;
  return {
    position,
    steps: 0,
    finished: position.row === track.target.row && position.col === track.target.col,
    toggles: [],
  };
}

/**
 * Pick a random direction leading to a traversable neighbour of `loc`.
 * Returns null when every neighbour is blocked.
 */
export function randomMove(loc: Cell, track: RaceTrack, rng: () => number): Direction | null {
  const options = DIRECTIONS.filter(d =>
    track.isTraversable({ row: loc.row + d.dRow, col: loc.col + d.dCol }),
  );
  if (options.length === 0) return null;
  return options[Math.floor(rng() * options.length)];
}

/**
 * Advance the bot one step. A boxed-in or finished bot stays put.
 * Returns the new state; `track` is mutated when a button is pressed.
 */
export function stepBot(bot: BotState, track: RaceTrack, rng: () => number): BotState {
  if (bot.finished) return bot;
  const move = randomMove(bot.position, track, rng);
  if (!move) return bot;

  const position = { row: bot.position.row + move.dRow, col: bot.position.col + move.dCol };
  const toggles = [...bot.toggles];
  if (track.buttons[position.row][position.col]) {
    const color = track.colors[position.row][position.col];
    track.toggle(color);
    toggles.push(color);
  }
  const { target } = track;
  return {
    position,
    steps: bot.steps + 1,
    finished: position.row === target.row && position.col === target.col,
    toggles,
  };
}
