import { DIRS } from 'rot-js';
import { DEFAULT_KEY_BINDINGS, TREASURE_TO_ESCAPE, type KeyBindings } from '../config';
import type { Grid } from './grid';
import type { Player } from './level';
import type { Position } from './tiles';

export type Direction = 'up' | 'right' | 'down' | 'left';

export type MoveOutcome =
  | 'stayed'
  | 'moved'
  | 'collected-treasure'
  | 'collected-amulet'
  | 'exited-through-door'
  | 'escaped-dungeon';

export type MoveOptions = { treasureToEscape?: number };

// Index into rot-js' 4-topology offsets, which are listed clockwise from up as [dx, dy].
const DIR_INDEX: Record<Direction, number> = { up: 0, right: 1, down: 2, left: 3 };

export function decodeDirection(input: string, bindings: KeyBindings = DEFAULT_KEY_BINDINGS): Direction | null {
  return Object.prototype.hasOwnProperty.call(bindings, input) ? bindings[input] : null;
}

export function nextPosition(from: Position, direction: Direction | null): Position {
  if (direction === null) return { row: from.row, col: from.col };
  const [dx, dy] = DIRS[4][DIR_INDEX[direction]];
  return { row: from.row + dy, col: from.col + dx };
}

// Level ends after these; monsters do not get their turn.
export function isTerminalOutcome(outcome: MoveOutcome): boolean {
  return outcome === 'exited-through-door' || outcome === 'escaped-dungeon';
}

function relocate(grid: Grid, player: Player, to: Position): void {
  grid.set(player.row, player.col, 'open');
  grid.set(to.row, to.col, 'player');
  player.row = to.row;
  player.col = to.col;
}

// Blocked, out-of-bounds and undecodable moves are 'stayed' and change nothing.
export function resolveMove(grid: Grid, player: Player, direction: Direction | null, options: MoveOptions = {}): MoveOutcome {
  if (direction === null) return 'stayed';
  const to = nextPosition(player, direction);
  if (!grid.inBounds(to.row, to.col)) return 'stayed';

  switch (grid.get(to.row, to.col)) {
    case 'pillar':
    case 'monster':
      return 'stayed';
    case 'treasure':
      player.treasureCount++;
      relocate(grid, player, to);
      return 'collected-treasure';
    case 'amulet':
      relocate(grid, player, to);
      return 'collected-amulet';
    case 'door':
      relocate(grid, player, to);
      return 'exited-through-door';
    case 'exit':
      if (player.treasureCount < (options.treasureToEscape ?? TREASURE_TO_ESCAPE)) return 'stayed';
      relocate(grid, player, to);
      return 'escaped-dungeon';
    default:
      relocate(grid, player, to);
      return 'moved';
  }
}
