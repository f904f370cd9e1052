import type { Direction } from './game/movement';

// Config
export const MAX_GRID_CELLS = 1 << 22;
export const TREASURE_TO_ESCAPE = 1;

export type KeyBindings = Readonly<Record<string, Direction>>;

export const DEFAULT_KEY_BINDINGS: KeyBindings = {
  d: 'right',
  a: 'left',
  w: 'up',
  s: 'down',
};

// Level generator defaults; the Digger cannot fit a room below GEN_MIN_SIZE per side
export const GEN_MIN_SIZE = 8;
export const GEN_TREASURES = 3;
export const GEN_MONSTERS = 2;
export const GEN_MONSTER_DISTANCE = 3;

export type SessionConfig = {
  keyBindings: KeyBindings;
  treasureToEscape: number;
};

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  keyBindings: DEFAULT_KEY_BINDINGS,
  treasureToEscape: TREASURE_TO_ESCAPE,
};
