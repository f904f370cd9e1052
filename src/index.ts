export * from './config';
export { tileFromToken, tokenOf, ALL_TILES, type Tile, type Position } from './game/tiles';
export { Grid, createGrid, destroyGrid, resizeGrid, type GridError, type ResizeResult } from './game/grid';
export {
  parseLevel,
  loadLevel,
  describeLoadError,
  type Level,
  type LoadError,
  type LoadResult,
  type Player,
} from './game/level';
export {
  decodeDirection,
  nextPosition,
  resolveMove,
  isTerminalOutcome,
  type Direction,
  type MoveOutcome,
  type MoveOptions,
} from './game/movement';
export { advanceMonsters } from './game/monsters';
export { generateLevel, type GenerateOptions } from './game/generate';
export { DungeonSession, type SessionStatus, type TurnResult } from './game/session';
