import { Map as ROTMap, RNG } from 'rot-js';
import { GEN_MIN_SIZE, GEN_MONSTER_DISTANCE, GEN_MONSTERS, GEN_TREASURES } from '../config';
import { createGrid } from './grid';
import type { Level } from './level';
import type { Position, Tile } from './tiles';

export type GenerateOptions = {
  rows: number;
  cols: number;
  seed?: number;
  treasures?: number;
  monsters?: number;
  amulets?: number;
  doors?: number;
  exits?: number;
  // Minimum Manhattan distance between the player and any monster, where floor allows it
  monsterDistance?: number;
};

const key = (p: Position) => `${p.row},${p.col}`;

function sampleFloors(floors: Position[], count: number, taken: Set<string>, minManhattan = 0, from?: Position): Position[] {
  let pool = floors.filter((p) => !taken.has(key(p)));
  if (from && minManhattan > 0) {
    const far = pool.filter((p) => Math.abs(p.row - from.row) + Math.abs(p.col - from.col) >= minManhattan);
    if (far.length >= count) pool = far;
  }
  const result: Position[] = [];
  for (let i = 0; i < count && pool.length; i++) {
    const idx = Math.floor(RNG.getUniform() * pool.length);
    result.push(pool[idx]);
    taken.add(key(pool[idx]));
    pool.splice(idx, 1);
  }
  return result;
}

// Digger rooms on pillar rock. Null when the map is too small to carve or its floor can't hold everything.
export function generateLevel(options: GenerateOptions): Level | null {
  const { rows, cols, seed } = options;
  if (rows < GEN_MIN_SIZE || cols < GEN_MIN_SIZE) return null;
  const grid = createGrid(rows, cols);
  if (!grid) return null;
  for (const p of grid.find('open')) grid.set(p.row, p.col, 'pillar');
  if (typeof seed === 'number') RNG.setSeed(seed);
  const digger = new ROTMap.Digger(cols, rows, {
    roomWidth: [3, 8],
    roomHeight: [3, 6],
    corridorLength: [2, 6],
  });
  digger.create((x, y, value) => {
    if (value === 0) grid.set(y, x, 'open'); // 0 = floor
  });

  const placements: Array<[Tile, number]> = [
    ['exit', options.exits ?? 1],
    ['treasure', options.treasures ?? GEN_TREASURES],
    ['amulet', options.amulets ?? 0],
    ['door', options.doors ?? 0],
    ['monster', options.monsters ?? GEN_MONSTERS],
  ];
  const floors = grid.find('open');
  const needed = 1 + placements.reduce((sum, [, n]) => sum + n, 0);
  if (floors.length < needed) {
    grid.destroy();
    return null;
  }

  const taken = new Set<string>();
  const [start] = sampleFloors(floors, 1, taken);
  grid.set(start.row, start.col, 'player');
  for (const [tile, count] of placements) {
    const minDistance = tile === 'monster' ? options.monsterDistance ?? GEN_MONSTER_DISTANCE : 0;
    for (const p of sampleFloors(floors, count, taken, minDistance, start)) grid.set(p.row, p.col, tile);
  }

  return { grid, player: { row: start.row, col: start.col, treasureCount: 0 } };
}
