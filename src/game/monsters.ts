import type { Grid } from './grid';
import type { Position } from './tiles';

// Scan order: toward col 0, toward the last col, toward row 0, toward the last row.
const RAYS: ReadonlyArray<readonly [number, number]> = [
  [0, -1],
  [0, 1],
  [-1, 0],
  [1, 0],
];

// Nearest monster on each clear ray steps one cell closer; true when one lands on the player.
export function advanceMonsters(grid: Grid, player: Position): boolean {
  for (const [dr, dc] of RAYS) {
    let r = player.row + dr;
    let c = player.col + dc;
    while (grid.inBounds(r, c)) {
      const tile = grid.get(r, c);
      if (tile === 'pillar') break;
      if (tile === 'monster') {
        const toRow = r - dr;
        const toCol = c - dc;
        const dest = grid.get(toRow, toCol);
        grid.set(r, c, dest === 'player' ? 'open' : dest);
        grid.set(toRow, toCol, 'monster');
        break;
      }
      r += dr;
      c += dc;
    }
  }
  return grid.get(player.row, player.col) === 'monster';
}
