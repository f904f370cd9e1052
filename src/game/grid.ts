import { MAX_GRID_CELLS } from '../config';
import { tokenOf, type Position, type Tile } from './tiles';

export type GridError =
  | { kind: 'player-marker'; found: number }
  | { kind: 'allocation'; rows: number; cols: number }
  | { kind: 'destroyed' };

export type ResizeResult = { ok: true; grid: Grid } | { ok: false; error: GridError };

// Flat row-major buffer; dimensions are fixed, resizing builds a new grid.
export class Grid {
  private cells: Tile[];
  private destroyed = false;

  constructor(
    readonly rows: number,
    readonly cols: number,
    fill: Tile = 'open'
  ) {
    if (!canAllocate(rows, cols)) throw new RangeError(`Invalid grid size ${rows}x${cols}`);
    this.cells = new Array<Tile>(rows * cols).fill(fill);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  inBounds(row: number, col: number): boolean {
    return row >= 0 && col >= 0 && row < this.rows && col < this.cols;
  }

  get(row: number, col: number): Tile {
    return this.cells[this.index(row, col)];
  }

  set(row: number, col: number, tile: Tile): void {
    this.cells[this.index(row, col)] = tile;
  }

  find(tile: Tile): Position[] {
    this.assertLive();
    const res: Position[] = [];
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === tile) res.push({ row: Math.floor(i / this.cols), col: i % this.cols });
    }
    return res;
  }

  count(tile: Tile): number {
    return this.find(tile).length;
  }

  // One string per row, tokens separated by a space
  rowsAsTokens(): string[] {
    this.assertLive();
    const res: string[] = [];
    for (let r = 0; r < this.rows; r++) {
      res.push(this.cells.slice(r * this.cols, (r + 1) * this.cols).map(tokenOf).join(' '));
    }
    return res;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.cells = [];
    this.destroyed = true;
  }

  private index(row: number, col: number): number {
    this.assertLive();
    if (!this.inBounds(row, col)) {
      throw new RangeError(`Cell (${row}, ${col}) is outside a ${this.rows}x${this.cols} grid`);
    }
    return row * this.cols + col;
  }

  private assertLive(): void {
    if (this.destroyed) throw new Error('Grid has been destroyed');
  }
}

function canAllocate(rows: number, cols: number): boolean {
  return Number.isInteger(rows) && Number.isInteger(cols) && rows > 0 && cols > 0 && rows * cols <= MAX_GRID_CELLS;
}

export function createGrid(rows: number, cols: number): Grid | null {
  if (!canAllocate(rows, cols)) return null;
  return new Grid(rows, cols);
}

export function destroyGrid(grid: Grid): void {
  grid.destroy();
}

// 2x2 tiling with one player marker kept in place. The source is destroyed only on success.
export function resizeGrid(grid: Grid): ResizeResult {
  if (grid.isDestroyed) return { ok: false, error: { kind: 'destroyed' } };

  const markers = grid.find('player');
  if (markers.length !== 1) return { ok: false, error: { kind: 'player-marker', found: markers.length } };
  const [player] = markers;

  const rows = grid.rows * 2;
  const cols = grid.cols * 2;
  const resized = createGrid(rows, cols);
  if (!resized) return { ok: false, error: { kind: 'allocation', rows, cols } };

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const tile = grid.get(r % grid.rows, c % grid.cols);
      resized.set(r, c, tile === 'player' ? 'open' : tile);
    }
  }
  resized.set(player.row, player.col, 'player');

  destroyGrid(grid);
  return { ok: true, grid: resized };
}
