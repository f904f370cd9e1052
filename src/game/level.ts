import { readFileSync } from 'node:fs';
import { createGrid, type Grid } from './grid';
import { tileFromToken, type Position } from './tiles';

export type Player = Position & { treasureCount: number };

export type Level = { grid: Grid; player: Player };

export type LoadError =
  | { kind: 'unreadable'; path: string; message: string }
  | { kind: 'allocation'; rows: number; cols: number }
  | { kind: 'malformed-header'; field: HeaderField }
  | { kind: 'truncated'; expected: number; found: number }
  | { kind: 'player-out-of-bounds'; row: number; col: number }
  | { kind: 'unknown-token'; token: string; row: number; col: number }
  | { kind: 'stray-player'; row: number; col: number };

export type LoadResult = { ok: true; level: Level } | { ok: false; error: LoadError };

type HeaderField = 'rows' | 'cols' | 'playerRow' | 'playerCol';

const HEADER_FIELDS: readonly HeaderField[] = ['rows', 'cols', 'playerRow', 'playerCol'];

// Reads whitespace-separated integers, then single-character tokens.
class Scanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  nextInt(): number | null {
    this.skipWhitespace();
    const m = /^[+-]?\d+/.exec(this.text.slice(this.pos));
    if (!m) return null;
    this.pos += m[0].length;
    return Number(m[0]);
  }

  nextChar(): string | null {
    this.skipWhitespace();
    if (this.pos >= this.text.length) return null;
    return this.text[this.pos++];
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) this.pos++;
  }
}

export function parseLevel(text: string): LoadResult {
  const scanner = new Scanner(text);
  const header: number[] = [];
  for (const field of HEADER_FIELDS) {
    const value = scanner.nextInt();
    if (value === null) return { ok: false, error: { kind: 'malformed-header', field } };
    header.push(value);
  }
  const [rows, cols, playerRow, playerCol] = header;

  const grid = createGrid(rows, cols);
  if (!grid) return { ok: false, error: { kind: 'allocation', rows, cols } };
  const fail = (error: LoadError): LoadResult => {
    grid.destroy();
    return { ok: false, error };
  };
  if (!grid.inBounds(playerRow, playerCol)) return fail({ kind: 'player-out-of-bounds', row: playerRow, col: playerCol });

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const token = scanner.nextChar();
      if (token === null) return fail({ kind: 'truncated', expected: rows * cols, found: r * cols + c });
      // The declared player cell is taken as-is, whatever was read there.
      if (r === playerRow && c === playerCol) {
        grid.set(r, c, 'player');
        continue;
      }
      const tile = tileFromToken(token);
      if (tile === null) return fail({ kind: 'unknown-token', token, row: r, col: c });
      if (tile === 'player') return fail({ kind: 'stray-player', row: r, col: c });
      grid.set(r, c, tile);
    }
  }

  return { ok: true, level: { grid, player: { row: playerRow, col: playerCol, treasureCount: 0 } } };
}

export function loadLevel(path: string): LoadResult {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: { kind: 'unreadable', path, message } };
  }
  return parseLevel(text);
}

export function describeLoadError(error: LoadError): string {
  switch (error.kind) {
    case 'unreadable':
      return `cannot read ${error.path}: ${error.message}`;
    case 'allocation':
      return `cannot allocate a ${error.rows}x${error.cols} grid`;
    case 'malformed-header':
      return `missing or invalid header value "${error.field}"`;
    case 'truncated':
      return `expected ${error.expected} tiles, found ${error.found}`;
    case 'player-out-of-bounds':
      return `player start (${error.row}, ${error.col}) is outside the grid`;
    case 'unknown-token':
      return `unknown tile "${error.token}" at (${error.row}, ${error.col})`;
    case 'stray-player':
      return `extra player marker at (${error.row}, ${error.col})`;
  }
}
