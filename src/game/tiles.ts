// The player's cell always reads as 'player'. Whatever terrain was loaded under it
// is forgotten, and the cell becomes 'open' once the player walks off.
export type Tile = 'open' | 'pillar' | 'treasure' | 'amulet' | 'monster' | 'door' | 'exit' | 'player';

export type Position = { row: number; col: number };

const TOKENS: Record<Tile, string> = {
  open: '-',
  pillar: '#',
  player: 'P',
  monster: 'M',
  treasure: 'T',
  amulet: 'A',
  door: 'D',
  exit: 'E',
};

export const ALL_TILES: readonly Tile[] = ['open', 'pillar', 'treasure', 'amulet', 'monster', 'door', 'exit', 'player'];

const TILES_BY_TOKEN = new Map<string, Tile>(ALL_TILES.map((tile): [string, Tile] => [TOKENS[tile], tile]));

export function tokenOf(tile: Tile): string {
  return TOKENS[tile];
}

export function tileFromToken(token: string): Tile | null {
  return TILES_BY_TOKEN.get(token) ?? null;
}
