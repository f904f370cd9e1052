import { fileURLToPath } from 'node:url';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { DungeonSession } from './session';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function open(text: string): DungeonSession {
  const session = DungeonSession.fromText(text);
  if (!session) throw new Error('level did not load');
  return session;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('DungeonSession', () => {
  it('plays the treasure walk', () => {
    const session = open('3 3 1 1 \n - - - \n - P - \n - - T');
    expect(session.turn('s')).toEqual({ outcome: 'moved', captured: false, status: 'playing' });
    expect(session.turn('d')).toEqual({ outcome: 'collected-treasure', captured: false, status: 'playing' });
    expect(session.player).toEqual({ row: 2, col: 2, treasureCount: 1 });
  });

  it('ends in capture when a monster reaches the player', () => {
    const session = open('1 3 0 2 M - -');
    expect(session.turn('x')).toEqual({ outcome: 'stayed', captured: false, status: 'playing' });
    expect(session.turn('x')).toEqual({ outcome: 'stayed', captured: true, status: 'captured' });
    expect(() => session.move('a')).toThrow('Level is over (captured)');
  });

  it('ends in escape through the exit', () => {
    const session = open('1 3 0 0 - T E');
    session.turn('d');
    expect(session.turn('d')).toEqual({ outcome: 'escaped-dungeon', captured: false, status: 'escaped' });
  });

  it('gives monsters no turn once the player leaves through a door', () => {
    const session = open('1 3 0 0 - D M');
    expect(session.turn('d')).toEqual({ outcome: 'exited-through-door', captured: false, status: 'left-level' });
    expect(session.grid.rowsAsTokens()).toEqual(['- P M']);
  });

  it('runs a level file turn by turn', () => {
    const session = DungeonSession.load(fixture('crypt.txt'));
    if (!session) throw new Error('level did not load');
    expect(session.turn('w')).toEqual({ outcome: 'moved', captured: false, status: 'playing' });
    expect(session.grid.rowsAsTokens()[1]).toBe('# P T M - #');
    expect(session.turn('d')).toEqual({ outcome: 'collected-treasure', captured: true, status: 'captured' });
  });

  it('uses the configured key bindings', () => {
    const session = DungeonSession.fromText('1 2 0 0 - -', { keyBindings: { l: 'right' } });
    expect(session?.move('d')).toBe('stayed');
    expect(session?.move('l')).toBe('moved');
  });

  it('logs and returns null when the level does not load', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(DungeonSession.fromText('2 2 0 0 -')).toBeNull();
    expect(warn).toHaveBeenCalledWith('Unable to load level: expected 4 tiles, found 1');
  });

  it('resizes the grid around the player', () => {
    const session = open('1 2 0 1 M -');
    const old = session.grid;
    expect(session.resize()).toBe(true);
    expect(session.grid.rowsAsTokens()).toEqual(['M P M -', 'M - M -']);
    expect(old.isDestroyed).toBe(true);
    expect(session.player).toEqual({ row: 0, col: 1, treasureCount: 0 });
  });

  it('keeps the grid when resizing fails', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const session = open('1 2 0 1 - -');
    session.grid.set(0, 0, 'player');
    expect(session.resize()).toBe(false);
    expect(warn).toHaveBeenCalledWith('Unable to resize grid: player-marker');
    expect(session.grid.rowsAsTokens()).toEqual(['P P']);
  });

  it('releases the grid when ended', () => {
    const session = open('1 1 0 0 -');
    const grid = session.grid;
    session.end();
    session.end();
    expect(grid.isDestroyed).toBe(true);
    expect(() => session.grid).toThrow('Session has ended');
  });
});
