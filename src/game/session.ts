import { DEFAULT_SESSION_CONFIG, type SessionConfig } from '../config';
import { resizeGrid, type Grid } from './grid';
import { describeLoadError, loadLevel, parseLevel, type Level, type LoadResult, type Player } from './level';
import { advanceMonsters } from './monsters';
import { decodeDirection, isTerminalOutcome, resolveMove, type MoveOutcome } from './movement';

export type SessionStatus = 'playing' | 'escaped' | 'left-level' | 'captured';

export type TurnResult = {
  outcome: MoveOutcome;
  captured: boolean;
  status: SessionStatus;
};

// Owns one level's grid and player; `resize` may be called between turns.
export class DungeonSession {
  private level: Level;
  private ended = false;
  private _status: SessionStatus = 'playing';
  private readonly config: SessionConfig;

  private constructor(level: Level, config: Partial<SessionConfig>) {
    this.level = level;
    this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
  }

  static fromLevel(level: Level, config: Partial<SessionConfig> = {}): DungeonSession {
    return new DungeonSession(level, config);
  }

  static fromText(text: string, config: Partial<SessionConfig> = {}): DungeonSession | null {
    return DungeonSession.fromResult(parseLevel(text), config);
  }

  static load(path: string, config: Partial<SessionConfig> = {}): DungeonSession | null {
    return DungeonSession.fromResult(loadLevel(path), config);
  }

  private static fromResult(result: LoadResult, config: Partial<SessionConfig>): DungeonSession | null {
    if (!result.ok) {
      console.warn(`Unable to load level: ${describeLoadError(result.error)}`);
      return null;
    }
    return new DungeonSession(result.level, config);
  }

  get grid(): Grid {
    this.assertOpen();
    return this.level.grid;
  }

  get player(): Readonly<Player> {
    return this.level.player;
  }

  get status(): SessionStatus {
    return this._status;
  }

  move(input: string): MoveOutcome {
    this.assertPlaying();
    const direction = decodeDirection(input, this.config.keyBindings);
    const outcome = resolveMove(this.level.grid, this.level.player, direction, {
      treasureToEscape: this.config.treasureToEscape,
    });
    if (outcome === 'escaped-dungeon') this._status = 'escaped';
    else if (outcome === 'exited-through-door') this._status = 'left-level';
    return outcome;
  }

  advanceMonsters(): boolean {
    this.assertPlaying();
    const captured = advanceMonsters(this.level.grid, this.level.player);
    if (captured) this._status = 'captured';
    return captured;
  }

  turn(input: string): TurnResult {
    const outcome = this.move(input);
    const captured = isTerminalOutcome(outcome) ? false : this.advanceMonsters();
    return { outcome, captured, status: this._status };
  }

  resize(): boolean {
    this.assertOpen();
    const result = resizeGrid(this.level.grid);
    if (!result.ok) {
      console.warn(`Unable to resize grid: ${result.error.kind}`);
      return false;
    }
    this.level = { grid: result.grid, player: this.level.player };
    return true;
  }

  end(): void {
    if (this.ended) return;
    this.level.grid.destroy();
    this.ended = true;
  }

  private assertOpen(): void {
    if (this.ended) throw new Error('Session has ended');
  }

  private assertPlaying(): void {
    this.assertOpen();
    if (this._status !== 'playing') throw new Error(`Level is over (${this._status})`);
  }
}
