import type { GameStatus, HistoryEntry, Move, Position, ReadonlyBoard } from './chessTypes';
import { isGameOver } from './chessTypes';
import type { ChessError, MalformedRecord, Result } from './errors';
import { fail, ok, unwrap } from './errors';
import { applyMove, revertMove } from './applyMove';
import { getGameStatus } from './gameStatus';
import { HistoryLog } from './history';
import { findLegalMove, generateLegalMoves } from './legalMoves';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { BoardDiagramOptions } from './notation/boardDiagram';
import { formatBoard } from './notation/boardDiagram';
import { toFEN, tryParseFEN } from './notation/fen';
import { positionKey } from './notation/positionKey';
import { moveToUci } from './notation/uci';
import { clonePosition, createInitialPosition, validatePosition } from './position';
import { RepetitionTable } from './repetition';
import type { RulesConfig } from './rulesConfig';
import { resolveRulesConfig } from './rulesConfig';

export type ChessGameOptions = {
  rules?: Partial<RulesConfig>;
  logger?: Logger;
};

/**
 * Authoritative game state: the current position, the move history and the
 * repetition table. All changes go through `makeMove`, `undo` and `redo`
 * (or their `try*` forms, which return a `Result` instead of throwing).
 */
export class ChessGame {
  private position: Position;
  private status: GameStatus;
  private readonly history = new HistoryLog();
  private readonly repetitions = new RepetitionTable();
  private readonly rules: RulesConfig;
  private readonly logger: Logger;

  private constructor(start: Position, options: ChessGameOptions) {
    this.rules = resolveRulesConfig(options.rules);
    this.logger = options.logger ?? silentLogger;
    this.position = clonePosition(start);
    this.repetitions.increment(positionKey(this.position));
    this.status = this.computeStatus();
  }

  static newGame(options: ChessGameOptions = {}): ChessGame {
    return new ChessGame(createInitialPosition(), options);
  }

  static fromFEN(text: string, options: ChessGameOptions = {}): Result<ChessGame, MalformedRecord> {
    const parsed = tryParseFEN(text);
    if (!parsed.ok) return parsed;
    return ok(new ChessGame(parsed.value, options));
  }

  /** Throwing variant of `fromFEN`. */
  static parse(text: string, options: ChessGameOptions = {}): ChessGame {
    return unwrap(ChessGame.fromFEN(text, options));
  }

  static fromPosition(position: Position, options: ChessGameOptions = {}): Result<ChessGame, MalformedRecord> {
    const valid = validatePosition(clonePosition(position));
    if (!valid.ok) return valid;
    return ok(new ChessGame(valid.value, options));
  }

  getGameState(): GameStatus {
    return this.status;
  }

  /** Legal moves for the side to move; empty once the game is over. */
  legalMoves(from?: number): Move[] {
    if (isGameOver(this.status)) return [];
    return generateLegalMoves(this.position, from);
  }

  tryMakeMove(move: Move): Result<GameStatus> {
    if (isGameOver(this.status)) {
      return this.reject(move, `the game is over (${this.status.kind})`);
    }
    const legal = findLegalMove(this.position, move);
    if (!legal) return this.reject(move, 'not in the legal move set');

    this.history.push(this.commit(legal));
    return ok(this.status);
  }

  makeMove(move: Move): GameStatus {
    return unwrap(this.tryMakeMove(move));
  }

  tryUndo(): Result<GameStatus> {
    const entry = this.history.popForUndo();
    if (!entry) return fail({ kind: 'noHistory' });

    this.repetitions.decrement(entry.positionKey);
    this.position = revertMove(this.position, entry);
    this.status = this.computeStatus();
    this.logger.debug(`undo ${moveToUci(entry.move)} -> ${toFEN(this.position)}`);
    return ok(this.status);
  }

  undo(): GameStatus {
    return unwrap(this.tryUndo());
  }

  tryRedo(): Result<GameStatus> {
    const entry = this.history.takeRedo();
    if (!entry) return fail({ kind: 'noRedo' });

    // Same path as a fresh move, minus clearing what is left on the redo stack.
    const legal = isGameOver(this.status) ? null : findLegalMove(this.position, entry.move);
    if (!legal) {
      this.history.restoreRedo(entry);
      throw new Error(`Redo entry ${moveToUci(entry.move)} is not legal in ${toFEN(this.position)}`);
    }
    this.history.record(this.commit(legal));
    this.logger.debug(`redo ${moveToUci(entry.move)}`);
    return ok(this.status);
  }

  redo(): GameStatus {
    return unwrap(this.tryRedo());
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  /** Moves applied so far, oldest first. */
  moves(): Move[] {
    return this.history.entries().map((e) => e.move);
  }

  historyEntries(): readonly HistoryEntry[] {
    return this.history.entries();
  }

  lastMove(): Move | null {
    return this.history.last()?.move ?? null;
  }

  /** How often the current position has occurred, itself included. */
  repetitionCount(): number {
    return this.repetitions.count(positionKey(this.position));
  }

  repetitionSnapshot(): Map<string, number> {
    return this.repetitions.snapshot();
  }

  getPosition(): Position {
    return clonePosition(this.position);
  }

  getBoard(): ReadonlyBoard {
    return this.position.board.slice();
  }

  toFEN(): string {
    return toFEN(this.position);
  }

  formatBoard(options?: BoardDiagramOptions): string {
    return formatBoard(this.position.board, options);
  }

  getRules(): RulesConfig {
    return { ...this.rules };
  }

  private commit(move: Move): HistoryEntry {
    const { position, entry } = applyMove(this.position, move);
    this.position = position;
    this.repetitions.increment(entry.positionKey);
    this.status = this.computeStatus();
    this.logger.debug(`move ${moveToUci(move)} -> ${toFEN(position)} (${this.status.kind})`);
    return entry;
  }

  private reject(move: Move, reason: string): { ok: false; error: ChessError } {
    this.logger.warn(`rejected ${moveToUci(move)}: ${reason}`);
    return fail({ kind: 'illegalMove', move, reason });
  }

  /** The cached status is shared with every caller, so it is frozen down to the moves. */
  private computeStatus(): GameStatus {
    const status = getGameStatus(this.position, {
      repetitionCount: this.repetitions.count(positionKey(this.position)),
      rules: this.rules
    });
    if (status.kind === 'inProgress' || status.kind === 'check') {
      status.legalMoves.forEach((m) => Object.freeze(m));
      Object.freeze(status.legalMoves);
    }
    return Object.freeze(status);
  }
}
