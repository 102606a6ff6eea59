import { ChessGame } from '../chessGame';
import type { Move } from '../chessTypes';
import { ChessRuleError } from '../errors';
import { createConsoleLogger } from '../logger';
import { STARTING_FEN, parseFEN } from '../notation/fen';
import { decodePosition, encodePosition } from '../notation/positionKey';
import { moveToUci } from '../notation/uci';
import { createInitialPosition, positionsEqual } from '../position';
import { parseAlgebraicSquare } from '../square';

function sq(name: string): number {
  const s = parseAlgebraicSquare(name);
  if (s === null) throw new Error(`bad square ${name}`);
  return s;
}

/** Finds the legal move written as UCI text; fails loudly when it is not legal. */
function legal(game: ChessGame, uci: string): Move {
  const found = game.legalMoves().find((m) => moveToUci(m) === uci);
  if (!found) throw new Error(`${uci} is not legal in ${game.toFEN()}`);
  return found;
}

function play(game: ChessGame, ...ucis: string[]): void {
  for (const uci of ucis) game.makeMove(legal(game, uci));
}

describe('ChessGame', () => {
  it('starts from the standard position', () => {
    const game = ChessGame.newGame();
    expect(game.toFEN()).toBe(STARTING_FEN);
    expect(game.getGameState().kind).toBe('inProgress');
    expect(game.legalMoves()).toHaveLength(20);
    expect(game.canUndo()).toBe(false);
    expect(game.canRedo()).toBe(false);
    expect(game.lastMove()).toBeNull();
    expect(game.repetitionCount()).toBe(1);
  });

  it("detects fool's mate", () => {
    const game = ChessGame.newGame();
    play(game, 'f2f3', 'e7e5', 'g2g4', 'd8h4');

    expect(game.getGameState()).toEqual({ kind: 'checkmate', winner: 'b' });
    expect(game.toFEN()).toBe('rnb1kbnr/pppp1ppp/8/4p3/6Pq/5P2/PPPPP2P/RNBQKBNR w KQkq - 1 3');
    expect(game.legalMoves()).toEqual([]);
    expect(game.moves().map(moveToUci)).toEqual(['f2f3', 'e7e5', 'g2g4', 'd8h4']);
    expect(game.historyEntries()[3].moved).toEqual({ color: 'b', type: 'q' });
  });

  it('rejects every move once the game is over', () => {
    const game = ChessGame.newGame();
    play(game, 'f2f3', 'e7e5', 'g2g4', 'd8h4');

    const result = game.tryMakeMove({ from: sq('e1'), to: sq('f2') });
    expect(result).toEqual({
      ok: false,
      error: { kind: 'illegalMove', move: { from: sq('e1'), to: sq('f2') }, reason: 'the game is over (checkmate)' }
    });
  });

  it('reports check with the single blocking move', () => {
    const game = ChessGame.newGame();
    play(game, 'e2e4', 'f7f6', 'd1h5');

    const state = game.getGameState();
    expect(state.kind).toBe('check');
    if (state.kind !== 'check') return;
    expect(state.sideToMove).toBe('b');
    expect(state.legalMoves.map(moveToUci)).toEqual(['g7g6']);
  });

  it('a status handed to the caller cannot change the game', () => {
    const game = ChessGame.newGame();
    const state = game.getGameState();
    if (state.kind !== 'inProgress') throw new Error('expected a game in progress');

    expect(Reflect.set(state.legalMoves, 'length', 0)).toBe(false);
    expect(Reflect.set(state.legalMoves[0], 'to', 0)).toBe(false);
    expect(Reflect.set(state, 'kind', 'stalemate')).toBe(false);

    const again = game.getGameState();
    expect(again.kind).toBe('inProgress');
    if (again.kind !== 'inProgress') return;
    expect(again.legalMoves).toHaveLength(20);
    expect(moveToUci(again.legalMoves[0])).toBe('b1c3');
  });

  it('the status returned by makeMove is frozen as well', () => {
    const game = ChessGame.newGame();
    const state = game.makeMove(legal(game, 'e2e4'));
    expect(Object.isFrozen(state)).toBe(true);
    if (state.kind !== 'inProgress') throw new Error('expected a game in progress');
    expect(Object.isFrozen(state.legalMoves)).toBe(true);
    expect(game.getGameState()).toBe(state);
  });

  it('rejects a move outside the legal set and leaves the game unchanged', () => {
    const game = ChessGame.newGame();
    const move = { from: sq('e2'), to: sq('e5') };

    const result = game.tryMakeMove(move);
    expect(result).toEqual({ ok: false, error: { kind: 'illegalMove', move, reason: 'not in the legal move set' } });
    expect(game.toFEN()).toBe(STARTING_FEN);
    expect(game.canUndo()).toBe(false);
  });

  it('makeMove throws a ChessRuleError carrying the typed error', () => {
    const game = ChessGame.newGame();
    let caught: unknown = null;
    try {
      game.makeMove({ from: sq('e2'), to: sq('e5') });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ChessRuleError);
    if (!(caught instanceof ChessRuleError)) return;
    expect(caught.message).toBe('Illegal move e2e5: not in the legal move set');
    expect(caught.error.kind).toBe('illegalMove');
  });

  it('requires a promotion piece for a pawn reaching the last rank', () => {
    const game = ChessGame.parse('4k3/P7/8/8/8/8/8/4K3 w - - 0 1');

    expect(game.tryMakeMove({ from: sq('a7'), to: sq('a8') }).ok).toBe(false);

    const state = game.makeMove({ from: sq('a7'), to: sq('a8'), promotion: 'q' });
    expect(state.kind).toBe('check');
    expect(game.toFEN()).toBe('Q3k3/8/8/8/8/8/8/4K3 b - - 0 1');
  });

  it('declares a draw on the third occurrence of a position', () => {
    const game = ChessGame.newGame();
    play(game, 'g1f3', 'g8f6', 'f3g1', 'f6g8', 'g1f3', 'g8f6', 'f3g1');
    expect(game.getGameState().kind).toBe('inProgress');

    play(game, 'f6g8');
    expect(game.getGameState()).toEqual({ kind: 'draw', reason: 'threefoldRepetition' });
    expect(game.repetitionCount()).toBe(3);
    expect(game.toFEN()).toBe('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 8 5');
  });

  it('honours a configured repetition count', () => {
    const game = ChessGame.newGame({ rules: { repetitionCount: 2 } });
    play(game, 'g1f3', 'g8f6', 'f3g1', 'f6g8');
    expect(game.getGameState()).toEqual({ kind: 'draw', reason: 'threefoldRepetition' });
    expect(game.getRules()).toEqual({ fiftyMoveHalfmoves: 100, repetitionCount: 2, insufficientMaterial: true });
  });

  it('throws on invalid rules', () => {
    expect(() => ChessGame.newGame({ rules: { repetitionCount: 1 } })).toThrow(
      'repetitionCount must be an integer >= 2, got 1'
    );
  });

  it('declares a draw by the fifty-move rule', () => {
    const game = ChessGame.parse('4k3/8/8/8/8/8/8/R3K3 w - - 99 80');
    play(game, 'a1a2');
    expect(game.getGameState()).toEqual({ kind: 'draw', reason: 'fiftyMove' });
  });

  describe('undo / redo', () => {
    it('reports noHistory and noRedo on a fresh game', () => {
      const game = ChessGame.newGame();
      expect(game.tryUndo()).toEqual({ ok: false, error: { kind: 'noHistory' } });
      expect(game.tryRedo()).toEqual({ ok: false, error: { kind: 'noRedo' } });
      expect(() => game.undo()).toThrow('Nothing to undo');
      expect(() => game.redo()).toThrow('Nothing to redo');
    });

    it('undo restores the previous position and redo replays it', () => {
      const game = ChessGame.newGame();
      play(game, 'e2e4', 'e7e5');

      game.undo();
      game.undo();
      expect(game.toFEN()).toBe(STARTING_FEN);
      expect(game.canRedo()).toBe(true);

      game.redo();
      expect(game.toFEN()).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
      expect(game.canRedo()).toBe(true);

      game.redo();
      expect(game.toFEN()).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq e6 0 2');
      expect(game.canRedo()).toBe(false);
      expect(game.lastMove()).toEqual({ from: sq('e7'), to: sq('e5') });
    });

    it('a new move after undo clears the redo stack', () => {
      const game = ChessGame.newGame();
      play(game, 'e2e4');
      game.undo();
      play(game, 'd2d4');
      expect(game.canRedo()).toBe(false);
      expect(game.moves().map(moveToUci)).toEqual(['d2d4']);
    });

    it('undo leaves a finished game and redo finishes it again', () => {
      const game = ChessGame.newGame();
      play(game, 'f2f3', 'e7e5', 'g2g4', 'd8h4');

      const state = game.undo();
      expect(state.kind).toBe('inProgress');
      expect(game.legalMoves().length).toBeGreaterThan(0);

      expect(game.redo()).toEqual({ kind: 'checkmate', winner: 'b' });
    });

    it('undo of the repeating move lifts the draw and restores the counts', () => {
      const game = ChessGame.newGame();
      play(game, 'g1f3', 'g8f6', 'f3g1', 'f6g8', 'g1f3', 'g8f6', 'f3g1');
      const before = game.repetitionSnapshot();

      play(game, 'f6g8');
      game.undo();
      expect(game.getGameState().kind).toBe('inProgress');
      expect(game.repetitionSnapshot()).toEqual(before);
    });

    it.each([
      STARTING_FEN,
      'r3k2r/pPpp1ppp/8/3Pp3/8/8/PPP2PPP/R3K2R w KQkq e6 0 12',
      'r3k2r/8/8/8/8/8/6p1/R3K2R b KQkq - 5 30',
      '4k3/8/8/3pP3/4K3/8/8/8 w - d6 0 2'
    ])('make then undo restores everything in %s', (fen) => {
      const game = ChessGame.parse(fen);
      const snapshot = game.repetitionSnapshot();
      for (const move of game.legalMoves()) {
        game.makeMove(move);
        game.undo();
        expect(game.toFEN()).toBe(fen);
        expect(game.repetitionSnapshot()).toEqual(snapshot);
        expect(game.canUndo()).toBe(false);
      }
    });
  });

  it('every position reached in play survives both record formats', () => {
    const game = ChessGame.newGame();
    const line = ['e2e4', 'd7d5', 'e4e5', 'f7f5', 'e5f6', 'g8f6', 'g1f3', 'c8g4', 'f1e2', 'e7e6', 'e1g1'];

    for (const uci of line) {
      play(game, uci);
      const position = game.getPosition();

      const decoded = decodePosition(encodePosition(position));
      if (!decoded.ok) throw new Error(`binary record of ${game.toFEN()} did not decode`);
      expect(positionsEqual(decoded.value, position)).toBe(true);
      expect(parseFEN(game.toFEN())).toEqual(position);
    }

    expect(game.toFEN()).toBe('rn1qkb1r/ppp3pp/4pn2/3p4/6b1/5N2/PPPPBPPP/RNBQ1RK1 b kq - 1 6');
  });

  describe('construction', () => {
    it('fromFEN reports a malformed record instead of throwing', () => {
      expect(ChessGame.fromFEN('bad')).toEqual({
        ok: false,
        error: {
          kind: 'malformedRecord',
          field: 'record',
          reason: 'FEN must have at least 2 fields (placement + active color)'
        }
      });
    });

    it('fromPosition validates the position', () => {
      const position = createInitialPosition();
      position.board[sq('d4')] = { color: 'w', type: 'k' };

      const result = ChessGame.fromPosition(position);
      expect(result).toEqual({
        ok: false,
        error: { kind: 'malformedRecord', field: 'placement', reason: 'expected exactly one white king, found 2' }
      });
    });

    it('fromPosition does not keep a reference to the caller position', () => {
      const position = createInitialPosition();
      const result = ChessGame.fromPosition(position);
      if (!result.ok) throw new Error('expected a game');

      position.board[sq('e2')] = null;
      expect(result.value.toFEN()).toBe(STARTING_FEN);
    });

    it('getPosition returns a detached copy', () => {
      const game = ChessGame.newGame();
      const position = game.getPosition();
      position.board[sq('e2')] = null;
      position.sideToMove = 'b';
      expect(game.toFEN()).toBe(STARTING_FEN);
    });
  });

  describe('logging', () => {
    it('logs committed moves at debug and rejected moves at warn', () => {
      const sink = { debug: jest.fn(), warn: jest.fn() };
      const game = ChessGame.newGame({ logger: createConsoleLogger('test', sink) });

      play(game, 'e2e4');
      game.tryMakeMove({ from: sq('e2'), to: sq('e5') });

      expect(sink.debug).toHaveBeenCalledWith(
        '[test] move e2e4 -> rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1 (inProgress)'
      );
      expect(sink.warn).toHaveBeenCalledWith('[test] rejected e2e5: not in the legal move set');
    });
  });
});
