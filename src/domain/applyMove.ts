import type { Board, CastlingRights, Color, HistoryEntry, Move, Piece, Position, ReadonlyBoard, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { getPiece } from './board';
import { homeRankOf } from './movegen';
import { positionKey } from './notation/positionKey';
import { fileOf, makeSquare, rankOf, squareAt } from './square';

/**
 * Move execution and its exact inverse.
 *
 * Assumptions:
 * - The caller provides a legal move (the game checks membership in the legal set first).
 * - Nothing here mutates its inputs; every call returns fresh boards/positions.
 */

export type AppliedMove = {
  position: Position;
  entry: HistoryEntry;
};

function cloneCastling(c: Readonly<CastlingRights>): CastlingRights {
  return { wK: c.wK, wQ: c.wQ, bK: c.bK, bQ: c.bQ };
}

function rookSquaresForCastle(color: Color, side: 'k' | 'q'): { rookFrom: Square; rookTo: Square } {
  const homeRank = homeRankOf(color);
  return side === 'k'
    ? { rookFrom: squareAt(7, homeRank), rookTo: squareAt(5, homeRank) }
    : { rookFrom: squareAt(0, homeRank), rookTo: squareAt(3, homeRank) };
}

function castleSideOf(move: Move): 'k' | 'q' {
  return move.castleSide ?? (fileOf(move.to) > fileOf(move.from) ? 'k' : 'q');
}

/** En passant captures the pawn beside the mover, behind the target square. */
function enPassantVictimSquare(move: Move): Square {
  return squareAt(fileOf(move.to), rankOf(move.from));
}

/**
 * Moves pieces on a copy of `board` and reports what was captured.
 * Shared by the legality filter (scratch boards) and `applyMove`.
 */
export function movePieces(
  board: ReadonlyBoard,
  move: Move
): { board: Board; moved: Piece; captured: Piece | null; capturedOn: Square | null } {
  const moving = getPiece(board, move.from);
  if (!moving) throw new Error(`No piece on square ${move.from}`);

  const next = board.slice();
  let captured = getPiece(next, move.to);
  let capturedOn: Square | null = captured ? move.to : null;

  next[move.from] = null;

  if (move.isCastle) {
    const { rookFrom, rookTo } = rookSquaresForCastle(moving.color, castleSideOf(move));
    next[rookTo] = next[rookFrom];
    next[rookFrom] = null;
  }

  if (move.isEnPassant) {
    const victimSq = enPassantVictimSquare(move);
    captured = getPiece(next, victimSq);
    capturedOn = victimSq;
    next[victimSq] = null;
  }

  next[move.to] = move.promotion ? { color: moving.color, type: move.promotion } : moving;

  return { board: next, moved: moving, captured, capturedOn };
}

const ROOK_CORNERS: ReadonlyArray<{ square: Square; right: keyof CastlingRights }> = [
  { square: 0, right: 'wQ' }, // a1
  { square: 7, right: 'wK' }, // h1
  { square: 56, right: 'bQ' }, // a8
  { square: 63, right: 'bK' } // h8
];

function nextCastlingRights(
  prior: Readonly<CastlingRights>,
  moved: Piece,
  move: Move,
  capturedOn: Square | null
): CastlingRights {
  const next = cloneCastling(prior);
  if (moved.type === 'k') {
    if (moved.color === 'w') {
      next.wK = false;
      next.wQ = false;
    } else {
      next.bK = false;
      next.bQ = false;
    }
  }
  // A rook leaving its corner, or anything captured on a corner, ends that right.
  for (const corner of ROOK_CORNERS) {
    if (move.from === corner.square || capturedOn === corner.square) next[corner.right] = false;
  }
  return next;
}

function enPassantTargetAfter(moved: Piece, move: Move): Square | null {
  if (moved.type !== 'p') return null;
  if (fileOf(move.to) !== fileOf(move.from)) return null;
  const dr = rankOf(move.to) - rankOf(move.from);
  if (Math.abs(dr) !== 2) return null;
  return makeSquare(fileOf(move.from), (rankOf(move.from) + rankOf(move.to)) / 2);
}

export function applyMove(position: Position, move: Move): AppliedMove {
  const { board, moved, captured, capturedOn } = movePieces(position.board, move);

  const resetsClock = captured !== null || moved.type === 'p';
  const next: Position = {
    board,
    sideToMove: oppositeColor(position.sideToMove),
    castling: nextCastlingRights(position.castling, moved, move, capturedOn),
    enPassantTarget: enPassantTargetAfter(moved, move),
    halfmoveClock: resetsClock ? 0 : position.halfmoveClock + 1,
    // Fullmove number increments after black moves.
    fullmoveNumber: position.sideToMove === 'b' ? position.fullmoveNumber + 1 : position.fullmoveNumber
  };

  const entry: HistoryEntry = {
    move,
    moved,
    captured,
    capturedOn,
    priorCastling: cloneCastling(position.castling),
    priorEnPassant: position.enPassantTarget,
    priorHalfmoveClock: position.halfmoveClock,
    priorFullmoveNumber: position.fullmoveNumber,
    positionKey: positionKey(next)
  };

  return { position: next, entry };
}

/**
 * Rebuilds the position before `entry.move` from the position after it.
 */
export function revertMove(position: Position, entry: HistoryEntry): Position {
  const { move, moved } = entry;
  const board = position.board.slice();

  board[move.to] = null;
  board[move.from] = moved;

  if (move.isCastle) {
    const { rookFrom, rookTo } = rookSquaresForCastle(moved.color, castleSideOf(move));
    board[rookFrom] = board[rookTo];
    board[rookTo] = null;
  }

  if (entry.captured !== null && entry.capturedOn !== null) {
    board[entry.capturedOn] = entry.captured;
  }

  return {
    board,
    sideToMove: moved.color,
    castling: cloneCastling(entry.priorCastling),
    enPassantTarget: entry.priorEnPassant,
    halfmoveClock: entry.priorHalfmoveClock,
    fullmoveNumber: entry.priorFullmoveNumber
  };
}
