import type { CastlingRights, Color, Position } from './chessTypes';
import { oppositeColor } from './chessTypes';
import type { MalformedRecord, Result } from './errors';
import { malformed, ok } from './errors';
import { boardsEqual, createStartingBoard, getPiece, squaresWith } from './board';
import { isInCheck } from './attack';
import { homeRankOf } from './movegen';
import { fileOf, rankOf, squareAt, toAlgebraic } from './square';

export const STARTING_CASTLING_RIGHTS: CastlingRights = {
  wK: true,
  wQ: true,
  bK: true,
  bQ: true
};

export function createInitialPosition(): Position {
  return {
    board: createStartingBoard(),
    sideToMove: 'w',
    castling: { ...STARTING_CASTLING_RIGHTS },
    enPassantTarget: null,
    halfmoveClock: 0,
    fullmoveNumber: 1
  };
}

/**
 * Detached copy; positions handed to callers never share arrays with the game.
 */
export function clonePosition(p: Position): Position {
  return {
    board: p.board.slice(),
    sideToMove: p.sideToMove,
    castling: { ...p.castling },
    enPassantTarget: p.enPassantTarget,
    halfmoveClock: p.halfmoveClock,
    fullmoveNumber: p.fullmoveNumber
  };
}

/** Same board, side to move, castling rights and en passant target. Clocks are ignored. */
export function positionsEqual(a: Position, b: Position): boolean {
  return (
    boardsEqual(a.board, b.board) &&
    a.sideToMove === b.sideToMove &&
    a.enPassantTarget === b.enPassantTarget &&
    a.castling.wK === b.castling.wK &&
    a.castling.wQ === b.castling.wQ &&
    a.castling.bK === b.castling.bK &&
    a.castling.bQ === b.castling.bQ
  );
}

function colorName(c: Color): string {
  return c === 'w' ? 'white' : 'black';
}

function hasPieceAt(position: Position, file: number, rank: number, color: Color, type: 'k' | 'r'): boolean {
  const p = getPiece(position.board, squareAt(file, rank));
  return p !== null && p.color === color && p.type === type;
}

function validateCastling(position: Position): MalformedRecord | null {
  const rights: Array<{ held: boolean; color: Color; rookFile: number; label: string }> = [
    { held: position.castling.wK, color: 'w', rookFile: 7, label: 'K' },
    { held: position.castling.wQ, color: 'w', rookFile: 0, label: 'Q' },
    { held: position.castling.bK, color: 'b', rookFile: 7, label: 'k' },
    { held: position.castling.bQ, color: 'b', rookFile: 0, label: 'q' }
  ];
  for (const r of rights) {
    if (!r.held) continue;
    const rank = homeRankOf(r.color);
    if (!hasPieceAt(position, 4, rank, r.color, 'k') || !hasPieceAt(position, r.rookFile, rank, r.color, 'r')) {
      return {
        kind: 'malformedRecord',
        field: 'castling',
        reason: `castling right ${r.label} needs the ${colorName(r.color)} king and rook on their home squares`
      };
    }
  }
  return null;
}

function validateEnPassant(position: Position): MalformedRecord | null {
  const ep = position.enPassantTarget;
  if (ep === null) return null;

  // White to move: black just pushed from rank 7 to rank 5, target on rank 6.
  const mover = oppositeColor(position.sideToMove);
  const targetRank = position.sideToMove === 'w' ? 5 : 2;
  const pawnRank = position.sideToMove === 'w' ? 4 : 3;
  const originRank = position.sideToMove === 'w' ? 6 : 1;

  const reason = (text: string): MalformedRecord => ({
    kind: 'malformedRecord',
    field: 'enPassant',
    reason: `${toAlgebraic(ep)}: ${text}`
  });

  if (rankOf(ep) !== targetRank) return reason(`target must be on rank ${targetRank + 1}`);
  const f = fileOf(ep);
  const pawn = getPiece(position.board, squareAt(f, pawnRank));
  if (!pawn || pawn.type !== 'p' || pawn.color !== mover) {
    return reason(`no ${colorName(mover)} pawn in front of the target`);
  }
  if (getPiece(position.board, ep) !== null || getPiece(position.board, squareAt(f, originRank)) !== null) {
    return reason('the squares the pawn passed must be empty');
  }
  return null;
}

/**
 * Structural checks for a position supplied from outside the engine.
 * Positions produced by play always pass.
 */
export function validatePosition(position: Position): Result<Position, MalformedRecord> {
  if (position.board.length !== 64) {
    return malformed('placement', `board must have 64 squares, got ${position.board.length}`);
  }

  for (const color of ['w', 'b'] as const) {
    const kings = [...squaresWith(position.board, (p) => p.type === 'k' && p.color === color)];
    if (kings.length !== 1) {
      return malformed('placement', `expected exactly one ${colorName(color)} king, found ${kings.length}`);
    }
  }

  for (const [sq] of squaresWith(position.board, (p) => p.type === 'p')) {
    const r = rankOf(sq);
    if (r === 0 || r === 7) return malformed('placement', `pawn on ${toAlgebraic(sq)} cannot stand on a back rank`);
  }

  if (isInCheck(position.board, oppositeColor(position.sideToMove))) {
    return malformed('placement', `${colorName(oppositeColor(position.sideToMove))} is in check but not to move`);
  }

  const castlingError = validateCastling(position);
  if (castlingError) return { ok: false, error: castlingError };

  const epError = validateEnPassant(position);
  if (epError) return { ok: false, error: epError };

  if (!Number.isInteger(position.halfmoveClock) || position.halfmoveClock < 0) {
    return malformed('halfmoveClock', 'must be a non-negative integer');
  }
  if (!Number.isInteger(position.fullmoveNumber) || position.fullmoveNumber < 1) {
    return malformed('fullmoveNumber', 'must be a positive integer');
  }

  return ok(position);
}
