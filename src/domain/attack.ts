import type { Color, Piece, ReadonlyBoard, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { fileOf, isOnBoard, rankOf, squareAt } from './square';

export const KNIGHT_DELTAS = [
  [1, 2],
  [2, 1],
  [2, -1],
  [1, -2],
  [-1, -2],
  [-2, -1],
  [-2, 1],
  [-1, 2]
] as const;

export const KING_DELTAS = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1]
] as const;

export const ROOK_DIRECTIONS = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1]
] as const;

export const BISHOP_DIRECTIONS = [
  [1, 1],
  [1, -1],
  [-1, 1],
  [-1, -1]
] as const;

function pieceAt(board: ReadonlyBoard, file: number, rank: number): Piece | null {
  return board[squareAt(file, rank)] ?? null;
}

export function findKing(board: ReadonlyBoard, color: Color): Square | null {
  for (let sq = 0; sq < 64; sq++) {
    const p = board[sq];
    if (p && p.type === 'k' && p.color === color) return sq;
  }
  return null;
}

/**
 * Returns true if `square` is attacked by any piece of `byColor`.
 *
 * Notes:
 * - This function is purely geometric: it does not consider pins or king safety.
 * - En passant is not considered an "attack" on the ep target square for king safety.
 */
export function isSquareAttacked(board: ReadonlyBoard, square: Square, byColor: Color): boolean {
  const f = fileOf(square);
  const r = rankOf(square);

  // Pawn attacks (reverse lookup from target square):
  // white pawns attack from one rank below, black pawns from one rank above.
  const pawnRank = byColor === 'w' ? r - 1 : r + 1;
  for (const df of [-1, 1]) {
    if (!isOnBoard(f + df, pawnRank)) continue;
    const p = pieceAt(board, f + df, pawnRank);
    if (p && p.color === byColor && p.type === 'p') return true;
  }

  for (const [df, dr] of KNIGHT_DELTAS) {
    if (!isOnBoard(f + df, r + dr)) continue;
    const p = pieceAt(board, f + df, r + dr);
    if (p && p.color === byColor && p.type === 'n') return true;
  }

  // Sliding attacks: rook/queen (orthogonal) and bishop/queen (diagonal)
  if (isAttackedAlong(board, f, r, byColor, ROOK_DIRECTIONS, 'r')) return true;
  if (isAttackedAlong(board, f, r, byColor, BISHOP_DIRECTIONS, 'b')) return true;

  for (const [df, dr] of KING_DELTAS) {
    if (!isOnBoard(f + df, r + dr)) continue;
    const p = pieceAt(board, f + df, r + dr);
    if (p && p.color === byColor && p.type === 'k') return true;
  }

  return false;
}

function isAttackedAlong(
  board: ReadonlyBoard,
  f: number,
  r: number,
  byColor: Color,
  directions: ReadonlyArray<readonly [number, number]>,
  slider: 'r' | 'b'
): boolean {
  for (const [df, dr] of directions) {
    let nf = f + df;
    let nr = r + dr;
    while (isOnBoard(nf, nr)) {
      const p = pieceAt(board, nf, nr);
      if (p) {
        if (p.color === byColor && (p.type === slider || p.type === 'q')) return true;
        break;
      }
      nf += df;
      nr += dr;
    }
  }
  return false;
}

/**
 * A missing king means the board is not a committed position; that is a
 * programming error, not a caller error.
 */
export function isInCheck(board: ReadonlyBoard, color: Color): boolean {
  const kingSq = findKing(board, color);
  if (kingSq === null) throw new Error(`No ${color === 'w' ? 'white' : 'black'} king on the board`);
  return isSquareAttacked(board, kingSq, oppositeColor(color));
}
