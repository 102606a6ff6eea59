import type { Color, Move, PieceType, Position, PromotionType, ReadonlyBoard, Square } from './chessTypes';
import { getPiece } from './board';
import { BISHOP_DIRECTIONS, KING_DELTAS, KNIGHT_DELTAS, ROOK_DIRECTIONS } from './attack';
import { fileOf, isOnBoard, makeSquare, rankOf, squareAt } from './square';

/**
 * Pseudo-legal move generation.
 *
 * Pseudo-legal means: piece movement rules are respected, but king safety is NOT checked.
 * Filtering to legal moves happens in `legalMoves.ts`.
 */

export const PROMOTION_PIECES: readonly PromotionType[] = ['q', 'r', 'b', 'n'];

const QUEEN_DIRECTIONS = [...ROOK_DIRECTIONS, ...BISHOP_DIRECTIONS];

export function homeRankOf(color: Color): number {
  return color === 'w' ? 0 : 7;
}

function pushMove(moves: Move[], from: Square, to: Square, opts?: Omit<Move, 'from' | 'to'>) {
  moves.push({ from, to, ...opts });
}

function addPromotionMoves(moves: Move[], from: Square, to: Square) {
  for (const p of PROMOTION_PIECES) {
    pushMove(moves, from, to, { promotion: p });
  }
}

function addPawnMoves(position: Position, from: Square, color: Color, moves: Move[]) {
  const { board } = position;
  const f = fileOf(from);
  const r = rankOf(from);
  const dir = color === 'w' ? 1 : -1; // rank direction
  const startRank = color === 'w' ? 1 : 6;
  const promotionRank = color === 'w' ? 7 : 0;

  // Single push
  const one = makeSquare(f, r + dir);
  if (one !== null && getPiece(board, one) === null) {
    if (rankOf(one) === promotionRank) {
      addPromotionMoves(moves, from, one);
    } else {
      pushMove(moves, from, one);
    }

    // Double push from starting rank (only if single push is clear)
    const two = makeSquare(f, r + dir * 2);
    if (r === startRank && two !== null && getPiece(board, two) === null) {
      pushMove(moves, from, two);
    }
  }

  // Captures (diagonals)
  for (const df of [-1, 1]) {
    const cap = makeSquare(f + df, r + dir);
    if (cap === null) continue;
    const target = getPiece(board, cap);
    if (target && target.color !== color) {
      if (rankOf(cap) === promotionRank) {
        addPromotionMoves(moves, from, cap);
      } else {
        pushMove(moves, from, cap);
      }
    } else if (target === null && cap === position.enPassantTarget) {
      // The pawn that just double-pushed sits beside us, behind the target square.
      const victim = getPiece(board, squareAt(f + df, r));
      if (victim && victim.type === 'p' && victim.color !== color) {
        pushMove(moves, from, cap, { isEnPassant: true });
      }
    }
  }
}

function addStepMoves(
  board: ReadonlyBoard,
  from: Square,
  color: Color,
  deltas: ReadonlyArray<readonly [number, number]>,
  moves: Move[]
) {
  const f = fileOf(from);
  const r = rankOf(from);
  for (const [df, dr] of deltas) {
    const to = makeSquare(f + df, r + dr);
    if (to === null) continue;
    const target = getPiece(board, to);
    if (!target || target.color !== color) {
      pushMove(moves, from, to);
    }
  }
}

function addSlidingMoves(
  board: ReadonlyBoard,
  from: Square,
  color: Color,
  directions: ReadonlyArray<readonly [number, number]>,
  moves: Move[]
) {
  const f = fileOf(from);
  const r = rankOf(from);

  for (const [df, dr] of directions) {
    let nf = f + df;
    let nr = r + dr;
    while (isOnBoard(nf, nr)) {
      const to = squareAt(nf, nr);
      const target = getPiece(board, to);
      if (!target) {
        pushMove(moves, from, to);
      } else {
        if (target.color !== color) {
          pushMove(moves, from, to);
        }
        break; // blocked
      }
      nf += df;
      nr += dr;
    }
  }
}

/**
 * Castling candidates: right still held, king and rook on their home squares,
 * nothing in between. Attack conditions are checked by the legality filter.
 */
function addCastleCandidates(position: Position, from: Square, color: Color, moves: Move[]) {
  const { board, castling } = position;
  const homeRank = homeRankOf(color);
  if (from !== squareAt(4, homeRank)) return;

  const isEmpty = (file: number) => getPiece(board, squareAt(file, homeRank)) === null;
  const hasRook = (file: number) => {
    const rook = getPiece(board, squareAt(file, homeRank));
    return rook !== null && rook.type === 'r' && rook.color === color;
  };

  const canK = color === 'w' ? castling.wK : castling.bK;
  if (canK && hasRook(7) && isEmpty(5) && isEmpty(6)) {
    pushMove(moves, from, squareAt(6, homeRank), { isCastle: true, castleSide: 'k' });
  }

  const canQ = color === 'w' ? castling.wQ : castling.bQ;
  if (canQ && hasRook(0) && isEmpty(3) && isEmpty(2) && isEmpty(1)) {
    pushMove(moves, from, squareAt(2, homeRank), { isCastle: true, castleSide: 'q' });
  }
}

/**
 * Per-kind movement rules. One closed switch instead of piece objects keeps
 * every rule a plain function of the position.
 */
function addMovesForKind(position: Position, kind: PieceType, from: Square, color: Color, moves: Move[]) {
  const { board } = position;
  switch (kind) {
    case 'p':
      addPawnMoves(position, from, color, moves);
      break;
    case 'n':
      addStepMoves(board, from, color, KNIGHT_DELTAS, moves);
      break;
    case 'b':
      addSlidingMoves(board, from, color, BISHOP_DIRECTIONS, moves);
      break;
    case 'r':
      addSlidingMoves(board, from, color, ROOK_DIRECTIONS, moves);
      break;
    case 'q':
      addSlidingMoves(board, from, color, QUEEN_DIRECTIONS, moves);
      break;
    case 'k':
      addStepMoves(board, from, color, KING_DELTAS, moves);
      addCastleCandidates(position, from, color, moves);
      break;
  }
}

function addMovesFromSquare(position: Position, from: Square, moves: Move[]) {
  const p = getPiece(position.board, from);
  if (!p) return;
  if (p.color !== position.sideToMove) return;
  addMovesForKind(position, p.type, from, p.color, moves);
}

/**
 * Generates pseudo-legal moves for the current side to move, in board-scan order.
 *
 * If `fromSquare` is provided, only moves from that square are generated.
 */
export function generatePseudoLegalMoves(position: Position, fromSquare?: Square): Move[] {
  const moves: Move[] = [];
  if (typeof fromSquare === 'number') {
    addMovesFromSquare(position, fromSquare, moves);
    return moves;
  }

  for (let sq = 0; sq < 64; sq++) {
    addMovesFromSquare(position, sq, moves);
  }
  return moves;
}
