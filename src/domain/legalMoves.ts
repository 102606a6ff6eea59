import type { Color, Move, Position, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { isInCheck, isSquareAttacked } from './attack';
import { movePieces } from './applyMove';
import { generatePseudoLegalMoves } from './movegen';
import { fileOf, rankOf, squareAt } from './square';

function castlePathSquares(from: Square, to: Square): Square[] {
  // King-side: e1->g1 passes through f1; queen-side: e1->c1 passes through d1.
  // Both include the destination, exclude the origin.
  const dir = Math.sign(fileOf(to) - fileOf(from));
  const squares: Square[] = [];
  for (let f = fileOf(from) + dir; f !== fileOf(to) + dir; f += dir) {
    squares.push(squareAt(f, rankOf(from)));
  }
  return squares;
}

function isCastleLegal(position: Position, move: Move): boolean {
  const color = position.sideToMove;
  const enemy: Color = oppositeColor(color);

  // King cannot castle out of check.
  if (isInCheck(position.board, color)) return false;

  // King cannot pass through or land on attacked squares.
  return castlePathSquares(move.from, move.to).every((sq) => !isSquareAttacked(position.board, sq, enemy));
}

/**
 * Legal move generation.
 *
 * Filters pseudo-legal moves by king safety:
 * - a move is legal if after making it on a scratch board, your king is not in check.
 * - castling additionally requires not being in check and not passing through check.
 */
export function generateLegalMoves(position: Position, fromSquare?: Square): Move[] {
  const pseudo = generatePseudoLegalMoves(position, fromSquare);
  const color = position.sideToMove;

  const legal: Move[] = [];
  for (const m of pseudo) {
    if (m.isCastle && !isCastleLegal(position, m)) continue;

    const { board } = movePieces(position.board, m);
    if (!isInCheck(board, color)) {
      legal.push(m);
    }
  }
  return legal;
}

export function sameMove(a: Move, b: Move): boolean {
  return a.from === b.from && a.to === b.to && (a.promotion ?? null) === (b.promotion ?? null);
}

/** The generated legal move matching `move` on from/to/promotion, if any. */
export function findLegalMove(position: Position, move: Move): Move | null {
  return generateLegalMoves(position, move.from).find((m) => sameMove(m, move)) ?? null;
}
