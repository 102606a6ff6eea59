import type { Board, Color, Piece, PieceType, ReadonlyBoard, Square } from './chessTypes';
import { squareAt } from './square';

export function createEmptyBoard(): Board {
  return Array.from({ length: 64 }, () => null);
}

export function getPiece(board: ReadonlyBoard, square: Square): Piece | null {
  return board[square] ?? null;
}

/** Copy-on-write: returns a new board with `square` replaced. */
export function setPiece(board: ReadonlyBoard, square: Square, piece: Piece | null): Board {
  const next = board.slice();
  next[square] = piece;
  return next;
}

export function piece(color: Color, type: PieceType): Piece {
  return { color, type };
}

const BACK_RANK: readonly PieceType[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];

/**
 * Standard chess starting position.
 *
 * Board convention is 0=a1..63=h8.
 */
export function createStartingBoard(): Board {
  const b = createEmptyBoard();

  for (let file = 0; file < 8; file++) {
    b[squareAt(file, 0)] = piece('w', BACK_RANK[file]);
    b[squareAt(file, 1)] = piece('w', 'p');
    b[squareAt(file, 6)] = piece('b', 'p');
    b[squareAt(file, 7)] = piece('b', BACK_RANK[file]);
  }

  return b;
}

/**
 * Lazily yields `[square, piece]` pairs in a1..h8 order for every occupied
 * square matching `predicate`. Each iteration rescans the board.
 */
export function squaresWith(
  board: ReadonlyBoard,
  predicate: (piece: Piece, square: Square) => boolean = () => true
): Iterable<readonly [Square, Piece]> {
  return {
    *[Symbol.iterator]() {
      for (let sq = 0; sq < 64; sq++) {
        const p = board[sq];
        if (p && predicate(p, sq)) yield [sq, p] as const;
      }
    }
  };
}

export function countPieces(board: ReadonlyBoard): number {
  let n = 0;
  for (const sq of board) {
    if (sq) n++;
  }
  return n;
}

export function boardsEqual(a: ReadonlyBoard, b: ReadonlyBoard): boolean {
  for (let sq = 0; sq < 64; sq++) {
    const pa = a[sq] ?? null;
    const pb = b[sq] ?? null;
    if (pa === null || pb === null) {
      if (pa !== pb) return false;
      continue;
    }
    if (pa.color !== pb.color || pa.type !== pb.type) return false;
  }
  return true;
}
