/**
 * Core chess domain types.
 *
 * Values of these types are plain JSON-serializable data.
 */

/** Color: white ('w') or black ('b'). */
export type Color = 'w' | 'b';

/**
 * Piece types are stored in lowercase, similar to FEN, but without color.
 * - p pawn
 * - n knight
 * - b bishop
 * - r rook
 * - q queen
 * - k king
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

export type PromotionType = Exclude<PieceType, 'k' | 'p'>;

export type Piece = Readonly<{
  color: Color;
  type: PieceType;
}>;

/**
 * 0–63 square index.
 *
 * Convention:
 * - 0 = a1
 * - 7 = h1
 * - 8 = a2
 * - 63 = h8
 */
export type Square = number;

export type CastlingRights = {
  /** White king-side (K). */
  wK: boolean;
  /** White queen-side (Q). */
  wQ: boolean;
  /** Black king-side (k). */
  bK: boolean;
  /** Black queen-side (q). */
  bQ: boolean;
};

export type Move = Readonly<{
  from: Square;
  to: Square;
  /** Promotion piece type when the move promotes a pawn. */
  promotion?: PromotionType;

  /** True for castling moves. */
  isCastle?: boolean;
  /** If isCastle, side is 'k' (king-side) or 'q' (queen-side). */
  castleSide?: 'k' | 'q';

  /** True for en passant captures. */
  isEnPassant?: boolean;
}>;

export type Board = Array<Piece | null>;
export type ReadonlyBoard = ReadonlyArray<Piece | null>;

/**
 * Everything needed to resume a game from this point: the FEN-equivalent state.
 * Positions are replaced, never edited, when a move is made.
 */
export type Position = {
  board: Board;
  sideToMove: Color;
  castling: CastlingRights;
  /** En passant target square, or null if none. */
  enPassantTarget: Square | null;
  /** Halfmove clock for the 50-move rule. */
  halfmoveClock: number;
  /** Fullmove number (starts at 1). */
  fullmoveNumber: number;
};

/**
 * Delta that inverts one applied move exactly.
 */
export type HistoryEntry = Readonly<{
  move: Move;
  /** The piece that left `move.from` (the pawn, for promotions). */
  moved: Piece;
  captured: Piece | null;
  /** Where the captured piece stood; differs from `move.to` only for en passant. */
  capturedOn: Square | null;
  priorCastling: Readonly<CastlingRights>;
  priorEnPassant: Square | null;
  priorHalfmoveClock: number;
  priorFullmoveNumber: number;
  /** Repetition key of the position this move produced. */
  positionKey: string;
}>;

export type DrawReason = 'fiftyMove' | 'threefoldRepetition' | 'insufficientMaterial';

/**
 * Game status, recomputed after every committed move.
 */
export type GameStatus =
  | Readonly<{ kind: 'inProgress'; sideToMove: Color; legalMoves: readonly Move[] }>
  | Readonly<{ kind: 'check'; sideToMove: Color; legalMoves: readonly Move[] }>
  | Readonly<{ kind: 'checkmate'; winner: Color }>
  | Readonly<{ kind: 'stalemate' }>
  | Readonly<{ kind: 'draw'; reason: DrawReason }>;

export function oppositeColor(c: Color): Color {
  return c === 'w' ? 'b' : 'w';
}

export function isGameOver(status: GameStatus): boolean {
  return status.kind !== 'inProgress' && status.kind !== 'check';
}
