import type { GameStatus, Piece, Position, ReadonlyBoard, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { squaresWith } from './board';
import { isInCheck } from './attack';
import { generateLegalMoves } from './legalMoves';
import type { RulesConfig } from './rulesConfig';
import { DEFAULT_RULES } from './rulesConfig';
import { isLightSquare } from './square';

export type StatusContext = {
  /** How often the current position has occurred in this game, itself included. */
  repetitionCount: number;
  rules: Readonly<RulesConfig>;
};

/**
 * Non-mating material sets:
 * - K vs K
 * - K+N vs K
 * - K+B vs K
 * - any number of bishops (either side), all on squares of one color
 */
export function isInsufficientMaterial(board: ReadonlyBoard): boolean {
  const nonKing: Array<{ piece: Piece; square: Square }> = [];
  for (const [square, piece] of squaresWith(board, (p) => p.type !== 'k')) {
    nonKing.push({ piece, square });
  }

  if (nonKing.length === 0) return true;

  // Any pawns, rooks, or queens mean sufficient material.
  if (nonKing.some(({ piece }) => piece.type === 'p' || piece.type === 'r' || piece.type === 'q')) {
    return false;
  }

  if (nonKing.length === 1) return true; // lone knight or bishop

  if (nonKing.every(({ piece }) => piece.type === 'b')) {
    const light = isLightSquare(nonKing[0].square);
    return nonKing.every(({ square }) => isLightSquare(square) === light);
  }

  return false;
}

/**
 * Zero legal moves decides first (checkmate or stalemate), then the draw rules
 * in this order: insufficient material, repetition, fifty-move.
 */
export function getGameStatus(
  position: Position,
  context: StatusContext = { repetitionCount: 1, rules: DEFAULT_RULES }
): GameStatus {
  const { rules } = context;
  const stm = position.sideToMove;
  const legalMoves = generateLegalMoves(position);
  const inCheck = isInCheck(position.board, stm);

  if (legalMoves.length === 0) {
    return inCheck ? { kind: 'checkmate', winner: oppositeColor(stm) } : { kind: 'stalemate' };
  }

  if (rules.insufficientMaterial && isInsufficientMaterial(position.board)) {
    return { kind: 'draw', reason: 'insufficientMaterial' };
  }
  if (context.repetitionCount >= rules.repetitionCount) {
    return { kind: 'draw', reason: 'threefoldRepetition' };
  }
  if (rules.fiftyMoveHalfmoves > 0 && position.halfmoveClock >= rules.fiftyMoveHalfmoves) {
    return { kind: 'draw', reason: 'fiftyMove' };
  }

  return inCheck ? { kind: 'check', sideToMove: stm, legalMoves } : { kind: 'inProgress', sideToMove: stm, legalMoves };
}
