export type {
  Board,
  CastlingRights,
  Color,
  DrawReason,
  GameStatus,
  HistoryEntry,
  Move,
  Piece,
  PieceType,
  Position,
  PromotionType,
  ReadonlyBoard,
  Square
} from './chessTypes';

export { isGameOver, oppositeColor } from './chessTypes';

export {
  FILES,
  fileOf,
  isLightSquare,
  isOnBoard,
  isSquare,
  makeSquare,
  parseAlgebraicSquare,
  rankOf,
  squareAt,
  toAlgebraic
} from './square';

export {
  boardsEqual,
  countPieces,
  createEmptyBoard,
  createStartingBoard,
  getPiece,
  piece,
  setPiece,
  squaresWith
} from './board';

export {
  STARTING_CASTLING_RIGHTS,
  clonePosition,
  createInitialPosition,
  positionsEqual,
  validatePosition
} from './position';

export { generatePseudoLegalMoves, PROMOTION_PIECES } from './movegen';
export { findKing, isInCheck, isSquareAttacked } from './attack';
export { findLegalMove, generateLegalMoves, sameMove } from './legalMoves';
export type { AppliedMove } from './applyMove';
export { applyMove, revertMove } from './applyMove';

export type { StatusContext } from './gameStatus';
export { getGameStatus, isInsufficientMaterial } from './gameStatus';

export { HistoryLog } from './history';
export { RepetitionTable } from './repetition';

export type { ChessGameOptions } from './chessGame';
export { ChessGame } from './chessGame';

export type { ChessError, MalformedRecord, RecordField, Result } from './errors';
export { ChessRuleError, formatChessError } from './errors';

export type { RulesConfig } from './rulesConfig';
export { DEFAULT_RULES, resolveRulesConfig } from './rulesConfig';

export type { Logger } from './logger';
export { createConsoleLogger, silentLogger } from './logger';

export type { FenParseResult } from './notation/fen';
export { STARTING_FEN, parseFEN, toFEN, tryParseFEN } from './notation/fen';
export { POSITION_KEY_BYTES, decodePosition, encodePosition, positionKey } from './notation/positionKey';
export type { BoardDiagramOptions } from './notation/boardDiagram';
export { formatBoard } from './notation/boardDiagram';
export { moveToUci } from './notation/uci';
