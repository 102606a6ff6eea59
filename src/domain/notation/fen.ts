import type { CastlingRights, Color, Piece, Position } from '../chessTypes';
import type { MalformedRecord, Result } from '../errors';
import { malformed, ok, unwrap } from '../errors';
import { createEmptyBoard } from '../board';
import { validatePosition } from '../position';
import { parseAlgebraicSquare, rankOf, toAlgebraic } from '../square';

export type FenParseResult = Result<Position, MalformedRecord>;

export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

function pieceToFenChar(p: Piece): string {
  const c = p.type;
  return p.color === 'w' ? c.toUpperCase() : c;
}

/** Convert a Position to a FEN string. */
export function toFEN(position: Position): string {
  const ranks: string[] = [];

  for (let r = 7; r >= 0; r--) {
    let empty = 0;
    let out = '';
    for (let f = 0; f < 8; f++) {
      const p = position.board[r * 8 + f];
      if (!p) {
        empty++;
      } else {
        if (empty > 0) {
          out += String(empty);
          empty = 0;
        }
        out += pieceToFenChar(p);
      }
    }
    if (empty > 0) out += String(empty);
    ranks.push(out);
  }

  const placement = ranks.join('/');

  let castling = '';
  if (position.castling.wK) castling += 'K';
  if (position.castling.wQ) castling += 'Q';
  if (position.castling.bK) castling += 'k';
  if (position.castling.bQ) castling += 'q';
  if (castling === '') castling = '-';

  const ep = position.enPassantTarget === null ? '-' : toAlgebraic(position.enPassantTarget);

  return `${placement} ${position.sideToMove} ${castling} ${ep} ${position.halfmoveClock} ${position.fullmoveNumber}`;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function fenCharToPiece(ch: string): Piece | null {
  const lower = ch.toLowerCase();
  const color: Color = ch === lower ? 'b' : 'w';
  switch (lower) {
    case 'p':
    case 'n':
    case 'b':
    case 'r':
    case 'q':
    case 'k':
      return { color, type: lower };
    default:
      return null;
  }
}

function parsePlacement(placement: string): Result<Position['board'], MalformedRecord> {
  const ranks = placement.split('/');
  if (ranks.length !== 8) return malformed('placement', `expected 8 ranks, got ${ranks.length}`);

  const board = createEmptyBoard();
  // FEN ranks go from 8 to 1; our squares are a1=0 .. h8=63.
  for (let r = 0; r < 8; r++) {
    const fenRank = ranks[r];
    const rankIndex = 7 - r;
    let file = 0;
    let lastWasDigit = false;
    for (const ch of fenRank) {
      if (isDigit(ch)) {
        const n = Number(ch);
        if (n < 1 || n > 8 || lastWasDigit) return malformed('placement', `invalid empty-square count in rank ${rankIndex + 1}`);
        file += n;
        lastWasDigit = true;
        if (file > 8) return malformed('placement', `too many squares in rank ${rankIndex + 1}`);
        continue;
      }
      lastWasDigit = false;

      const p = fenCharToPiece(ch);
      if (!p) return malformed('placement', `invalid piece char "${ch}" in rank ${rankIndex + 1}`);
      if (file >= 8) return malformed('placement', `too many squares in rank ${rankIndex + 1}`);
      board[rankIndex * 8 + file] = p;
      file++;
    }
    if (file !== 8) return malformed('placement', `rank ${rankIndex + 1} does not have 8 files`);
  }
  return ok(board);
}

function parseCastling(text: string): Result<CastlingRights, MalformedRecord> {
  const castling: CastlingRights = { wK: false, wQ: false, bK: false, bQ: false };
  if (text === '-') return ok(castling);
  // Each letter at most once, in KQkq order.
  if (!/^K?Q?k?q?$/.test(text) || text.length === 0) {
    return malformed('castling', `invalid castling rights "${text}"`);
  }
  castling.wK = text.includes('K');
  castling.wQ = text.includes('Q');
  castling.bK = text.includes('k');
  castling.bQ = text.includes('q');
  return ok(castling);
}

function parseCounter(text: string, field: 'halfmoveClock' | 'fullmoveNumber', min: number): Result<number, MalformedRecord> {
  if (!/^[0-9]+$/.test(text)) return malformed(field, `"${text}" is not a whole number`);
  const n = Number(text);
  if (!Number.isSafeInteger(n) || n < min) return malformed(field, `must be at least ${min}`);
  return ok(n);
}

/**
 * Parse a FEN string into a Position.
 *
 * Fields 3-6 may be left out and default to "- - 0 1". The parsed position
 * goes through `validatePosition`, so the result is always playable.
 */
export function tryParseFEN(fen: string): FenParseResult {
  if (typeof fen !== 'string' || fen.trim().length === 0) return malformed('record', 'FEN must be a non-empty string');

  const parts = fen.trim().split(/\s+/);
  if (parts.length < 2) return malformed('record', 'FEN must have at least 2 fields (placement + active color)');
  if (parts.length > 6) return malformed('record', `FEN has ${parts.length} fields, at most 6 are allowed`);

  const [placement, active, castlingStr = '-', epStr = '-', halfStr = '0', fullStr = '1'] = parts;

  const board = parsePlacement(placement);
  if (!board.ok) return board;

  if (active !== 'w' && active !== 'b') return malformed('sideToMove', 'active color must be "w" or "b"');

  const castling = parseCastling(castlingStr);
  if (!castling.ok) return castling;

  let enPassantTarget: Position['enPassantTarget'] = null;
  if (epStr !== '-') {
    const sq = parseAlgebraicSquare(epStr);
    if (sq === null || epStr !== epStr.toLowerCase()) return malformed('enPassant', `invalid en passant target "${epStr}"`);
    const expectedRank = active === 'w' ? 5 : 2;
    if (rankOf(sq) !== expectedRank) {
      return malformed('enPassant', `en passant target must be on rank ${expectedRank + 1} when ${active} is to move`);
    }
    enPassantTarget = sq;
  }

  const halfmoveClock = parseCounter(halfStr, 'halfmoveClock', 0);
  if (!halfmoveClock.ok) return halfmoveClock;
  const fullmoveNumber = parseCounter(fullStr, 'fullmoveNumber', 1);
  if (!fullmoveNumber.ok) return fullmoveNumber;

  return validatePosition({
    board: board.value,
    sideToMove: active,
    castling: castling.value,
    enPassantTarget,
    halfmoveClock: halfmoveClock.value,
    fullmoveNumber: fullmoveNumber.value
  });
}

/** Throwing variant of `tryParseFEN`. */
export function parseFEN(fen: string): Position {
  return unwrap(tryParseFEN(fen));
}
