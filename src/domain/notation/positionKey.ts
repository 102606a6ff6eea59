import type { CastlingRights, Color, Piece, PieceType, Position } from '../chessTypes';
import type { MalformedRecord, Result } from '../errors';
import { malformed, ok } from '../errors';
import { createEmptyBoard } from '../board';
import { fileOf, squareAt } from '../square';

/**
 * Fixed-width binary position key.
 *
 * Layout (34 bytes):
 * - bytes 0..31: two squares per byte, rank 8 down to rank 1, files a..h,
 *   first square in the high nibble. Nibble = kind << 1 | color.
 * - byte 32: bit 7 side to move (1 = black), bits 3..0 castling K Q k q.
 * - byte 33: 0 without an en passant target, else 0x08 | file.
 *
 * Clocks are not part of the key: two positions that differ only in their
 * clocks repeat each other.
 */

export const POSITION_KEY_BYTES = 34;

const KIND_CODES: Record<PieceType, number> = {
  p: 0b001,
  r: 0b010,
  n: 0b011,
  b: 0b100,
  k: 0b101,
  q: 0b110
};

const KINDS_BY_CODE: ReadonlyArray<PieceType | null> = [null, 'p', 'r', 'n', 'b', 'k', 'q', null];

const CASTLING_BITS: ReadonlyArray<{ right: keyof CastlingRights; bit: number }> = [
  { right: 'wK', bit: 0b1000 },
  { right: 'wQ', bit: 0b0100 },
  { right: 'bK', bit: 0b0010 },
  { right: 'bQ', bit: 0b0001 }
];

const SIDE_BIT = 0b1000_0000;
const EN_PASSANT_PRESENT = 0b1000;

function pieceToNibble(p: Piece | null): number {
  if (!p) return 0;
  return (KIND_CODES[p.type] << 1) | (p.color === 'b' ? 1 : 0);
}

/** Board squares in key order: a8..h8, a7..h7, ..., a1..h1. */
function keyOrderSquare(index: number): number {
  const rank = 7 - Math.floor(index / 8);
  return squareAt(index % 8, rank);
}

export function encodePosition(position: Position): Uint8Array {
  const out = new Uint8Array(POSITION_KEY_BYTES);

  for (let i = 0; i < 64; i += 2) {
    const hi = pieceToNibble(position.board[keyOrderSquare(i)] ?? null);
    const lo = pieceToNibble(position.board[keyOrderSquare(i + 1)] ?? null);
    out[i / 2] = (hi << 4) | lo;
  }

  let flags = position.sideToMove === 'b' ? SIDE_BIT : 0;
  for (const { right, bit } of CASTLING_BITS) {
    if (position.castling[right]) flags |= bit;
  }
  out[32] = flags;
  out[33] = position.enPassantTarget === null ? 0 : EN_PASSANT_PRESENT | fileOf(position.enPassantTarget);

  return out;
}

function nibbleToPiece(nibble: number): Piece | null | undefined {
  if (nibble === 0) return null;
  const type = KINDS_BY_CODE[nibble >> 1];
  // Empty kind with the color bit set, or the reserved kind.
  if (!type) return undefined;
  const color: Color = (nibble & 1) === 1 ? 'b' : 'w';
  return { color, type };
}

/**
 * Exact inverse of `encodePosition`. Clocks come back as 0 / 1.
 */
export function decodePosition(bytes: Uint8Array): Result<Position, MalformedRecord> {
  if (bytes.length !== POSITION_KEY_BYTES) {
    return malformed('length', `expected ${POSITION_KEY_BYTES} bytes, got ${bytes.length}`);
  }

  const board = createEmptyBoard();
  for (let i = 0; i < 64; i++) {
    const byte = bytes[i >> 1];
    const nibble = i % 2 === 0 ? byte >> 4 : byte & 0x0f;
    const p = nibbleToPiece(nibble);
    if (p === undefined) {
      return malformed('placement', `invalid square code ${nibble.toString(2).padStart(4, '0')} at index ${i}`);
    }
    board[keyOrderSquare(i)] = p;
  }

  const flags = bytes[32];
  if ((flags & 0b0111_0000) !== 0) return malformed('flags', 'reserved flag bits are set');

  const sideToMove: Color = (flags & SIDE_BIT) !== 0 ? 'b' : 'w';
  const castling: CastlingRights = { wK: false, wQ: false, bK: false, bQ: false };
  for (const { right, bit } of CASTLING_BITS) {
    castling[right] = (flags & bit) !== 0;
  }

  const ep = bytes[33];
  let enPassantTarget: number | null = null;
  if (ep !== 0) {
    if ((ep & ~0b1111) !== 0 || (ep & EN_PASSANT_PRESENT) === 0) {
      return malformed('enPassant', `invalid en passant byte ${ep}`);
    }
    // The target sits behind a pawn that just moved two squares.
    enPassantTarget = squareAt(ep & 0b0111, sideToMove === 'w' ? 5 : 2);
  }

  return ok({
    board,
    sideToMove,
    castling,
    enPassantTarget,
    halfmoveClock: 0,
    fullmoveNumber: 1
  });
}

/** Hex form of the binary key; what the repetition table counts. */
export function positionKey(position: Position): string {
  let hex = '';
  for (const byte of encodePosition(position)) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}
