import type { Square } from './chessTypes';

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export function isSquare(x: unknown): x is Square {
  return typeof x === 'number' && Number.isInteger(x) && x >= 0 && x < 64;
}

export function fileOf(square: Square): number {
  return square % 8;
}

export function rankOf(square: Square): number {
  return Math.floor(square / 8);
}

export function isOnBoard(file: number, rank: number): boolean {
  return Number.isInteger(file) && Number.isInteger(rank) && file >= 0 && file < 8 && rank >= 0 && rank < 8;
}

export function makeSquare(file: number, rank: number): Square | null {
  if (!isOnBoard(file, rank)) return null;
  return rank * 8 + file;
}

/**
 * Like `makeSquare`, for coordinates the caller already knows are on the board
 * (home squares, fixed offsets that were range-checked).
 */
export function squareAt(file: number, rank: number): Square {
  const sq = makeSquare(file, rank);
  if (sq === null) throw new Error(`Invalid square (file=${file}, rank=${rank})`);
  return sq;
}

export function toAlgebraic(square: Square): string {
  const f = FILES[fileOf(square)];
  const r = (rankOf(square) + 1).toString();
  return `${f}${r}`;
}

export function parseAlgebraicSquare(text: string): Square | null {
  if (typeof text !== 'string') return null;
  const t = text.trim().toLowerCase();
  if (t.length !== 2) return null;

  const f = t.charCodeAt(0) - 'a'.charCodeAt(0);
  const r = Number(t[1]);
  if (!Number.isInteger(r) || r < 1 || r > 8) return null;
  return makeSquare(f, r - 1);
}

/** Light squares have odd file+rank parity (b1, a2, ...). */
export function isLightSquare(square: Square): boolean {
  return (fileOf(square) + rankOf(square)) % 2 === 1;
}
