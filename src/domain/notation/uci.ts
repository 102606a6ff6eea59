import type { Move } from '../chessTypes';
import { toAlgebraic } from '../square';

/**
 * UCI-style move text, used in log lines, error messages and test output.
 *
 * Examples:
 * - e2e4
 * - e7e8q (promotion)
 * - e1g1 (castling is written as the king's move)
 */
export function moveToUci(move: Move): string {
  const from = toAlgebraic(move.from);
  const to = toAlgebraic(move.to);
  const promo = move.promotion ?? '';
  return `${from}${to}${promo}`;
}
