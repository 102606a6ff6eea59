import type { Move } from './chessTypes';
import { moveToUci } from './notation/uci';

export type RecordField =
  | 'record'
  | 'length'
  | 'placement'
  | 'sideToMove'
  | 'castling'
  | 'enPassant'
  | 'halfmoveClock'
  | 'fullmoveNumber'
  | 'flags';

/**
 * Every failure a caller can cause. Each is recoverable by retrying with
 * corrected input.
 */
export type ChessError =
  | { kind: 'illegalMove'; move: Move; reason: string }
  | { kind: 'noHistory' }
  | { kind: 'noRedo' }
  | { kind: 'malformedRecord'; field: RecordField; reason: string };

export type Result<T, E = ChessError> = { ok: true; value: T } | { ok: false; error: E };

export type MalformedRecord = Extract<ChessError, { kind: 'malformedRecord' }>;

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail(error: ChessError): { ok: false; error: ChessError } {
  return { ok: false, error };
}

export function malformed(field: RecordField, reason: string): { ok: false; error: MalformedRecord } {
  return { ok: false, error: { kind: 'malformedRecord', field, reason } };
}

export function formatChessError(error: ChessError): string {
  switch (error.kind) {
    case 'illegalMove':
      return `Illegal move ${moveToUci(error.move)}: ${error.reason}`;
    case 'noHistory':
      return 'Nothing to undo';
    case 'noRedo':
      return 'Nothing to redo';
    case 'malformedRecord':
      return `Malformed record (${error.field}): ${error.reason}`;
  }
}

/** Thrown by the non-`try` API variants; carries the typed error. */
export class ChessRuleError extends Error {
  readonly error: ChessError;

  constructor(error: ChessError) {
    super(formatChessError(error));
    this.name = 'ChessRuleError';
    this.error = error;
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new ChessRuleError(result.error);
  return result.value;
}
