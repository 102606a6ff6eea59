import { boardsEqual, createEmptyBoard, createStartingBoard, getPiece, piece, setPiece, squaresWith } from '../board';
import { toAlgebraic } from '../square';

describe('domain/board', () => {
  it('setPiece returns a new board and leaves the input alone', () => {
    const empty = createEmptyBoard();
    const next = setPiece(empty, 27, piece('w', 'q'));

    expect(getPiece(next, 27)).toEqual({ color: 'w', type: 'q' });
    expect(getPiece(empty, 27)).toBeNull();
    expect(next).not.toBe(empty);
  });

  it('squaresWith yields matching pieces in a1..h8 order', () => {
    const b = createStartingBoard();
    const knights = [...squaresWith(b, (p) => p.type === 'n')].map(([s, p]) => `${toAlgebraic(s)}:${p.color}`);
    expect(knights).toEqual(['b1:w', 'g1:w', 'b8:b', 'g8:b']);
  });

  it('squaresWith can be iterated more than once', () => {
    const b = createStartingBoard();
    const kings = squaresWith(b, (p) => p.type === 'k');
    expect([...kings]).toHaveLength(2);
    expect([...kings]).toHaveLength(2);
    expect([...squaresWith(b)]).toHaveLength(32);
  });

  it('boardsEqual compares piece values, not identity', () => {
    const a = setPiece(createEmptyBoard(), 4, piece('w', 'k'));
    const b = setPiece(createEmptyBoard(), 4, { color: 'w', type: 'k' });
    const c = setPiece(createEmptyBoard(), 4, piece('b', 'k'));
    expect(boardsEqual(a, b)).toBe(true);
    expect(boardsEqual(a, c)).toBe(false);
    expect(boardsEqual(a, createEmptyBoard())).toBe(false);
  });
});
