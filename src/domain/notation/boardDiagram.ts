import type { Color, Piece, ReadonlyBoard } from '../chessTypes';
import { FILES, squareAt } from '../square';

export type BoardDiagramOptions = {
  /** Which side is at the bottom of the diagram. */
  orientation?: Color;
  glyphs?: 'ascii' | 'unicode';
  /** Rank numbers on the left and a file-letter line at the bottom. */
  coordinates?: boolean;
};

const UNICODE_GLYPHS: Record<Color, Record<Piece['type'], string>> = {
  w: { k: '♔', q: '♕', r: '♖', b: '♗', n: '♘', p: '♙' },
  b: { k: '♚', q: '♛', r: '♜', b: '♝', n: '♞', p: '♟' }
};

function glyph(p: Piece | null, glyphs: 'ascii' | 'unicode'): string {
  if (glyphs === 'unicode') return p ? UNICODE_GLYPHS[p.color][p.type] : '·';
  if (!p) return '.';
  return p.color === 'w' ? p.type.toUpperCase() : p.type;
}

/**
 * 8x8 text grid, one line per rank, squares separated by a space.
 *
 * With white at the bottom:
 * ```
 * r n b q k b n r
 * p p p p p p p p
 * . . . . . . . .
 * ...
 * ```
 */
export function formatBoard(board: ReadonlyBoard, options: BoardDiagramOptions = {}): string {
  const { orientation = 'w', glyphs = 'ascii', coordinates = false } = options;

  const ranks = orientation === 'w' ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];
  const files = orientation === 'w' ? [0, 1, 2, 3, 4, 5, 6, 7] : [7, 6, 5, 4, 3, 2, 1, 0];

  const lines = ranks.map((r) => {
    const cells = files.map((f) => glyph(board[squareAt(f, r)] ?? null, glyphs)).join(' ');
    return coordinates ? `${r + 1} ${cells}` : cells;
  });

  if (coordinates) {
    lines.push(`  ${files.map((f) => FILES[f]).join(' ')}`);
  }

  return lines.join('\n');
}
