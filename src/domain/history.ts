import type { HistoryEntry } from './chessTypes';

/**
 * Applied moves plus a redo stack.
 * Entries are deltas (see `HistoryEntry`), not position snapshots.
 */
export class HistoryLog {
  private applied: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];

  /**
   * Record a new move made by the player.
   * This clears any redo entries left over from earlier undos.
   */
  push(entry: HistoryEntry): void {
    this.applied.push(entry);
    this.redoStack = [];
  }

  /**
   * Record a move replayed from the redo stack; the rest of the stack survives.
   */
  record(entry: HistoryEntry): void {
    this.applied.push(entry);
  }

  /**
   * Remove the latest entry and park it on the redo stack.
   * Returns null if nothing has been played.
   */
  popForUndo(): HistoryEntry | null {
    const entry = this.applied.pop();
    if (!entry) return null;
    this.redoStack.push(entry);
    return entry;
  }

  /**
   * Take the entry that the next redo should replay.
   * Returns null if the redo stack is empty.
   */
  takeRedo(): HistoryEntry | null {
    return this.redoStack.pop() ?? null;
  }

  /** Put an entry back on the redo stack (a redo that could not be applied). */
  restoreRedo(entry: HistoryEntry): void {
    this.redoStack.push(entry);
  }

  canUndo(): boolean {
    return this.applied.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  entries(): readonly HistoryEntry[] {
    return this.applied.slice();
  }

  last(): HistoryEntry | null {
    return this.applied[this.applied.length - 1] ?? null;
  }
}
