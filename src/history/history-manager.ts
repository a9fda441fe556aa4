import type { CanvasState } from '../canvas/canvas-state.ts';
import type { Point } from '../shared/grid/types.ts';
import { ORIGIN, negatePoint } from '../shared/grid/point.ts';
import { HISTORY_CONFIG } from '../shared/constants/index.ts';
import { assert } from '../shared/assert/index.ts';
import { createLogger } from '../shared/logger/index.ts';

const log = createLogger('History');

/** An immutable canvas copy and the viewport translation accumulated since the previous snapshot */
export interface HistorySnapshot {
  readonly id: number;
  readonly canvas: CanvasState;
  readonly viewportDelta: Point;
}

/** What the caller applies after undo or redo */
export interface HistoryMove {
  canvas: CanvasState;
  /** Translation the viewport must apply to keep content in place */
  viewportDelta: Point;
}

export interface HistoryOptions {
  /** Snapshots kept on the undo stack, the current one included */
  maxEntries?: number;
}

/**
 * Linear undo/redo over canvas snapshots. The top of the undo stack is the
 * current state; a new save clears the redo stack. The saved marker tracks
 * the snapshot that matches the last successful file save.
 */
export class HistoryManager {
  private readonly maxEntries: number;
  private undoStack: HistorySnapshot[] = [];
  private redoStack: HistorySnapshot[] = [];
  private nextId = 0;
  private savedId: number | null = null;

  constructor(initial: CanvasState, options: HistoryOptions = {}) {
    this.maxEntries = options.maxEntries ?? HISTORY_CONFIG.MAX_ENTRIES;
    assert(this.maxEntries >= 1, `Invalid history size ${this.maxEntries}`);
    this.clear(initial);
  }

  /**
   * Push `canvas` unless it equals the current state. Returns whether a
   * snapshot was pushed.
   */
  saveToHistory(canvas: CanvasState, viewportDelta: Point = ORIGIN): boolean {
    if (this.top().canvas.equals(canvas)) return false;

    this.undoStack.push(this.snapshot(canvas, viewportDelta));
    this.redoStack = [];
    if (this.undoStack.length > this.maxEntries) {
      const dropped = this.undoStack.length - this.maxEntries;
      this.undoStack.splice(0, dropped);
      log.debug('Trimmed history', { dropped });
    }
    return true;
  }

  /** Step back one snapshot. Null when only the oldest snapshot is left. */
  undo(): HistoryMove | null {
    if (!this.canUndo()) return null;
    const undone = this.top();
    this.undoStack.pop();
    this.redoStack.push(undone);
    return { canvas: this.top().canvas.clone(), viewportDelta: negatePoint(undone.viewportDelta) };
  }

  /** Reapply the last undone snapshot. Null when there is nothing to redo. */
  redo(): HistoryMove | null {
    const redone = this.redoStack.pop();
    if (!redone) return null;
    this.undoStack.push(redone);
    return { canvas: redone.canvas.clone(), viewportDelta: { ...redone.viewportDelta } };
  }

  canUndo(): boolean {
    return this.undoStack.length > 1;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /** Copy of the current state. */
  current(): CanvasState {
    return this.top().canvas.clone();
  }

  /** Mark the current state as the one on disk. */
  setSaved(): void {
    this.savedId = this.top().id;
  }

  changedSinceLastSave(): boolean {
    return this.top().id !== this.savedId;
  }

  /** Drop all history and start again from `canvas`, marked as saved. */
  clear(canvas: CanvasState): void {
    this.undoStack = [this.snapshot(canvas, ORIGIN)];
    this.redoStack = [];
    this.setSaved();
  }

  private top(): HistorySnapshot {
    return this.undoStack[this.undoStack.length - 1];
  }

  private snapshot(canvas: CanvasState, viewportDelta: Point): HistorySnapshot {
    return { id: this.nextId++, canvas: canvas.clone(), viewportDelta: { ...viewportDelta } };
  }
}
