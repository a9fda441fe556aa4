import type { StateCreator } from 'zustand/vanilla';
import type { StateManagerState } from '../index.ts';
import type { StateManagerServices } from '../services.ts';
import type { CanvasState } from '../../canvas/canvas-state.ts';
import type { CanvasElement } from '../../canvas/element.ts';
import type { Point } from '../../shared/grid/types.ts';
import { ORIGIN, addPoints } from '../../shared/grid/point.ts';

/** One cell write, in canvas coordinates before the edit */
export interface CellEdit {
  x: number;
  y: number;
  element: CanvasElement;
}

export interface CanvasSlice {
  /** The canonical canvas. Replaced, never mutated, on every change. */
  canvas: CanvasState;
  /** Translation of existing content since the last history snapshot */
  deltaTrans: Point;
  /** Incremented on every change to `canvas` */
  revision: number;
  /** Incremented only by edits (not by simulation write-back, undo or load) */
  editRevision: number;

  getElement: (point: Point) => CanvasElement;
  /**
   * Apply an edit to a copy of the canvas, normalize it and publish it.
   * `edit` returns the translation it caused; the total, normalization
   * included, is returned and added to `deltaTrans`. A running simulator is
   * stopped around the edit and restarted on the edited canvas.
   */
  editCanvas: (edit: (canvas: CanvasState) => Point) => Point;
  /** Write cells. Later edits are shifted by the translation earlier ones caused. */
  setCells: (edits: readonly CellEdit[]) => Point;
  /** Replace the canvas and start a fresh history from it. */
  loadCanvas: (canvas: CanvasState) => void;
}

export function createCanvasSlice(
  services: StateManagerServices,
  initial: CanvasState,
): StateCreator<StateManagerState, [], [], CanvasSlice> {
  return (set, get) => ({
    canvas: initial,
    deltaTrans: ORIGIN,
    revision: 0,
    editRevision: 0,

    getElement: (point) => get().canvas.at(point),

    editCanvas: (edit) => {
      const wasRunning = get().simulatorRunning;
      if (wasRunning) get().stopSimulator();

      const canvas = get().canvas.clone();
      const moved = edit(canvas);
      const translation = addPoints(moved, canvas.normalize());
      set((state) => ({
        canvas,
        deltaTrans: addPoints(state.deltaTrans, translation),
        revision: state.revision + 1,
        editRevision: state.editRevision + 1,
      }));

      if (wasRunning) get().startSimulator();
      return translation;
    },

    setCells: (edits) =>
      get().editCanvas((canvas) => {
        let moved: Point = ORIGIN;
        for (const { x, y, element } of edits) {
          moved = addPoints(moved, canvas.set(x + moved.x, y + moved.y, element));
        }
        return moved;
      }),

    loadCanvas: (loaded) => {
      if (get().simulatorRunning) get().stopSimulator();
      const canvas = loaded.clone();
      canvas.normalize();
      services.history.clear(canvas);
      set((state) => ({ canvas, deltaTrans: ORIGIN, revision: state.revision + 1 }));
    },
  });
}
