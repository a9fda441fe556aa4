import type { StateCreator } from 'zustand/vanilla';
import type { StateManagerState } from '../index.ts';
import type { StateManagerServices } from '../services.ts';
import type { HistoryMove } from '../../history/history-manager.ts';
import type { Point } from '../../shared/grid/types.ts';
import { ORIGIN } from '../../shared/grid/point.ts';

export interface HistorySlice {
  /** Snapshot the canvas with the accumulated `deltaTrans`. Returns false when nothing changed. */
  saveToHistory: () => boolean;
  /** Stop the simulator and step back. Returns the viewport translation, or null with nothing to undo. */
  undo: () => Point | null;
  /** Stop the simulator and step forward. Returns the viewport translation, or null with nothing to redo. */
  redo: () => Point | null;
  canUndo: () => boolean;
  canRedo: () => boolean;
  setSaved: () => void;
  changedSinceLastSave: () => boolean;
}

export function createHistorySlice(
  services: StateManagerServices,
): StateCreator<StateManagerState, [], [], HistorySlice> {
  const { history } = services;

  return (set, get) => {
    const move = (step: () => HistoryMove | null): Point | null => {
      if (get().simulatorRunning) get().stopSimulator();
      const result = step();
      if (!result) return null;
      set((state) => ({ canvas: result.canvas, deltaTrans: ORIGIN, revision: state.revision + 1 }));
      return result.viewportDelta;
    };

    return {
      saveToHistory: () => {
        const { canvas, deltaTrans } = get();
        if (!history.saveToHistory(canvas, deltaTrans)) return false;
        set({ deltaTrans: ORIGIN });
        return true;
      },

      undo: () => move(() => history.undo()),

      redo: () => move(() => history.redo()),

      canUndo: () => history.canUndo(),

      canRedo: () => history.canRedo(),

      setSaved: () => history.setSaved(),

      changedSinceLastSave: () => history.changedSinceLastSave(),
    };
  };
}

/**
 * Snapshot the canvas after every edit.
 * Triggers on `editRevision` only, so simulation write-back and undo are not recorded.
 */
export function initHistory(store: {
  getState(): StateManagerState;
  subscribe(listener: (state: StateManagerState, prev: StateManagerState) => void): () => void;
}): () => void {
  return store.subscribe((state, prev) => {
    if (state.editRevision !== prev.editRevision) {
      store.getState().saveToHistory();
    }
  });
}
