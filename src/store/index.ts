import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import { createCanvasSlice } from './slices/canvas-slice.ts';
import type { CanvasSlice } from './slices/canvas-slice.ts';
import { createSimulationSlice } from './slices/simulation-slice.ts';
import type { SimulationSlice } from './slices/simulation-slice.ts';
import { createHistorySlice, initHistory } from './slices/history-slice.ts';
import type { HistorySlice } from './slices/history-slice.ts';
import { createClipboardSlice } from './slices/clipboard-slice.ts';
import type { ClipboardSlice } from './slices/clipboard-slice.ts';
import { createFileSlice } from './slices/file-slice.ts';
import type { FileSlice } from './slices/file-slice.ts';
import type { StateManagerServices } from './services.ts';
import { CanvasState } from '../canvas/canvas-state.ts';
import { Simulator } from '../simulation/simulator.ts';
import type { SimulatorOptions } from '../simulation/simulator.ts';
import { HistoryManager } from '../history/history-manager.ts';
import type { HistoryOptions } from '../history/history-manager.ts';
import { ClipboardManager } from '../clipboard/clipboard-manager.ts';
import type { ClipboardOptions } from '../clipboard/clipboard-manager.ts';

export type StateManagerState = CanvasSlice & SimulationSlice & HistorySlice & ClipboardSlice & FileSlice;

export type StateManager = StoreApi<StateManagerState>;

export interface StateManagerOptions {
  /** Starting canvas; normalized before use. Empty by default. */
  initialCanvas?: CanvasState;
  simulator?: SimulatorOptions;
  history?: HistoryOptions;
  clipboard?: ClipboardOptions<unknown>;
  /** Snapshot history after every edit. Defaults to true. */
  autoHistory?: boolean;
}

/** Create the store that owns the canvas and drives simulator, history and clipboard. */
export function createStateManager(options: StateManagerOptions = {}): StateManager {
  const initial = (options.initialCanvas ?? new CanvasState()).clone();
  initial.normalize();

  const services: StateManagerServices = {
    simulator: new Simulator(options.simulator),
    history: new HistoryManager(initial, options.history),
    clipboard: new ClipboardManager(options.clipboard),
  };

  const store = createStore<StateManagerState>()((...a) => ({
    ...createCanvasSlice(services, initial)(...a),
    ...createSimulationSlice(services)(...a),
    ...createHistorySlice(services)(...a),
    ...createClipboardSlice(services)(...a),
    ...createFileSlice(services)(...a),
  }));

  // Record a history snapshot after every edit
  if (options.autoHistory !== false) {
    initHistory(store);
  }

  return store;
}

export type { StateManagerServices } from './services.ts';
export type { CellEdit, CanvasSlice } from './slices/canvas-slice.ts';
export type { SimulationSlice } from './slices/simulation-slice.ts';
export type { HistorySlice } from './slices/history-slice.ts';
export type { ClipboardSlice } from './slices/clipboard-slice.ts';
export type { FileSlice } from './slices/file-slice.ts';
