import type { StateCreator } from 'zustand/vanilla';
import type { StateManagerState } from '../index.ts';
import type { StateManagerServices } from '../services.ts';
import type { Communicator } from '../../communicators/communicator.ts';
import type { PixelBuffer } from '../../canvas/pixel-format.ts';
import type { CellRect } from '../../shared/grid/types.ts';

export interface SimulationSlice {
  simulatorRunning: boolean;

  /** Start on the current canvas. Returns false when there is nothing to simulate. */
  startSimulator: () => boolean;
  /** Stop and take the live levels into the canvas. No-op while stopped. */
  stopSimulator: () => void;
  /** Advance one tick while stopped. No-op while running. */
  stepSimulator: () => void;
  startOrStopSimulator: () => void;
  /** Put every element and device back to its default level. */
  resetSimulator: () => void;
  setSimulationPeriod: (periodMs: number) => void;
  sendCommunicatorEvent: (index: number, pressed: boolean) => void;
  /** Register a communicator; returns the index elements bind to. */
  registerCommunicator: (communicator: Communicator) => number;
  /** Copy the live levels into the canvas without stopping. No-op while stopped. */
  updateDefaultState: () => void;
  /** Render live levels while running, the canvas otherwise; `useDefaultView` always renders defaults. */
  fillPixels: (useDefaultView: boolean, buffer: PixelBuffer, region: CellRect) => void;
}

export function createSimulationSlice(
  services: StateManagerServices,
): StateCreator<StateManagerState, [], [], SimulationSlice> {
  const { simulator } = services;

  return (set, get) => ({
    simulatorRunning: false,

    startSimulator: () => {
      if (get().simulatorRunning) return true;
      const started = simulator.start(get().canvas);
      set({ simulatorRunning: started });
      return started;
    },

    stopSimulator: () => {
      if (!get().simulatorRunning) return;
      const canvas = simulator.stop();
      set((state) => ({ canvas, simulatorRunning: false, revision: state.revision + 1 }));
    },

    stepSimulator: () => {
      if (get().simulatorRunning) return;
      const canvas = simulator.step(get().canvas);
      if (canvas === get().canvas) return;
      set((state) => ({ canvas, revision: state.revision + 1 }));
    },

    startOrStopSimulator: () => {
      if (get().simulatorRunning) {
        get().stopSimulator();
      } else {
        get().startSimulator();
      }
    },

    resetSimulator: () => {
      simulator.reset();
      set((state) => ({ canvas: state.canvas.resetLevels(), revision: state.revision + 1 }));
    },

    setSimulationPeriod: (periodMs) => simulator.setPeriod(periodMs),

    sendCommunicatorEvent: (index, pressed) => simulator.sendCommunicatorEvent(index, pressed),

    registerCommunicator: (communicator) => simulator.communicators.register(communicator),

    updateDefaultState: () => {
      if (!get().simulatorRunning) return;
      const canvas = simulator.liveCanvas();
      set((state) => ({ canvas, revision: state.revision + 1 }));
    },

    fillPixels: (useDefaultView, buffer, region) => {
      const source = get().simulatorRunning && !useDefaultView ? simulator.liveCanvas() : get().canvas;
      source.fillPixels(useDefaultView, buffer, region);
    },
  });
}
