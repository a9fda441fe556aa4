import type { StateCreator } from 'zustand/vanilla';
import type { StateManagerState } from '../index.ts';
import type { StateManagerServices } from '../services.ts';
import type { CanvasState } from '../../canvas/canvas-state.ts';
import { decodeCanvas, encodeCanvas } from '../../canvas/canvas-codec.ts';
import type { DecodeError } from '../../canvas/canvas-codec.ts';
import type { Result } from '../../shared/result/index.ts';
import { createLogger } from '../../shared/logger/index.ts';

const log = createLogger('File');

export interface FileSlice {
  /** Bytes of the canvas, taking live levels from a running simulator first. */
  exportCanvas: () => Uint8Array;
  /** Decode and load bytes. A failed decode leaves the canvas as it was. */
  importCanvas: (bytes: Uint8Array) => Result<CanvasState, DecodeError>;
  /** Record that the exported bytes reached disk. Call only after a successful write. */
  markSaved: () => void;
}

export function createFileSlice(
  services: StateManagerServices,
): StateCreator<StateManagerState, [], [], FileSlice> {
  return (_set, get) => ({
    exportCanvas: () => {
      get().updateDefaultState();
      return encodeCanvas(get().canvas);
    },

    importCanvas: (bytes) => {
      const result = decodeCanvas(bytes);
      if (result.ok) {
        get().loadCanvas(result.value);
        log.info('Canvas loaded', { width: result.value.width, height: result.value.height });
      }
      return result;
    },

    markSaved: () => services.history.setSaved(),
  });
}
