import type { StateCreator } from 'zustand/vanilla';
import type { StateManagerState } from '../index.ts';
import type { StateManagerServices } from '../services.ts';
import type { PreviewRenderer } from '../../clipboard/clipboard-manager.ts';
import type { CellRect, Point } from '../../shared/grid/types.ts';
import { ORIGIN } from '../../shared/grid/point.ts';

export interface ClipboardSlice {
  /** Copy the cells inside `rect` (canvas coordinates) into clipboard slot `index`. */
  copySelection: (rect: CellRect, index: number) => void;
  /** Copy, then erase the selection. Returns the translation of the remaining content. */
  cutSelection: (rect: CellRect, index: number) => Point;
  /** Paste slot `index` with its top-left corner at `at`. Returns the translation of existing content. */
  pasteAt: (at: Point, index: number) => Point;
  getClipboardOrder: () => number[];
  getClipboardPreview: (index: number) => unknown;
  setPreviewRenderer: (renderer: PreviewRenderer<unknown> | null) => void;
}

export function createClipboardSlice(
  services: StateManagerServices,
): StateCreator<StateManagerState, [], [], ClipboardSlice> {
  const { clipboard } = services;

  return (_set, get) => ({
    copySelection: (rect, index) => {
      clipboard.write(get().canvas.extract(rect), index);
    },

    cutSelection: (rect, index) => {
      get().copySelection(rect, index);
      return get().editCanvas((canvas) => {
        canvas.erase(rect);
        return ORIGIN;
      });
    },

    pasteAt: (at, index) => {
      const selection = clipboard.read(index);
      if (selection.empty()) return ORIGIN;
      return get().editCanvas((canvas) => canvas.merge(selection, at));
    },

    getClipboardOrder: () => clipboard.getOrder(),

    getClipboardPreview: (index) => clipboard.getPreview(index),

    setPreviewRenderer: (renderer) => clipboard.setRenderer(renderer),
  });
}
