import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createStateManager } from '../index.ts';
import { CanvasState } from '../../canvas/canvas-state.ts';
import { EMPTY, createElement } from '../../canvas/element.ts';
import { canvasFromText } from '../../canvas/test-canvas.ts';

const wire = createElement('conductive-wire');

describe('canvas-slice', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts from a normalized copy of the initial canvas', () => {
    const initial = CanvasState.fromRows([[EMPTY, wire]]);
    const store = createStateManager({ initialCanvas: initial });
    expect(store.getState().canvas.width).toBe(1);
    expect(initial.width).toBe(2);
  });

  it('writes cells and reports the translation of existing content', () => {
    const store = createStateManager({ autoHistory: false });
    expect(store.getState().setCells([{ x: 0, y: 0, element: wire }])).toEqual({ x: 0, y: 0 });

    const signal = createElement('signal');
    expect(store.getState().setCells([{ x: -2, y: -1, element: signal }])).toEqual({ x: 2, y: 1 });

    const { canvas, deltaTrans } = store.getState();
    expect(canvas.width).toBe(3);
    expect(canvas.height).toBe(2);
    expect(canvas.get(0, 0)).toBe(signal);
    expect(canvas.get(2, 1)).toBe(wire);
    expect(deltaTrans).toEqual({ x: 2, y: 1 });
  });

  it('shifts later edits of a batch by earlier translations', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(['-']), autoHistory: false });
    const source = createElement('source');
    const moved = store.getState().setCells([
      { x: -1, y: 0, element: source },
      { x: 1, y: 0, element: source },
    ]);
    expect(moved).toEqual({ x: 1, y: 0 });
    const { canvas } = store.getState();
    expect([0, 1, 2].map((x) => canvas.get(x, 0).kind)).toEqual(['source', 'conductive-wire', 'source']);
  });

  it('normalizes after erasing', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(['-s']), autoHistory: false });
    expect(store.getState().setCells([{ x: 0, y: 0, element: EMPTY }])).toEqual({ x: -1, y: 0 });
    expect(store.getState().canvas.width).toBe(1);
    expect(store.getState().getElement({ x: 0, y: 0 }).kind).toBe('signal');
  });

  it('replaces the canvas on every edit', () => {
    const store = createStateManager();
    const before = store.getState().canvas;
    store.getState().setCells([{ x: 0, y: 0, element: wire }]);
    expect(store.getState().canvas).not.toBe(before);
    expect(before.empty()).toBe(true);
    expect(store.getState().revision).toBe(1);
    expect(store.getState().editRevision).toBe(1);
  });

  it('restarts a running simulator around an edit', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(['---', '-ns']) });
    expect(store.getState().startSimulator()).toBe(true);
    store.getState().setCells([{ x: 0, y: 2, element: wire }]);
    expect(store.getState().simulatorRunning).toBe(true);
    expect(store.getState().canvas.height).toBe(3);
    store.getState().stopSimulator();
  });

  it('leaves the simulator stopped when an edit removes every device', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(['-s']) });
    store.getState().startSimulator();
    store.getState().setCells([{ x: 1, y: 0, element: EMPTY }]);
    expect(store.getState().simulatorRunning).toBe(false);
  });

  it('loads a canvas with a fresh history', () => {
    const store = createStateManager();
    store.getState().setCells([{ x: 0, y: 0, element: wire }]);
    expect(store.getState().canUndo()).toBe(true);

    store.getState().loadCanvas(canvasFromText(['P-s']));
    expect(store.getState().canvas.width).toBe(3);
    expect(store.getState().canUndo()).toBe(false);
    expect(store.getState().changedSinceLastSave()).toBe(false);
    expect(store.getState().deltaTrans).toEqual({ x: 0, y: 0 });
  });
});
