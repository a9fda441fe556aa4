import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createStateManager } from '../index.ts';
import { canvasFromText } from '../../canvas/test-canvas.ts';
import { createPixelBuffer } from '../../canvas/pixel-format.ts';
import { ScreenCommunicator } from '../../communicators/screen-communicator.ts';

const OSCILLATOR = ['---', '-ns'];
const SIGNAL_HIGH = 0xff3232e6;
const SIGNAL_LOW = 0xff14145c;

describe('simulation-slice', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('does not start on an empty canvas', () => {
    const store = createStateManager();
    expect(store.getState().startSimulator()).toBe(false);
    expect(store.getState().simulatorRunning).toBe(false);
  });

  it('takes live levels into the canvas on stop', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(['P-.', '.&s', 's-.']) });
    store.getState().startSimulator();
    vi.advanceTimersByTime(50);
    store.getState().stopSimulator();

    const { canvas, simulatorRunning } = store.getState();
    expect(simulatorRunning).toBe(false);
    expect(canvas.get(1, 0)).toEqual({ kind: 'conductive-wire', logicLevel: true, defaultLogicLevel: false });
    expect(canvas.get(2, 1)).toEqual({ kind: 'signal', logicLevel: false, defaultLogicLevel: false });
  });

  it('toggles with startOrStopSimulator', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(OSCILLATOR) });
    store.getState().startOrStopSimulator();
    expect(store.getState().simulatorRunning).toBe(true);
    store.getState().startOrStopSimulator();
    expect(store.getState().simulatorRunning).toBe(false);
  });

  it('steps while stopped and resets to defaults', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(OSCILLATOR) });
    store.getState().stepSimulator();
    expect(store.getState().canvas.get(2, 1)).toEqual({ kind: 'signal', logicLevel: true, defaultLogicLevel: false });

    store.getState().resetSimulator();
    expect(store.getState().canvas.get(2, 1)).toEqual({ kind: 'signal', logicLevel: false, defaultLogicLevel: false });
  });

  it('renders live levels while running and defaults on request', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(OSCILLATOR) });
    const buffer = createPixelBuffer(3, 2);
    const region = { x: 0, y: 0, width: 3, height: 2 };
    store.getState().startSimulator();
    vi.advanceTimersByTime(50);

    store.getState().fillPixels(false, buffer, region);
    expect(buffer.data[5]).toBe(SIGNAL_HIGH);
    store.getState().fillPixels(true, buffer, region);
    expect(buffer.data[5]).toBe(SIGNAL_LOW);
    store.getState().stopSimulator();
  });

  it('pulls live levels into the canvas without stopping', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(OSCILLATOR) });
    store.getState().startSimulator();
    vi.advanceTimersByTime(50);
    store.getState().updateDefaultState();
    expect(store.getState().simulatorRunning).toBe(true);
    expect(store.getState().canvas.get(2, 1)).toEqual({ kind: 'signal', logicLevel: true, defaultLogicLevel: false });
    store.getState().stopSimulator();
  });

  it('applies the tick period', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(OSCILLATOR) });
    store.getState().setSimulationPeriod(200);
    store.getState().startSimulator();
    vi.advanceTimersByTime(100);
    store.getState().updateDefaultState();
    expect(store.getState().canvas.get(2, 1)).toMatchObject({ logicLevel: false });
    vi.advanceTimersByTime(100);
    store.getState().updateDefaultState();
    expect(store.getState().canvas.get(2, 1)).toMatchObject({ logicLevel: true });
    store.getState().stopSimulator();
  });

  it('forwards communicator events to registered communicators', () => {
    const store = createStateManager({ initialCanvas: canvasFromText(['0-&s']) });
    const button = new ScreenCommunicator();
    expect(store.getState().registerCommunicator(button)).toBe(0);

    store.getState().startSimulator();
    store.getState().sendCommunicatorEvent(0, true);
    vi.advanceTimersByTime(50);
    store.getState().updateDefaultState();
    expect(button.isPressed()).toBe(true);
    expect(store.getState().canvas.get(1, 0)).toMatchObject({ logicLevel: true });
    store.getState().stopSimulator();
  });
});
