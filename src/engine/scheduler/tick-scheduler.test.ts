import { describe, it, expect } from 'vitest';
import {
  advanceTick,
  createSchedulerState,
  resetSchedulerState,
  resolveNodeLevels,
  writeBackLevels,
} from './tick-scheduler.ts';
import type { NodeLevels, SchedulerState } from './tick-scheduler.ts';
import { compile } from '../compiler/compile.ts';
import type { Netlist } from '../compiler/netlist.ts';
import { canvasFromText } from '../../canvas/test-canvas.ts';
import type { CanvasState } from '../../canvas/canvas-state.ts';

interface Harness {
  canvas: CanvasState;
  netlist: Netlist;
  state: SchedulerState;
  levels: NodeLevels;
  tick: () => number[];
}

function setup(rows: string[]): Harness {
  const canvas = canvasFromText(rows);
  const result = compile(canvas);
  if (!result.ok) throw new Error(result.error.message);
  const netlist = result.value;
  const state = createSchedulerState(netlist, canvas);
  let levels: NodeLevels = new Uint8Array(netlist.nodes.length);
  resolveNodeLevels(netlist, state, levels);
  const harness: Harness = {
    canvas,
    netlist,
    state,
    levels,
    tick: () => {
      const next = new Uint8Array(netlist.nodes.length);
      advanceTick(netlist, levels, state, next);
      levels = next;
      harness.levels = next;
      return Array.from(next);
    },
  };
  return harness;
}

describe('resolveNodeLevels', () => {
  it('ORs the stored levels of each node drivers', () => {
    const { levels } = setup(['P-.', '.&s', 'S-.']);
    expect(Array.from(levels)).toEqual([1, 0, 1]);
  });

  it('leaves a node without drivers low', () => {
    const { levels } = setup(['-&s']);
    expect(Array.from(levels)).toEqual([0, 0]);
  });
});

describe('advanceTick', () => {
  it('evaluates an AND gate from published levels', () => {
    const low = setup(['P-.', '.&s', 's-.']);
    expect(low.tick()).toEqual([1, 0, 0]);

    const high = setup(['P-.', '.&s', 'S-.']);
    expect(high.tick()).toEqual([1, 1, 1]);
  });

  it('toggles a NAND tied to its own output every tick', () => {
    const osc = setup(['---', '-ns']);
    const trace: number[] = [];
    for (let i = 0; i < 6; i++) trace.push(osc.tick()[0]);
    expect(trace).toEqual([1, 0, 1, 0, 1, 0]);
  });

  it('merges switched nodes while a positive relay conducts', () => {
    const relay = setup(['..P..', 'S-+-s']);
    expect(Array.from(relay.levels)).toEqual([1, 1, 0]);
    expect(relay.tick()).toEqual([1, 1, 1]);
  });

  it('keeps switched nodes apart while a positive relay is open', () => {
    const relay = setup(['..p..', 'S-+-s']);
    expect(relay.tick()).toEqual([0, 1, 0]);
  });

  it('inverts control on a negative relay', () => {
    expect(setup(['..P..', 'S-~-s']).tick()).toEqual([1, 1, 0]);
    expect(setup(['..p..', 'S-~-s']).tick()).toEqual([0, 1, 1]);
  });

  it('leaves signals without driving gates unchanged', () => {
    const h = setup(['S-s']);
    expect(h.tick()).toEqual([1]);
    expect(h.state.deviceLevels).toEqual([true, false]);
  });

  it('is deterministic for the same canvas', () => {
    const rows = ['P-+-s', '..-..', 'S-n-s', '..s..'];
    const a = setup(rows);
    const b = setup(rows);
    for (let i = 0; i < 5; i++) {
      expect(a.tick()).toEqual(b.tick());
    }
  });
});

describe('writeBackLevels', () => {
  it('writes device and node levels onto elements', () => {
    const h = setup(['P-.', '.&s', 'S-.']);
    h.tick();
    const written = writeBackLevels(h.netlist, h.canvas, h.state, h.levels);

    expect(written.get(1, 0)).toEqual({ kind: 'conductive-wire', logicLevel: true, defaultLogicLevel: false });
    expect(written.get(1, 1)).toEqual({ kind: 'and-gate', logicLevel: true, defaultLogicLevel: false });
    expect(written.get(2, 1)).toEqual({ kind: 'signal', logicLevel: true, defaultLogicLevel: false });
    expect(written.get(1, 2)).toEqual({ kind: 'conductive-wire', logicLevel: true, defaultLogicLevel: false });
    expect(h.canvas.get(1, 0)).toEqual({ kind: 'conductive-wire', logicLevel: false, defaultLogicLevel: false });
  });

  it('leaves insulated wires untouched', () => {
    const h = setup(['Pi']);
    const written = writeBackLevels(h.netlist, h.canvas, h.state, h.levels);
    expect(written.get(1, 0)).toBe(h.canvas.get(1, 0));
  });
});

describe('resetSchedulerState', () => {
  it('restores default levels', () => {
    const h = setup(['---', '-ns']);
    h.tick();
    expect(h.state.deviceLevels).toEqual([true, true]);
    resetSchedulerState(h.netlist, h.canvas, h.state);
    expect(h.state.deviceLevels).toEqual([false, false]);
  });
});
