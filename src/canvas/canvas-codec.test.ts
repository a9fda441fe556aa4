import { describe, it, expect } from 'vitest';
import { encodeCanvas, decodeCanvas } from './canvas-codec.ts';
import { CanvasState } from './canvas-state.ts';
import { EMPTY, createCommunicatorElement, createElement, withLogicLevel } from './element.ts';

const W = createElement('conductive-wire');
const S = createElement('source');

describe('encodeCanvas', () => {
  it('writes magic, version, dimensions and cell bytes', () => {
    const bytes = encodeCanvas(CanvasState.fromRows([[S, W]]));
    expect(Array.from(bytes)).toEqual([
      0x43, 0x43, 0x53, 0x42,
      0, 0, 0, 0,
      2, 0, 0, 0,
      1, 0, 0, 0,
      (4 << 2) | 0b11,
      1 << 2,
    ]);
  });

  it('encodes an empty canvas as a bare header', () => {
    expect(encodeCanvas(new CanvasState())).toHaveLength(16);
  });
});

describe('decodeCanvas', () => {
  it('reproduces an equal canvas', () => {
    const state = CanvasState.fromRows([
      [S, W, withLogicLevel(createElement('signal'), true)],
      [createElement('nand-gate', true), EMPTY, createElement('insulated-wire')],
      [createElement('positive-relay'), createElement('negative-relay'), createElement('file-input-communicator')],
    ]);
    const result = decodeCanvas(encodeCanvas(state));
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.equals(state)).toBe(true);
  });

  it('drops communicator bindings', () => {
    const result = decodeCanvas(encodeCanvas(CanvasState.fromRows([[createCommunicatorElement('screen-communicator', 3)]])));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.get(0, 0)).toEqual(createCommunicatorElement('screen-communicator', null));
    }
  });

  it('normalizes the decoded canvas', () => {
    const bytes = Uint8Array.from([0x43, 0x43, 0x53, 0x42, 0, 0, 0, 0, 3, 0, 0, 0, 1, 0, 0, 0, 0, 1 << 2, 0]);
    const result = decodeCanvas(bytes);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.width).toBe(1);
      expect(result.value.get(0, 0)).toEqual(W);
    }
  });

  it('rejects a short header', () => {
    const result = decodeCanvas(Uint8Array.from([0x43, 0x43]));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('truncated');
  });

  it('rejects the wrong magic', () => {
    const bytes = encodeCanvas(CanvasState.fromRows([[W]]));
    bytes[0] = 0x58;
    const result = decodeCanvas(bytes);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('bad-magic');
  });

  it('rejects other versions', () => {
    const bytes = encodeCanvas(CanvasState.fromRows([[W]]));
    bytes[4] = 1;
    const result = decodeCanvas(bytes);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('unsupported-version');
  });

  it('rejects missing cell bytes', () => {
    const bytes = encodeCanvas(CanvasState.fromRows([[W, W]]));
    const result = decodeCanvas(bytes.subarray(0, bytes.length - 1));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('truncated');
  });

  it('rejects unknown element kinds', () => {
    const bytes = encodeCanvas(CanvasState.fromRows([[W]]));
    bytes[16] = 14 << 2;
    const result = decodeCanvas(bytes);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('unknown-element');
  });
});
