import { describe, it, expect } from 'vitest';
import { andGate } from './and.ts';

describe('AND gate', () => {
  const evaluate = (...inputs: boolean[]) => andGate.evaluate({ inputs });

  it('is high only when every input is high', () => {
    expect(evaluate(true, true)).toBe(true);
    expect(evaluate(true, false)).toBe(false);
    expect(evaluate(false, false)).toBe(false);
  });

  it('passes a single input through', () => {
    expect(evaluate(true)).toBe(true);
    expect(evaluate(false)).toBe(false);
  });

  it('has correct metadata', () => {
    expect(andGate.kind).toBe('and-gate');
    expect(andGate.label).toBe('AND');
  });
});
