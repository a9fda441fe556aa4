import { describe, it, expect } from 'vitest';
import { EventQueue } from './event-queue.ts';
import { ContractViolationError } from '../shared/assert/index.ts';

describe('EventQueue', () => {
  it('drains events oldest first', () => {
    const queue = new EventQueue(4);
    queue.push({ index: 0, pressed: true });
    queue.push({ index: 1, pressed: false });
    expect(queue.count).toBe(2);
    expect(queue.drain()).toEqual([
      { index: 0, pressed: true },
      { index: 1, pressed: false },
    ]);
    expect(queue.count).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it('drops the oldest event when full', () => {
    const queue = new EventQueue(2);
    expect(queue.push({ index: 0, pressed: true })).toBe(true);
    expect(queue.push({ index: 1, pressed: true })).toBe(true);
    expect(queue.push({ index: 2, pressed: true })).toBe(false);
    expect(queue.drain().map((e) => e.index)).toEqual([1, 2]);
  });

  it('keeps order across wrap-around', () => {
    const queue = new EventQueue(3);
    queue.push({ index: 0, pressed: true });
    queue.push({ index: 1, pressed: true });
    queue.drain();
    queue.push({ index: 2, pressed: true });
    queue.push({ index: 3, pressed: true });
    queue.push({ index: 4, pressed: true });
    expect(queue.drain().map((e) => e.index)).toEqual([2, 3, 4]);
  });

  it('rejects a zero capacity', () => {
    expect(() => new EventQueue(0)).toThrow(ContractViolationError);
  });
});
