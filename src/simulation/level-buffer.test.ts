import { describe, it, expect } from 'vitest';
import { LevelBuffer } from './level-buffer.ts';

describe('LevelBuffer', () => {
  it('publishes the back buffer on swap', () => {
    const buffer = new LevelBuffer(2);
    buffer.back[1] = 1;
    expect(buffer.level(1)).toBe(false);
    buffer.swap();
    expect(buffer.level(1)).toBe(true);
    expect(Array.from(buffer.back)).toEqual([0, 0]);
  });
});
