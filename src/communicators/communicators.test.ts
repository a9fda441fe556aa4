import { describe, it, expect, vi } from 'vitest';
import { ScreenCommunicator } from './screen-communicator.ts';
import { FileInputCommunicator } from './file-input-communicator.ts';
import { FileOutputCommunicator } from './file-output-communicator.ts';
import { CommunicatorRegistry } from './communicator-registry.ts';
import type { Communicator } from './communicator.ts';

describe('ScreenCommunicator', () => {
  it('drives high while pressed', () => {
    const screen = new ScreenCommunicator();
    expect(screen.receive()).toBe(false);
    screen.handleEvent(true);
    expect(screen.receive()).toBe(true);
    expect(screen.receive()).toBe(true);
    screen.handleEvent(false);
    expect(screen.receive()).toBe(false);
  });

  it('shows the last transmitted level', () => {
    const screen = new ScreenCommunicator();
    screen.transmit(true);
    expect(screen.displayLevel()).toBe(true);
    screen.reset();
    expect(screen.displayLevel()).toBe(false);
  });
});

describe('FileInputCommunicator', () => {
  it('streams bits least significant first, then reads low', () => {
    const input = new FileInputCommunicator(Uint8Array.of(0b0000_0101));
    const bits: boolean[] = [];
    for (let i = 0; i < 10; i++) bits.push(input.receive());
    expect(bits).toEqual([true, false, true, false, false, false, false, false, false, false]);
    expect(input.finished()).toBe(true);
  });

  it('rewinds on reset', () => {
    const input = new FileInputCommunicator(Uint8Array.of(1));
    expect(input.receive()).toBe(true);
    input.reset();
    expect(input.finished()).toBe(false);
    expect(input.receive()).toBe(true);
  });
});

describe('FileOutputCommunicator', () => {
  it('packs transmitted bits into bytes', () => {
    const output = new FileOutputCommunicator();
    for (const level of [true, false, true, true, false, false, false, false]) output.transmit(level);
    expect(Array.from(output.drain())).toEqual([0b0000_1101]);
    expect(Array.from(output.drain())).toEqual([]);
  });

  it('holds back a partial byte', () => {
    const output = new FileOutputCommunicator();
    output.transmit(true);
    output.transmit(true);
    expect(output.drain()).toHaveLength(0);
    for (let i = 0; i < 6; i++) output.transmit(false);
    expect(Array.from(output.drain())).toEqual([3]);
  });
});

describe('CommunicatorRegistry', () => {
  it('hands out sequential indices', () => {
    const registry = new CommunicatorRegistry();
    const screen = new ScreenCommunicator();
    expect(registry.register(screen)).toBe(0);
    expect(registry.register(new FileOutputCommunicator())).toBe(1);
    expect(registry.get(0)).toBe(screen);
    expect(registry.get(2)).toBeUndefined();
    expect(registry.size).toBe(2);
  });

  it('resets every communicator', () => {
    const registry = new CommunicatorRegistry();
    const reset = vi.fn();
    const fake: Communicator = {
      kind: 'screen-communicator',
      handleEvent: vi.fn(),
      receive: () => false,
      transmit: vi.fn(),
      reset,
    };
    registry.register(fake);
    registry.register(fake);
    registry.resetAll();
    expect(reset).toHaveBeenCalledTimes(2);
  });
});
