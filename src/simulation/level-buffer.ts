import type { NodeLevels } from '../engine/scheduler/tick-scheduler.ts';

/**
 * Double-buffered node levels. Readers only ever see `front`, which always
 * holds one complete tick; the tick writes `back` and `swap` publishes it.
 */
export class LevelBuffer {
  private readonly buffers: [NodeLevels, NodeLevels];
  private frontIndex = 0;

  constructor(nodeCount: number) {
    this.buffers = [new Uint8Array(nodeCount), new Uint8Array(nodeCount)];
  }

  get front(): NodeLevels {
    return this.buffers[this.frontIndex];
  }

  get back(): NodeLevels {
    return this.buffers[1 - this.frontIndex];
  }

  swap(): void {
    this.frontIndex = 1 - this.frontIndex;
  }

  level(node: number): boolean {
    return this.front[node] === 1;
  }
}
