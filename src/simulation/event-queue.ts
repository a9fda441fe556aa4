import { SIMULATION_CONFIG } from '../shared/constants/index.ts';
import { assert } from '../shared/assert/index.ts';

/** A pressed/released event addressed to a communicator */
export interface CommunicatorEvent {
  index: number;
  pressed: boolean;
}

/**
 * Fixed-capacity FIFO of communicator events, drained once per tick.
 * Pushing onto a full queue overwrites the oldest event.
 */
export class EventQueue {
  readonly capacity: number;
  private readonly data: CommunicatorEvent[];
  private head = 0;
  private size = 0;

  constructor(capacity: number = SIMULATION_CONFIG.EVENT_QUEUE_CAPACITY) {
    assert(Number.isInteger(capacity) && capacity > 0, `Invalid event queue capacity ${capacity}`);
    this.capacity = capacity;
    this.data = new Array<CommunicatorEvent>(capacity);
  }

  /** Append an event. Returns false when the oldest event was dropped to make room. */
  push(event: CommunicatorEvent): boolean {
    this.data[this.head] = event;
    this.head = (this.head + 1) % this.capacity;
    if (this.size < this.capacity) {
      this.size++;
      return true;
    }
    return false;
  }

  /** Remove and return every pending event, oldest first. */
  drain(): CommunicatorEvent[] {
    const events: CommunicatorEvent[] = [];
    for (let i = 0; i < this.size; i++) {
      events.push(this.data[(this.head - this.size + i + this.capacity) % this.capacity]);
    }
    this.size = 0;
    return events;
  }

  get count(): number {
    return this.size;
  }

  clear(): void {
    this.head = 0;
    this.size = 0;
  }
}
