import type { CommunicatorKind } from '../canvas/element.ts';

/**
 * A bridge between one external resource and the simulation.
 *
 * Each tick the simulator applies queued events, calls `receive` once per
 * communicator to get the level it drives onto its node, and after the tick
 * calls `transmit` with that node's resolved level.
 */
export interface Communicator {
  readonly kind: CommunicatorKind;
  /** Apply a pressed/released event taken from the simulator's queue. */
  handleEvent(pressed: boolean): void;
  /** Level to drive this tick. Called once per tick. */
  receive(): boolean;
  /** Level of the communicator's node after the tick. */
  transmit(level: boolean): void;
  /** Back to the state it had when created. */
  reset(): void;
}
