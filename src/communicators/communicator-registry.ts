import type { Communicator } from './communicator.ts';

/**
 * Owns every communicator of a session. Elements refer to communicators by
 * the index `register` hands out; indices are never reused.
 */
export class CommunicatorRegistry {
  private readonly communicators: Communicator[] = [];

  register(communicator: Communicator): number {
    this.communicators.push(communicator);
    return this.communicators.length - 1;
  }

  get(index: number): Communicator | undefined {
    return this.communicators[index];
  }

  get size(): number {
    return this.communicators.length;
  }

  resetAll(): void {
    for (const communicator of this.communicators) communicator.reset();
  }
}
