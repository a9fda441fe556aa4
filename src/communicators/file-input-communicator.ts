import type { Communicator } from './communicator.ts';

/**
 * Streams the bits of a byte buffer onto the circuit, least significant bit
 * of each byte first, one bit per tick. Reads low once the data runs out.
 */
export class FileInputCommunicator implements Communicator {
  readonly kind = 'file-input-communicator';
  private readonly data: Uint8Array;
  private position = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /** Events do not affect a file stream. */
  handleEvent(): void {}

  receive(): boolean {
    if (this.finished()) return false;
    const bit = (this.data[this.position >> 3] >> (this.position & 7)) & 1;
    this.position++;
    return bit === 1;
  }

  transmit(): void {}

  /** True once every bit has been delivered. */
  finished(): boolean {
    return this.position >= this.data.length * 8;
  }

  reset(): void {
    this.position = 0;
  }
}
