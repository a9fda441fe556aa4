import type { Communicator } from './communicator.ts';

/**
 * Collects the levels transmitted each tick into bytes, least significant
 * bit first. Only complete bytes are handed out by `drain`.
 */
export class FileOutputCommunicator implements Communicator {
  readonly kind = 'file-output-communicator';
  private bytes: number[] = [];
  private current = 0;
  private bitCount = 0;

  handleEvent(): void {}

  receive(): boolean {
    return false;
  }

  transmit(level: boolean): void {
    if (level) this.current |= 1 << this.bitCount;
    this.bitCount++;
    if (this.bitCount === 8) {
      this.bytes.push(this.current);
      this.current = 0;
      this.bitCount = 0;
    }
  }

  /** Take the complete bytes written so far. A partial byte stays pending. */
  drain(): Uint8Array {
    const out = Uint8Array.from(this.bytes);
    this.bytes = [];
    return out;
  }

  reset(): void {
    this.bytes = [];
    this.current = 0;
    this.bitCount = 0;
  }
}
