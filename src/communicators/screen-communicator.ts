import type { Communicator } from './communicator.ts';

/** An on-screen button and lamp: drives high while pressed, shows the last transmitted level. */
export class ScreenCommunicator implements Communicator {
  readonly kind = 'screen-communicator';
  private pressed = false;
  private lastTransmitted = false;

  handleEvent(pressed: boolean): void {
    this.pressed = pressed;
  }

  receive(): boolean {
    return this.pressed;
  }

  transmit(level: boolean): void {
    this.lastTransmitted = level;
  }

  /** Level to draw on the lamp. */
  displayLevel(): boolean {
    return this.lastTransmitted;
  }

  isPressed(): boolean {
    return this.pressed;
  }

  reset(): void {
    this.pressed = false;
    this.lastTransmitted = false;
  }
}
