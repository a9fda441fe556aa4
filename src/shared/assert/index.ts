/**
 * Thrown when a caller breaks an operation's precondition (stepping a running
 * simulator, reading a clipboard slot that does not exist). These are
 * programming errors: nothing in the core catches them.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(message);
  }
}
