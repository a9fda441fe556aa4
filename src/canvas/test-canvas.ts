import { CanvasState } from './canvas-state.ts';
import { createCommunicatorElement, createElement } from './element.ts';
import type { CanvasElement } from './element.ts';

/**
 * Build a canvas from one string per row, for tests.
 *
 * | char | element                       |
 * |------|-------------------------------|
 * | .    | empty                         |
 * | -    | conductive wire (low)         |
 * | =    | conductive wire (high)        |
 * | i    | insulated wire                |
 * | s S  | signal low / high             |
 * | p P  | source low / high             |
 * | +    | positive relay                |
 * | ~    | negative relay                |
 * | &    | AND gate                      |
 * | \|   | OR gate                       |
 * | n    | NAND gate                     |
 * | o    | NOR gate                      |
 * | 0-9  | screen communicator, bound    |
 * | f F  | file input / output, unbound  |
 */
export function canvasFromText(rows: readonly string[]): CanvasState {
  return CanvasState.fromRows(rows.map((row) => Array.from(row, elementFromChar)));
}

function elementFromChar(char: string): CanvasElement {
  if (char >= '0' && char <= '9') {
    return createCommunicatorElement('screen-communicator', Number(char));
  }
  switch (char) {
    case '.':
      return createElement('empty');
    case '-':
      return createElement('conductive-wire');
    case '=':
      return createElement('conductive-wire', true);
    case 'i':
      return createElement('insulated-wire');
    case 's':
      return createElement('signal', false);
    case 'S':
      return createElement('signal', true);
    case 'p':
      return createElement('source', false);
    case 'P':
      return createElement('source', true);
    case '+':
      return createElement('positive-relay');
    case '~':
      return createElement('negative-relay');
    case '&':
      return createElement('and-gate');
    case '|':
      return createElement('or-gate');
    case 'n':
      return createElement('nand-gate');
    case 'o':
      return createElement('nor-gate');
    case 'f':
      return createElement('file-input-communicator');
    case 'F':
      return createElement('file-output-communicator');
    default:
      throw new Error(`Unknown canvas char '${char}'`);
  }
}
