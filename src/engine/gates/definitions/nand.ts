import { defineGate } from '../framework.ts';

export const nandGate = defineGate({
  kind: 'nand-gate',
  label: 'NAND',
  evaluate: ({ inputs }) => !inputs.every((level) => level),
});
