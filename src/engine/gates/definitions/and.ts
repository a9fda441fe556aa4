import { defineGate } from '../framework.ts';

export const andGate = defineGate({
  kind: 'and-gate',
  label: 'AND',
  evaluate: ({ inputs }) => inputs.every((level) => level),
});
