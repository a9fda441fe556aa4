import { defineGate } from '../framework.ts';

export const norGate = defineGate({
  kind: 'nor-gate',
  label: 'NOR',
  evaluate: ({ inputs }) => !inputs.some((level) => level),
});
