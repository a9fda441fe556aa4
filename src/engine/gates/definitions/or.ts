import { defineGate } from '../framework.ts';

export const orGate = defineGate({
  kind: 'or-gate',
  label: 'OR',
  evaluate: ({ inputs }) => inputs.some((level) => level),
});
