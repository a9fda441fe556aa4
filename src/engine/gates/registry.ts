/**
 * Gate Registry
 *
 * Central registry of all gate definitions.
 */

import type { GateKind } from '../../canvas/element.ts';
import type { GateDefinition, Level } from './framework.ts';
import { gateInputs } from './framework.ts';
import { andGate, orGate, nandGate, norGate } from './definitions/index.ts';

/**
 * Every gate kind maps to exactly one definition; adding a kind to
 * `GateKind` without a definition fails to compile here.
 */
const GATE_DEFINITIONS: Record<GateKind, GateDefinition> = {
  'and-gate': andGate,
  'or-gate': orGate,
  'nand-gate': nandGate,
  'nor-gate': norGate,
};

export const gateRegistry = {
  byKind: GATE_DEFINITIONS,
  all: Object.values(GATE_DEFINITIONS),
} as const;

export function getGateDefinition(kind: GateKind): GateDefinition {
  return GATE_DEFINITIONS[kind];
}

/** Evaluate a gate over its input levels (empty means unconnected, read as low). */
export function evaluateGate(kind: GateKind, inputs: readonly Level[]): Level {
  return GATE_DEFINITIONS[kind].evaluate({ inputs: gateInputs(inputs) });
}
