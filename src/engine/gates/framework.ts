/**
 * Gate Framework
 *
 * One definition per gate kind. The compiler and the tick engine look gates
 * up here instead of switching on the kind.
 */

import type { GateKind } from '../../canvas/element.ts';

/** Logic level on a node */
export type Level = boolean;

/** Context passed to a gate's evaluation */
export interface GateEvalContext {
  /** Levels of the gate's input nodes, in pin order. Never empty: a gate without pins reads one low input. */
  inputs: readonly Level[];
}

export type GateEvaluator = (ctx: GateEvalContext) => Level;

export interface GateDefinition {
  kind: GateKind;
  /** Display name */
  label: string;
  /** Pure function of the current inputs */
  evaluate: GateEvaluator;
}

/**
 * Create a gate definition with full type inference.
 */
export function defineGate(definition: GateDefinition): GateDefinition {
  return definition;
}

/** Levels a gate sees for its pins, with an unconnected gate reading a single low input. */
export function gateInputs(levels: readonly Level[]): readonly Level[] {
  return levels.length === 0 ? [false] : levels;
}
