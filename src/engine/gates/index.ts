export { defineGate, gateInputs } from './framework.ts';
export type { GateDefinition, GateEvalContext, GateEvaluator, Level } from './framework.ts';
export { gateRegistry, getGateDefinition, evaluateGate } from './registry.ts';
