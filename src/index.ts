export * from './canvas/index.ts';
export { compile } from './engine/compiler/index.ts';
export type { Netlist, Device, NetNode, CompileError } from './engine/compiler/index.ts';
export { gateRegistry, evaluateGate } from './engine/gates/index.ts';
export { Simulator } from './simulation/simulator.ts';
export type { SimulatorOptions } from './simulation/simulator.ts';
export type { CommunicatorEvent } from './simulation/event-queue.ts';
export * from './communicators/index.ts';
export { HistoryManager } from './history/history-manager.ts';
export type { HistoryMove, HistoryOptions, HistorySnapshot } from './history/history-manager.ts';
export { ClipboardManager } from './clipboard/clipboard-manager.ts';
export type { ClipboardOptions, PreviewRenderer } from './clipboard/clipboard-manager.ts';
export { createStateManager } from './store/index.ts';
export type {
  StateManager,
  StateManagerState,
  StateManagerOptions,
  CellEdit,
} from './store/index.ts';
export type { Point, CellRect } from './shared/grid/index.ts';
export type { Result } from './shared/result/index.ts';
export { ContractViolationError } from './shared/assert/index.ts';
export { createLogger, setLogLevel } from './shared/logger/index.ts';
export type { Logger, LogLevel } from './shared/logger/index.ts';
export { SIMULATION_CONFIG, HISTORY_CONFIG, CLIPBOARD_CONFIG, FILE_FORMAT } from './shared/constants/index.ts';
