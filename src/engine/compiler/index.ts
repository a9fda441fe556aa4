export { compile } from './compile.ts';
export type {
  NodeIndex,
  DeviceIndex,
  NetNode,
  SourceDevice,
  SignalDevice,
  GateDevice,
  RelayDevice,
  CommunicatorDevice,
  Device,
  Netlist,
  CompileErrorKind,
  CompileError,
} from './netlist.ts';
