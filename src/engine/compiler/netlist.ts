import type { Point } from '../../shared/grid/types.ts';
import type { CommunicatorKind, GateKind, RelayKind } from '../../canvas/element.ts';

/** Index of an electrical node in `Netlist.nodes` */
export type NodeIndex = number;
/** Index of a device in `Netlist.devices` */
export type DeviceIndex = number;

/** An electrical net: member cells joined by 4-adjacency */
export interface NetNode {
  /** Member cells in row-major order */
  cells: Point[];
}

/** Drives its node with its stored level */
export interface SourceDevice {
  kind: 'source';
  cell: Point;
  node: NodeIndex;
}

/** Drives its node with a stored level that adjacent gates overwrite each tick */
export interface SignalDevice {
  kind: 'signal';
  cell: Point;
  node: NodeIndex;
  /** Gates that write this signal */
  drivers: DeviceIndex[];
}

export interface GateDevice {
  kind: 'gate';
  gate: GateKind;
  cell: Point;
  /** Distinct input nodes, in pin order */
  inputs: NodeIndex[];
  /** Signal devices written with the gate's output */
  outputs: DeviceIndex[];
}

export interface RelayDevice {
  kind: 'relay';
  relay: RelayKind;
  cell: Point;
  /** Distinct control nodes; control reads high when any is high */
  controls: NodeIndex[];
  /** Distinct nodes merged while the relay conducts */
  switched: NodeIndex[];
}

export interface CommunicatorDevice {
  kind: 'communicator';
  communicator: CommunicatorKind;
  cell: Point;
  node: NodeIndex;
  communicatorIndex: number | null;
}

export type Device = SourceDevice | SignalDevice | GateDevice | RelayDevice | CommunicatorDevice;

export interface Netlist {
  width: number;
  height: number;
  nodes: NetNode[];
  /** Devices in row-major order of their cells */
  devices: Device[];
  /** Node of each cell (row-major), -1 for cells outside every node */
  nodeOfCell: Int32Array;
  /** Device of each cell (row-major), -1 for cells without one */
  deviceOfCell: Int32Array;
}

export type CompileErrorKind = 'empty';

export interface CompileError {
  kind: CompileErrorKind;
  message: string;
}
