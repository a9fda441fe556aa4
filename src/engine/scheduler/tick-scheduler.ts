import type { CanvasState } from '../../canvas/canvas-state.ts';
import { withLogicLevel } from '../../canvas/element.ts';
import type { CircuitElement } from '../../canvas/element.ts';
import type { Netlist } from '../compiler/netlist.ts';
import { evaluateGate } from '../gates/registry.ts';
import type { Level } from '../gates/framework.ts';
import { UnionFind } from '../graph/union-find.ts';

/** Node levels as published to readers: one byte per node, 0 or 1. */
export type NodeLevels = Uint8Array;

/** All runtime state needed by the scheduler. */
export interface SchedulerState {
  /**
   * One level per device:
   * - source, signal: stored level
   * - gate: output
   * - relay: conducting
   * - communicator: level received from outside this tick
   */
  deviceLevels: Level[];
  /** Nodes joined by conducting relays; rebuilt every resolve */
  groups: UnionFind;
  /** Scratch: own drive per node, then group drive per root */
  drive: Uint8Array;
}

/**
 * Create runtime state from the levels stored on the compiled canvas.
 * Communicators have received nothing yet and read low.
 */
export function createSchedulerState(netlist: Netlist, canvas: CanvasState): SchedulerState {
  const state: SchedulerState = {
    deviceLevels: new Array<Level>(netlist.devices.length).fill(false),
    groups: new UnionFind(netlist.nodes.length),
    drive: new Uint8Array(netlist.nodes.length),
  };
  loadDeviceLevels(netlist, canvas, state, (element) => element.logicLevel);
  return state;
}

/** Put every device back to its element's default level. */
export function resetSchedulerState(netlist: Netlist, canvas: CanvasState, state: SchedulerState): void {
  loadDeviceLevels(netlist, canvas, state, (element) => element.defaultLogicLevel);
}

function loadDeviceLevels(
  netlist: Netlist,
  canvas: CanvasState,
  state: SchedulerState,
  pick: (element: CircuitElement) => Level,
): void {
  netlist.devices.forEach((device, i) => {
    if (device.kind === 'communicator') {
      state.deviceLevels[i] = false;
      return;
    }
    const element = canvas.at(device.cell);
    state.deviceLevels[i] = element.kind === 'empty' ? false : pick(element);
  });
}

/**
 * Resolve node levels from device levels into `out`.
 *
 * A node's own drive is the OR of the sources, signals and communicators on
 * it. Nodes switched by a conducting relay form one group, and every node in
 * a group takes the OR of the group's drives.
 */
export function resolveNodeLevels(netlist: Netlist, state: SchedulerState, out: NodeLevels): void {
  const { deviceLevels, groups, drive } = state;
  drive.fill(0);
  groups.reset();

  netlist.devices.forEach((device, i) => {
    switch (device.kind) {
      case 'source':
      case 'signal':
      case 'communicator':
        if (deviceLevels[i]) drive[device.node] = 1;
        break;
      case 'relay':
        if (deviceLevels[i]) {
          for (let p = 1; p < device.switched.length; p++) {
            groups.union(device.switched[0], device.switched[p]);
          }
        }
        break;
      case 'gate':
        break;
    }
  });

  for (let node = 0; node < drive.length; node++) {
    if (drive[node]) drive[groups.find(node)] = 1;
  }
  for (let node = 0; node < out.length; node++) {
    out[node] = drive[groups.find(node)];
  }
}

/**
 * Advance one tick. Reads only `published`; writes device levels into
 * `state` and the resolved node levels into `out`.
 *
 * 1. Gates evaluate over their input nodes
 * 2. Relays conduct from their control nodes (positive: any high; negative: none high)
 * 3. Signals driven by gates take the OR of those gates' outputs
 * 4. Node levels resolve through the new relay states
 *
 * Communicator levels must already be in `state` for this tick.
 */
export function advanceTick(
  netlist: Netlist,
  published: NodeLevels,
  state: SchedulerState,
  out: NodeLevels,
): void {
  const { devices } = netlist;
  const { deviceLevels } = state;
  const level = (node: number): Level => published[node] === 1;

  devices.forEach((device, i) => {
    if (device.kind === 'gate') {
      deviceLevels[i] = evaluateGate(device.gate, device.inputs.map(level));
    } else if (device.kind === 'relay') {
      const control = device.controls.some(level);
      deviceLevels[i] = device.relay === 'positive-relay' ? control : !control;
    }
  });

  devices.forEach((device, i) => {
    if (device.kind === 'signal' && device.drivers.length > 0) {
      deviceLevels[i] = device.drivers.some((driver) => deviceLevels[driver]);
    }
  });

  resolveNodeLevels(netlist, state, out);
}

/**
 * Copy of `canvas` with live levels written onto its elements:
 * - wires and communicators take their node's level
 * - sources, signals, gates and relays take their device level
 * - insulated wires keep what they had
 */
export function writeBackLevels(
  netlist: Netlist,
  canvas: CanvasState,
  state: SchedulerState,
  nodeLevels: NodeLevels,
): CanvasState {
  return canvas.map((element, x, y) => {
    const cell = y * netlist.width + x;
    const deviceIndex = netlist.deviceOfCell[cell];
    const node = netlist.nodeOfCell[cell];
    if (deviceIndex >= 0 && netlist.devices[deviceIndex].kind !== 'communicator') {
      return withLogicLevel(element, state.deviceLevels[deviceIndex]);
    }
    if (node >= 0) return withLogicLevel(element, nodeLevels[node] === 1);
    return element;
  });
}
