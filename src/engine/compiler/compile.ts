import type { CanvasState } from '../../canvas/canvas-state.ts';
import type { CanvasElement } from '../../canvas/element.ts';
import {
  isCommunicatorElement,
  isDeviceKind,
  isGateKind,
  isNodeMemberKind,
  isRelayKind,
} from '../../canvas/element.ts';
import { NEIGHBOR_OFFSETS } from '../../shared/grid/point.ts';
import type { Result } from '../../shared/result/index.ts';
import { ok, err } from '../../shared/result/index.ts';
import { createLogger } from '../../shared/logger/index.ts';
import { UnionFind } from '../graph/union-find.ts';
import type { CompileError, Device, GateDevice, NetNode, Netlist, NodeIndex, RelayDevice } from './netlist.ts';

const log = createLogger('Compiler');

/**
 * Compile a canvas into a netlist.
 *
 * 1. Union 4-adjacent member cells (conductive wire, signal, source,
 *    communicator) into nodes, numbered by first cell in row-major order.
 * 2. Create one device per non-wire element, in row-major order.
 * 3. Resolve gate and relay pins from their four neighbours:
 *    - gate: neighbouring signals are outputs, other members are inputs
 *    - relay: neighbouring conductive wires are switched, other members are controls
 *
 * Fails only with `empty` when there is no device to simulate.
 */
export function compile(canvas: CanvasState): Result<Netlist, CompileError> {
  const { width, height } = canvas;
  const cellCount = width * height;
  const index = (x: number, y: number) => y * width + x;
  const kindAt = (x: number, y: number) => canvas.get(x, y).kind;

  // ─── Nodes ──────────────────────────────────────────────────────────────────
  const sets = new UnionFind(cellCount);
  let hasDevice = false;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const kind = kindAt(x, y);
      if (isDeviceKind(kind)) hasDevice = true;
      if (!isNodeMemberKind(kind)) continue;
      if (isNodeMemberKind(kindAt(x + 1, y))) sets.union(index(x, y), index(x + 1, y));
      if (isNodeMemberKind(kindAt(x, y + 1))) sets.union(index(x, y), index(x, y + 1));
    }
  }

  if (!hasDevice) {
    return err({ kind: 'empty', message: 'Nothing to simulate' });
  }

  const nodeOfCell = new Int32Array(cellCount).fill(-1);
  const nodeOfRoot = new Map<number, NodeIndex>();
  const nodes: NetNode[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (!isNodeMemberKind(kindAt(x, y))) continue;
      const root = sets.find(index(x, y));
      let node = nodeOfRoot.get(root);
      if (node === undefined) {
        node = nodes.length;
        nodeOfRoot.set(root, node);
        nodes.push({ cells: [] });
      }
      nodes[node].cells.push({ x, y });
      nodeOfCell[index(x, y)] = node;
    }
  }

  // ─── Devices ────────────────────────────────────────────────────────────────
  const devices: Device[] = [];
  const deviceOfCell = new Int32Array(cellCount).fill(-1);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const device = createDevice(canvas.get(x, y), x, y, nodeOfCell[index(x, y)]);
      if (!device) continue;
      deviceOfCell[index(x, y)] = devices.length;
      devices.push(device);
    }
  }

  // ─── Pins ───────────────────────────────────────────────────────────────────
  devices.forEach((device, deviceIndex) => {
    if (device.kind !== 'gate' && device.kind !== 'relay') return;
    for (const offset of NEIGHBOR_OFFSETS) {
      const nx = device.cell.x + offset.x;
      const ny = device.cell.y + offset.y;
      const kind = kindAt(nx, ny);
      if (!isNodeMemberKind(kind)) continue;
      const neighbour = index(nx, ny);
      const node = nodeOfCell[neighbour];

      if (device.kind === 'gate') {
        if (kind === 'signal') {
          const signalIndex = deviceOfCell[neighbour];
          const signal = devices[signalIndex];
          device.outputs.push(signalIndex);
          if (signal.kind === 'signal') signal.drivers.push(deviceIndex);
        } else {
          pushDistinct(device.inputs, node);
        }
      } else if (kind === 'conductive-wire') {
        pushDistinct(device.switched, node);
      } else {
        pushDistinct(device.controls, node);
      }
    }
  });

  log.debug('Netlist compiled', { width, height, nodes: nodes.length, devices: devices.length });
  return ok({ width, height, nodes, devices, nodeOfCell, deviceOfCell });
}

function createDevice(element: CanvasElement, x: number, y: number, node: NodeIndex): Device | null {
  const cell = { x, y };
  const kind = element.kind;
  if (kind === 'source') return { kind: 'source', cell, node };
  if (kind === 'signal') return { kind: 'signal', cell, node, drivers: [] };
  if (isGateKind(kind)) {
    const gate: GateDevice = { kind: 'gate', gate: kind, cell, inputs: [], outputs: [] };
    return gate;
  }
  if (isRelayKind(kind)) {
    const relay: RelayDevice = { kind: 'relay', relay: kind, cell, controls: [], switched: [] };
    return relay;
  }
  if (isCommunicatorElement(element)) {
    return {
      kind: 'communicator',
      communicator: element.kind,
      cell,
      node,
      communicatorIndex: element.communicatorIndex,
    };
  }
  return null;
}

function pushDistinct(list: NodeIndex[], node: NodeIndex): void {
  if (!list.includes(node)) list.push(node);
}
