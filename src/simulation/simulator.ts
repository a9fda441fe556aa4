import type { CanvasState } from '../canvas/canvas-state.ts';
import { compile } from '../engine/compiler/compile.ts';
import type { Netlist } from '../engine/compiler/netlist.ts';
import {
  advanceTick,
  createSchedulerState,
  resetSchedulerState,
  resolveNodeLevels,
  writeBackLevels,
} from '../engine/scheduler/tick-scheduler.ts';
import type { SchedulerState } from '../engine/scheduler/tick-scheduler.ts';
import { CommunicatorRegistry } from '../communicators/communicator-registry.ts';
import { SIMULATION_CONFIG } from '../shared/constants/index.ts';
import { assert } from '../shared/assert/index.ts';
import { createLogger } from '../shared/logger/index.ts';
import { EventQueue } from './event-queue.ts';
import { LevelBuffer } from './level-buffer.ts';

const log = createLogger('Simulator');

export interface SimulatorOptions {
  /** Interval between ticks while running, in ms */
  periodMs?: number;
  /** Pending communicator events kept between ticks */
  eventQueueCapacity?: number;
  /** Communicators that bound elements refer to */
  communicators?: CommunicatorRegistry;
}

/** Everything that exists only while running */
interface Session {
  canvas: CanvasState;
  netlist: Netlist;
  state: SchedulerState;
  levels: LevelBuffer;
  timer: ReturnType<typeof setInterval>;
}

/**
 * Runs the compiled circuit on a fixed-period timer.
 *
 * Stopped until `start` compiles a canvas; `stop` writes the live levels
 * back onto that canvas and returns it. Ticks run to completion on the event
 * loop and publish node levels through a double buffer.
 */
export class Simulator {
  readonly communicators: CommunicatorRegistry;
  private readonly queue: EventQueue;
  private periodMs: number;
  private session: Session | null = null;
  private ticks = 0;

  constructor(options: SimulatorOptions = {}) {
    this.periodMs = options.periodMs ?? SIMULATION_CONFIG.DEFAULT_PERIOD_MS;
    assert(this.periodMs > 0, `Invalid tick period ${this.periodMs}`);
    this.queue = new EventQueue(options.eventQueueCapacity);
    this.communicators = options.communicators ?? new CommunicatorRegistry();
  }

  running(): boolean {
    return this.session !== null;
  }

  /**
   * Compile `canvas` and start ticking. Returns false when there is nothing
   * to simulate, leaving the simulator stopped.
   */
  start(canvas: CanvasState): boolean {
    assert(!this.session, 'Simulator is already running');

    const result = compile(canvas);
    if (!result.ok) {
      log.info('Nothing to simulate', { reason: result.error.message });
      return false;
    }

    const netlist = result.value;
    const state = createSchedulerState(netlist, canvas);
    const levels = new LevelBuffer(netlist.nodes.length);
    resolveNodeLevels(netlist, state, levels.back);
    levels.swap();

    this.queue.clear();
    this.ticks = 0;
    this.session = {
      canvas: canvas.clone(),
      netlist,
      state,
      levels,
      timer: this.startTimer(),
    };
    log.info('Simulation started', {
      nodes: netlist.nodes.length,
      devices: netlist.devices.length,
      periodMs: this.periodMs,
    });
    return true;
  }

  /** Stop ticking and return the compiled canvas with live levels written back. */
  stop(): CanvasState {
    const session = this.requireSession('stop');
    clearInterval(session.timer);
    this.session = null;
    log.info('Simulation stopped', { ticks: this.ticks });
    return writeBackLevels(session.netlist, session.canvas, session.state, session.levels.front);
  }

  /** Start, advance one tick and stop. A canvas with nothing to simulate comes back as is. */
  step(canvas: CanvasState): CanvasState {
    assert(!this.session, 'Cannot step a running simulator');
    if (!this.start(canvas)) return canvas;
    this.tick();
    return this.stop();
  }

  /**
   * Put communicators back to their initial state and drop pending events.
   * While running, also put every device back to its default level and
   * republish node levels.
   */
  reset(): void {
    this.queue.clear();
    this.communicators.resetAll();
    const session = this.session;
    if (!session) return;
    resetSchedulerState(session.netlist, session.canvas, session.state);
    resolveNodeLevels(session.netlist, session.state, session.levels.back);
    session.levels.swap();
    this.transmit(session);
    log.debug('Simulation reset');
  }

  /** Queue an event for the communicator at `index`; it applies on the next tick. */
  sendCommunicatorEvent(index: number, pressed: boolean): void {
    if (!this.queue.push({ index, pressed })) {
      log.warn('Communicator event dropped', { capacity: this.queue.capacity });
    }
  }

  setPeriod(periodMs: number): void {
    assert(periodMs > 0, `Invalid tick period ${periodMs}`);
    this.periodMs = periodMs;
    const session = this.session;
    if (session) {
      clearInterval(session.timer);
      session.timer = this.startTimer();
    }
  }

  getPeriod(): number {
    return this.periodMs;
  }

  /**
   * Advance one tick now:
   * 1. apply queued events, then read each bound communicator once
   * 2. evaluate gates and relays from the published levels
   * 3. resolve and publish node levels, then transmit them
   */
  tick(): void {
    const session = this.requireSession('tick');
    const { netlist, state, levels } = session;

    for (const event of this.queue.drain()) {
      const communicator = this.communicators.get(event.index);
      if (communicator) {
        communicator.handleEvent(event.pressed);
      } else {
        log.debug('Event for unknown communicator', { index: event.index });
      }
    }

    const received = new Map<number, boolean>();
    netlist.devices.forEach((device, i) => {
      if (device.kind !== 'communicator') return;
      const index = device.communicatorIndex;
      const communicator = index === null ? undefined : this.communicators.get(index);
      if (index === null || !communicator) {
        state.deviceLevels[i] = false;
        return;
      }
      assert(
        communicator.kind === device.communicator,
        `Communicator ${index} is a ${communicator.kind}, bound to a ${device.communicator}`,
      );
      let level = received.get(index);
      if (level === undefined) {
        level = communicator.receive();
        received.set(index, level);
      }
      state.deviceLevels[i] = level;
    });

    advanceTick(netlist, levels.front, state, levels.back);
    levels.swap();
    this.transmit(session);
    this.ticks++;
  }

  /** The compiled canvas with the current live levels. */
  liveCanvas(): CanvasState {
    const session = this.requireSession('read the live canvas of');
    return writeBackLevels(session.netlist, session.canvas, session.state, session.levels.front);
  }

  /** Published level of a node of the running netlist. */
  nodeLevel(node: number): boolean {
    const session = this.requireSession('read node levels of');
    assert(node >= 0 && node < session.netlist.nodes.length, `Node ${node} out of range`);
    return session.levels.level(node);
  }

  /** The running netlist, null while stopped. */
  netlist(): Netlist | null {
    return this.session?.netlist ?? null;
  }

  /** Ticks since the last start. */
  tickCount(): number {
    return this.ticks;
  }

  private startTimer(): ReturnType<typeof setInterval> {
    return setInterval(() => this.tick(), this.periodMs);
  }

  private transmit(session: Session): void {
    const transmitted = new Set<number>();
    for (const device of session.netlist.devices) {
      if (device.kind !== 'communicator' || device.communicatorIndex === null) continue;
      if (transmitted.has(device.communicatorIndex)) continue;
      transmitted.add(device.communicatorIndex);
      this.communicators.get(device.communicatorIndex)?.transmit(session.levels.level(device.node));
    }
  }

  private requireSession(action: string): Session {
    const session = this.session;
    assert(session !== null, `Cannot ${action} a stopped simulator`);
    return session;
  }
}
