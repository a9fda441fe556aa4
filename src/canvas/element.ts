/**
 * Canvas elements.
 *
 * One element occupies one cell. The kind list is closed and its order is
 * the kind index written by the canvas codec, so never reorder it.
 */

// =============================================================================
// Kinds
// =============================================================================

export const ELEMENT_KINDS = [
  'empty',
  'conductive-wire',
  'insulated-wire',
  'signal',
  'source',
  'positive-relay',
  'negative-relay',
  'and-gate',
  'or-gate',
  'nand-gate',
  'nor-gate',
  'screen-communicator',
  'file-input-communicator',
  'file-output-communicator',
] as const;

export type ElementKind = (typeof ELEMENT_KINDS)[number];

export type WireKind = 'conductive-wire' | 'insulated-wire';
export type RelayKind = 'positive-relay' | 'negative-relay';
export type GateKind = 'and-gate' | 'or-gate' | 'nand-gate' | 'nor-gate';
export type CommunicatorKind =
  | 'screen-communicator'
  | 'file-input-communicator'
  | 'file-output-communicator';

/** Every kind that occupies a cell */
export type CircuitKind = Exclude<ElementKind, 'empty'>;

// =============================================================================
// Element values
// =============================================================================

export interface EmptyElement {
  readonly kind: 'empty';
}

export interface LogicElement {
  readonly kind: Exclude<CircuitKind, CommunicatorKind>;
  readonly logicLevel: boolean;
  readonly defaultLogicLevel: boolean;
}

export interface CommunicatorElement {
  readonly kind: CommunicatorKind;
  readonly logicLevel: boolean;
  readonly defaultLogicLevel: boolean;
  /** Index into the communicator registry; null until bound. Not owned by the element. */
  readonly communicatorIndex: number | null;
}

export type CircuitElement = LogicElement | CommunicatorElement;
export type CanvasElement = EmptyElement | CircuitElement;

export const EMPTY: EmptyElement = Object.freeze({ kind: 'empty' });

// =============================================================================
// Classification
// =============================================================================

const GATE_KINDS: ReadonlySet<ElementKind> = new Set<ElementKind>(['and-gate', 'or-gate', 'nand-gate', 'nor-gate']);
const RELAY_KINDS: ReadonlySet<ElementKind> = new Set<ElementKind>(['positive-relay', 'negative-relay']);
const COMMUNICATOR_KINDS: ReadonlySet<ElementKind> = new Set<ElementKind>([
  'screen-communicator',
  'file-input-communicator',
  'file-output-communicator',
]);

export function isGateKind(kind: ElementKind): kind is GateKind {
  return GATE_KINDS.has(kind);
}

export function isRelayKind(kind: ElementKind): kind is RelayKind {
  return RELAY_KINDS.has(kind);
}

export function isCommunicatorKind(kind: ElementKind): kind is CommunicatorKind {
  return COMMUNICATOR_KINDS.has(kind);
}

export function isWireKind(kind: ElementKind): kind is WireKind {
  return kind === 'conductive-wire' || kind === 'insulated-wire';
}

export function isCircuitElement(element: CanvasElement): element is CircuitElement {
  return element.kind !== 'empty';
}

export function isCommunicatorElement(element: CanvasElement): element is CommunicatorElement {
  return isCommunicatorKind(element.kind);
}

/**
 * Cells that belong to an electrical node: wires that conduct, and the
 * drivers that sit on a net (signals, sources, communicators).
 */
export function isNodeMemberKind(kind: ElementKind): boolean {
  return kind === 'conductive-wire' || kind === 'signal' || kind === 'source' || isCommunicatorKind(kind);
}

/** Wires carry no device; everything else non-empty is simulateable. */
export function isDeviceKind(kind: ElementKind): boolean {
  return kind !== 'empty' && !isWireKind(kind);
}

// =============================================================================
// Kind indices
// =============================================================================

const kindIndex = new Map<ElementKind, number>(ELEMENT_KINDS.map((kind, i) => [kind, i]));

export function elementKindIndex(kind: ElementKind): number {
  return kindIndex.get(kind) ?? 0;
}

export function elementKindFromIndex(index: number): ElementKind | undefined {
  return ELEMENT_KINDS[index];
}

// =============================================================================
// Construction & updates
// =============================================================================

/**
 * Create an element as a drawing tool would place it. The live level starts
 * at the default level; sources default to high.
 */
export function createElement(kind: ElementKind, defaultLogicLevel: boolean = kind === 'source'): CanvasElement {
  if (kind === 'empty') return EMPTY;
  if (isCommunicatorKind(kind)) {
    return { kind, logicLevel: defaultLogicLevel, defaultLogicLevel, communicatorIndex: null };
  }
  return { kind, logicLevel: defaultLogicLevel, defaultLogicLevel };
}

/** Create a communicator element bound to a registry index. */
export function createCommunicatorElement(
  kind: CommunicatorKind,
  communicatorIndex: number | null,
  defaultLogicLevel = false,
): CommunicatorElement {
  return { kind, logicLevel: defaultLogicLevel, defaultLogicLevel, communicatorIndex };
}

export function withLogicLevel(element: CanvasElement, logicLevel: boolean): CanvasElement {
  if (!isCircuitElement(element) || element.logicLevel === logicLevel) return element;
  return { ...element, logicLevel };
}

export function withDefaultLogicLevel(element: CanvasElement, defaultLogicLevel: boolean): CanvasElement {
  if (!isCircuitElement(element) || element.defaultLogicLevel === defaultLogicLevel) return element;
  return { ...element, defaultLogicLevel };
}

/** Put the live level back to the default level. */
export function resetElement(element: CanvasElement): CanvasElement {
  if (!isCircuitElement(element)) return element;
  return withLogicLevel(element, element.defaultLogicLevel);
}

// =============================================================================
// Equality
// =============================================================================

export function elementsEqual(a: CanvasElement, b: CanvasElement): boolean {
  if (a === b) return true;
  if (a.kind !== b.kind) return false;
  if (!isCircuitElement(a) || !isCircuitElement(b)) return true;
  if (a.logicLevel !== b.logicLevel || a.defaultLogicLevel !== b.defaultLogicLevel) return false;
  if (isCommunicatorElement(a) && isCommunicatorElement(b)) {
    return a.communicatorIndex === b.communicatorIndex;
  }
  return true;
}

/** The serialized cell byte: `(kindIndex << 2) | (logicLevel << 1) | defaultLogicLevel`. */
export function encodeElement(element: CanvasElement): number {
  const index = elementKindIndex(element.kind);
  if (!isCircuitElement(element)) return index << 2;
  return (index << 2) | (Number(element.logicLevel) << 1) | Number(element.defaultLogicLevel);
}

/** Inverse of `encodeElement`. Unknown kind indices give undefined; communicators come back unbound. */
export function decodeElement(byte: number): CanvasElement | undefined {
  const kind = elementKindFromIndex(byte >> 2);
  if (kind === undefined) return undefined;
  if (kind === 'empty') return EMPTY;
  const logicLevel = (byte & 0b10) !== 0;
  const defaultLogicLevel = (byte & 0b01) !== 0;
  if (isCommunicatorKind(kind)) {
    return { kind, logicLevel, defaultLogicLevel, communicatorIndex: null };
  }
  return { kind, logicLevel, defaultLogicLevel };
}
