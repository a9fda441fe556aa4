import { FILE_FORMAT } from '../shared/constants/index.ts';
import type { Result } from '../shared/result/index.ts';
import { ok, err } from '../shared/result/index.ts';
import { createLogger } from '../shared/logger/index.ts';
import { CanvasState } from './canvas-state.ts';
import { decodeElement, encodeElement } from './element.ts';
import type { CanvasElement } from './element.ts';

const log = createLogger('CanvasCodec');

export type DecodeErrorKind =
  | 'truncated'
  | 'bad-magic'
  | 'unsupported-version'
  | 'bad-dimensions'
  | 'unknown-element';

export interface DecodeError {
  kind: DecodeErrorKind;
  message: string;
}

const MAGIC_BYTES = Uint8Array.from(FILE_FORMAT.MAGIC, (c) => c.charCodeAt(0));

/**
 * Serialize a canvas:
 *
 * | offset | size | field                          |
 * |--------|------|--------------------------------|
 * | 0      | 4    | magic                          |
 * | 4      | 4    | version, int32 LE              |
 * | 8      | 4    | width, int32 LE                |
 * | 12     | 4    | height, int32 LE               |
 * | 16     | w*h  | one byte per cell, row-major   |
 *
 * Each cell byte is `(kindIndex << 2) | (logicLevel << 1) | defaultLogicLevel`.
 * Communicator bindings are runtime-only and not written.
 */
export function encodeCanvas(state: CanvasState): Uint8Array {
  const { width, height } = state;
  const bytes = new Uint8Array(FILE_FORMAT.HEADER_BYTES + width * height);
  const view = new DataView(bytes.buffer);

  bytes.set(MAGIC_BYTES, 0);
  view.setInt32(4, FILE_FORMAT.VERSION, true);
  view.setInt32(8, width, true);
  view.setInt32(12, height, true);

  let offset = FILE_FORMAT.HEADER_BYTES;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      bytes[offset++] = encodeElement(state.get(x, y));
    }
  }
  return bytes;
}

/** Parse bytes written by `encodeCanvas`. Decoded communicators are unbound. */
export function decodeCanvas(bytes: Uint8Array): Result<CanvasState, DecodeError> {
  const fail = (kind: DecodeErrorKind, message: string) => {
    log.warn('Canvas decode failed', { kind, message });
    return err({ kind, message });
  };

  if (bytes.length < FILE_FORMAT.HEADER_BYTES) {
    return fail('truncated', `Header needs ${FILE_FORMAT.HEADER_BYTES} bytes, got ${bytes.length}`);
  }
  for (let i = 0; i < MAGIC_BYTES.length; i++) {
    if (bytes[i] !== MAGIC_BYTES[i]) {
      return fail('bad-magic', 'Not a canvas file');
    }
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const version = view.getInt32(4, true);
  if (version !== FILE_FORMAT.VERSION) {
    return fail('unsupported-version', `Unsupported version ${version}`);
  }

  const width = view.getInt32(8, true);
  const height = view.getInt32(12, true);
  if (width < 0 || height < 0) {
    return fail('bad-dimensions', `Invalid dimensions ${width}x${height}`);
  }

  const expected = FILE_FORMAT.HEADER_BYTES + width * height;
  if (bytes.length < expected) {
    return fail('truncated', `Expected ${expected} bytes, got ${bytes.length}`);
  }

  const cells: CanvasElement[] = [];
  for (let i = 0; i < width * height; i++) {
    const byte = bytes[FILE_FORMAT.HEADER_BYTES + i];
    const element = decodeElement(byte);
    if (!element) {
      return fail('unknown-element', `Unknown element kind ${byte >> 2} at cell ${i}`);
    }
    cells.push(element);
  }

  const state = CanvasState.fromCells(width, height, cells);
  state.normalize();
  return ok(state);
}
