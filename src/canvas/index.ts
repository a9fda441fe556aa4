export { CanvasState } from './canvas-state.ts';
export { encodeCanvas, decodeCanvas } from './canvas-codec.ts';
export type { DecodeError, DecodeErrorKind } from './canvas-codec.ts';
export * from './element.ts';
export { RGBA8888, BGRA8888, createPixelBuffer } from './pixel-format.ts';
export type { PixelFormat, PixelBuffer } from './pixel-format.ts';
export { elementColor } from './palette.ts';
