import type { RgbColor } from '../shared/constants/index.ts';

/** Packs colours into 32-bit pixels. Supplied by the renderer that owns the buffer. */
export interface PixelFormat {
  name: string;
  map: (color: RgbColor) => number;
}

/** Caller-owned destination for `CanvasState.fillPixels`. */
export interface PixelBuffer {
  data: Uint32Array;
  /** Pixels per row; at least the width of any region drawn into it */
  pitch: number;
  format: PixelFormat;
}

/** `R | G << 8 | B << 16`, alpha byte opaque */
export const RGBA8888: PixelFormat = {
  name: 'RGBA8888',
  map: ({ r, g, b }) => (r | (g << 8) | (b << 16) | (0xff << 24)) >>> 0,
};

/** `B | G << 8 | R << 16`, alpha byte opaque */
export const BGRA8888: PixelFormat = {
  name: 'BGRA8888',
  map: ({ r, g, b }) => (b | (g << 8) | (r << 16) | (0xff << 24)) >>> 0,
};

/** Allocate a buffer exactly `width` pixels wide. */
export function createPixelBuffer(width: number, height: number, format: PixelFormat = RGBA8888): PixelBuffer {
  return { data: new Uint32Array(width * height), pitch: width, format };
}
