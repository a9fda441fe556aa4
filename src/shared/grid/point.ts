import type { Point, CellRect } from './types.ts';

export const ORIGIN: Readonly<Point> = Object.freeze({ x: 0, y: 0 });

export function addPoints(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

/** Negation that never yields -0. */
export function negatePoint(p: Point): Point {
  return { x: 0 - p.x, y: 0 - p.y };
}

export function isOrigin(p: Point): boolean {
  return p.x === 0 && p.y === 0;
}

/** Shift a rectangle by a translation. */
export function translateRect(rect: CellRect, by: Point): CellRect {
  return { x: rect.x + by.x, y: rect.y + by.y, width: rect.width, height: rect.height };
}

/** Clip `rect` to `[0,width) x [0,height)`. Returns null when nothing remains. */
export function clipRect(rect: CellRect, width: number, height: number): CellRect | null {
  const x0 = Math.max(rect.x, 0);
  const y0 = Math.max(rect.y, 0);
  const x1 = Math.min(rect.x + rect.width, width);
  const y1 = Math.min(rect.y + rect.height, height);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

/** 4-neighbourhood offsets in fixed order: north, east, south, west. */
export const NEIGHBOR_OFFSETS: readonly Readonly<Point>[] = [
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
];
