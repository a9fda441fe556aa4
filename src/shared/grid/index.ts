export type { Point, CellRect } from './types.ts';
export {
  ORIGIN,
  addPoints,
  negatePoint,
  isOrigin,
  translateRect,
  clipRect,
  NEIGHBOR_OFFSETS,
} from './point.ts';
