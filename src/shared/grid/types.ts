/** A position in canvas cell coordinates */
export interface Point {
  x: number;
  y: number;
}

/** A rectangle in canvas cell coordinates */
export interface CellRect {
  x: number;
  y: number;
  width: number;
  height: number;
}
