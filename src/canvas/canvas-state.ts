import type { Point, CellRect } from '../shared/grid/types.ts';
import { clipRect } from '../shared/grid/point.ts';
import { EMPTY, elementsEqual, encodeElement, isCircuitElement, isCommunicatorElement, resetElement } from './element.ts';
import type { CanvasElement, CircuitElement } from './element.ts';
import type { PixelBuffer } from './pixel-format.ts';
import { mapPalette, mappedPixel } from './palette.ts';

/**
 * The circuit grid: a `width x height` rectangle of elements stored row-major.
 *
 * Writes outside the rectangle grow it (`set` reports how far existing content
 * moved). Shrinking back to the minimal bounding box is a separate step,
 * `normalize`, run once after an edit. Reads outside the rectangle are Empty.
 *
 * Elements are immutable, so `clone` copies the cell array and nothing else.
 */
export class CanvasState {
  private cells: CanvasElement[];
  private w: number;
  private h: number;

  constructor() {
    this.cells = [];
    this.w = 0;
    this.h = 0;
  }

  /** Build a canvas from row-major cells. Not normalized. */
  static fromCells(width: number, height: number, cells: readonly CanvasElement[]): CanvasState {
    if (cells.length !== width * height) {
      throw new RangeError(`Expected ${width * height} cells, got ${cells.length}`);
    }
    const state = new CanvasState();
    state.w = width;
    state.h = height;
    state.cells = [...cells];
    return state;
  }

  /** Build a canvas from rows of equal length. Not normalized. */
  static fromRows(rows: readonly (readonly CanvasElement[])[]): CanvasState {
    const height = rows.length;
    const width = height > 0 ? rows[0].length : 0;
    return CanvasState.fromCells(width, height, rows.flat());
  }

  get width(): number {
    return this.w;
  }

  get height(): number {
    return this.h;
  }

  /** True when the canvas has no cells at all (always the case for a normalized canvas without elements). */
  empty(): boolean {
    return this.w === 0 || this.h === 0;
  }

  contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.w && y < this.h;
  }

  get(x: number, y: number): CanvasElement {
    if (!this.contains(x, y)) return EMPTY;
    return this.cells[y * this.w + x];
  }

  at(point: Point): CanvasElement {
    return this.get(point.x, point.y);
  }

  /**
   * Write one cell. Writing a non-Empty element outside the rectangle grows it;
   * when it grows left or up, every existing cell moves by the returned
   * translation. Writing Empty outside the rectangle does nothing.
   */
  set(x: number, y: number, element: CanvasElement): Point {
    if (this.contains(x, y)) {
      this.cells[y * this.w + x] = element;
      return { x: 0, y: 0 };
    }
    if (!isCircuitElement(element)) return { x: 0, y: 0 };

    const left = Math.max(0, -x);
    const top = Math.max(0, -y);
    const width = Math.max(this.w, x + 1) + left;
    const height = Math.max(this.h, y + 1) + top;
    this.resize(width, height, left, top);
    this.cells[(y + top) * width + (x + left)] = element;
    return { x: left, y: top };
  }

  /**
   * Shrink to the minimal rectangle holding every non-Empty cell.
   * Returns the translation applied to the remaining content.
   */
  normalize(): Point {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -1;
    let maxY = -1;
    for (let y = 0; y < this.h; y++) {
      for (let x = 0; x < this.w; x++) {
        if (this.cells[y * this.w + x].kind === 'empty') continue;
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
      }
    }

    if (maxX < 0) {
      this.cells = [];
      this.w = 0;
      this.h = 0;
      return { x: 0, y: 0 };
    }
    if (minX === 0 && minY === 0 && maxX === this.w - 1 && maxY === this.h - 1) {
      return { x: 0, y: 0 };
    }

    const width = maxX - minX + 1;
    const height = maxY - minY + 1;
    const cells: CanvasElement[] = new Array<CanvasElement>(width * height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        cells[y * width + x] = this.cells[(y + minY) * this.w + (x + minX)];
      }
    }
    this.cells = cells;
    this.w = width;
    this.h = height;
    return { x: -minX, y: -minY };
  }

  clone(): CanvasState {
    return CanvasState.fromCells(this.w, this.h, this.cells);
  }

  /** Cell-by-cell equality; different bounding boxes are never equal. */
  equals(other: CanvasState): boolean {
    if (this === other) return true;
    if (this.w !== other.w || this.h !== other.h) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (!elementsEqual(this.cells[i], other.cells[i])) return false;
    }
    return true;
  }

  /** FNV-1a over dimensions and cell contents. Equal canvases hash equally. */
  hash(): number {
    let h = 0x811c9dc5;
    const mix = (value: number) => {
      h ^= value & 0xff;
      h = Math.imul(h, 0x01000193);
    };
    const mix32 = (value: number) => {
      mix(value);
      mix(value >>> 8);
      mix(value >>> 16);
      mix(value >>> 24);
    };
    mix32(this.w);
    mix32(this.h);
    for (const element of this.cells) {
      mix(encodeElement(element));
      if (isCommunicatorElement(element)) mix32(element.communicatorIndex ?? -1);
    }
    return h >>> 0;
  }

  /** Non-Empty cells in row-major order. */
  *entries(): Generator<[Point, CircuitElement]> {
    for (let y = 0; y < this.h; y++) {
      for (let x = 0; x < this.w; x++) {
        const element = this.cells[y * this.w + x];
        if (isCircuitElement(element)) yield [{ x, y }, element];
      }
    }
  }

  /** Copy of every cell with `fn` applied; same dimensions. */
  map(fn: (element: CanvasElement, x: number, y: number) => CanvasElement): CanvasState {
    const cells = this.cells.map((element, i) => fn(element, i % this.w, Math.floor(i / this.w)));
    return CanvasState.fromCells(this.w, this.h, cells);
  }

  /** Copy with every element's live level set back to its default level. */
  resetLevels(): CanvasState {
    return this.map(resetElement);
  }

  /** Normalized copy of the cells inside `rect`. */
  extract(rect: CellRect): CanvasState {
    const clipped = clipRect(rect, this.w, this.h);
    if (!clipped) return new CanvasState();
    const cells: CanvasElement[] = [];
    for (let y = clipped.y; y < clipped.y + clipped.height; y++) {
      for (let x = clipped.x; x < clipped.x + clipped.width; x++) {
        cells.push(this.cells[y * this.w + x]);
      }
    }
    const region = CanvasState.fromCells(clipped.width, clipped.height, cells);
    region.normalize();
    return region;
  }

  /** Set every cell inside `rect` to Empty. Call `normalize` afterwards. */
  erase(rect: CellRect): void {
    const clipped = clipRect(rect, this.w, this.h);
    if (!clipped) return;
    for (let y = clipped.y; y < clipped.y + clipped.height; y++) {
      for (let x = clipped.x; x < clipped.x + clipped.width; x++) {
        this.cells[y * this.w + x] = EMPTY;
      }
    }
  }

  /**
   * Paste the non-Empty cells of `source` with its top-left corner at `at`.
   * Returns the total translation applied to this canvas while growing.
   */
  merge(source: CanvasState, at: Point): Point {
    const moved = { x: 0, y: 0 };
    for (const [p, element] of source.entries()) {
      const shift = this.set(at.x + p.x + moved.x, at.y + p.y + moved.y, element);
      moved.x += shift.x;
      moved.y += shift.y;
    }
    return moved;
  }

  /**
   * Render `region` (canvas coordinates) into `buffer`, one pixel per cell,
   * starting at the buffer's first pixel. `useDefaultView` draws default
   * levels instead of live levels.
   */
  fillPixels(useDefaultView: boolean, buffer: PixelBuffer, region: CellRect): void {
    const palette = mapPalette(buffer.format);
    for (let j = 0; j < region.height; j++) {
      const row = j * buffer.pitch;
      for (let i = 0; i < region.width; i++) {
        buffer.data[row + i] = mappedPixel(palette, this.get(region.x + i, region.y + j), useDefaultView);
      }
    }
  }

  private resize(width: number, height: number, left: number, top: number): void {
    const cells: CanvasElement[] = new Array<CanvasElement>(width * height).fill(EMPTY);
    for (let y = 0; y < this.h; y++) {
      for (let x = 0; x < this.w; x++) {
        cells[(y + top) * width + (x + left)] = this.cells[y * this.w + x];
      }
    }
    this.cells = cells;
    this.w = width;
    this.h = height;
  }
}
