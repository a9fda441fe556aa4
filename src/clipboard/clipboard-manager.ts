import { CanvasState } from '../canvas/canvas-state.ts';
import { CLIPBOARD_CONFIG } from '../shared/constants/index.ts';
import { assert } from '../shared/assert/index.ts';

/** Draws the preview shown for a clipboard slot. Supplied by the presentation layer. */
export interface PreviewRenderer<P> {
  render(canvas: CanvasState): P;
}

export interface ClipboardOptions<P> {
  /** Total number of slots, slot 0 being the default clipboard */
  slots?: number;
  renderer?: PreviewRenderer<P>;
}

interface Slot<P> {
  canvas: CanvasState;
  preview: P | null;
}

/**
 * Numbered clipboard slots. Slot 0 holds the most recently used contents:
 * writing or reading a non-empty canvas through any other slot also puts it
 * in slot 0.
 */
export class ClipboardManager<P = unknown> {
  private readonly slots: Slot<P>[];
  private renderer: PreviewRenderer<P> | null;

  constructor(options: ClipboardOptions<P> = {}) {
    const count = options.slots ?? CLIPBOARD_CONFIG.NUM_CLIPBOARDS + 1;
    assert(Number.isInteger(count) && count >= 1, `Invalid clipboard slot count ${count}`);
    this.slots = Array.from({ length: count }, () => ({ canvas: new CanvasState(), preview: null }));
    this.renderer = options.renderer ?? null;
  }

  get slotCount(): number {
    return this.slots.length;
  }

  /** Copy of slot `index`. A non-empty slot other than 0 also becomes slot 0. */
  read(index: number): CanvasState {
    const slot = this.slot(index);
    if (index !== 0 && !slot.canvas.empty()) {
      this.slots[0] = { canvas: slot.canvas.clone(), preview: slot.preview };
    }
    return slot.canvas.clone();
  }

  /** Store a copy of `canvas` in slot `index`. A non-empty canvas written to another slot also becomes slot 0. */
  write(canvas: CanvasState, index: number): void {
    this.slot(index);
    const stored = canvas.clone();
    const written: Slot<P> = { canvas: stored, preview: this.renderPreview(stored) };
    this.slots[index] = written;
    if (index !== 0 && !stored.empty()) {
      this.slots[0] = { canvas: stored.clone(), preview: written.preview };
    }
  }

  /** Slot indices in presentation order. */
  getOrder(): number[] {
    return this.slots.map((_, i) => i);
  }

  /** Cached preview of slot `index`; null for an empty slot or without a renderer. */
  getPreview(index: number): P | null {
    return this.slot(index).preview;
  }

  /** Replace the renderer and regenerate every preview. */
  setRenderer(renderer: PreviewRenderer<P> | null): void {
    this.renderer = renderer;
    for (const slot of this.slots) {
      slot.preview = this.renderPreview(slot.canvas);
    }
  }

  private renderPreview(canvas: CanvasState): P | null {
    if (!this.renderer || canvas.empty()) return null;
    return this.renderer.render(canvas);
  }

  private slot(index: number): Slot<P> {
    assert(Number.isInteger(index) && index >= 0 && index < this.slots.length, `Clipboard slot ${index} out of range`);
    return this.slots[index];
  }
}
