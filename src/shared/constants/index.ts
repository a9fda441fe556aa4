/** An 8-bit-per-channel colour */
export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/** Simulator timing and queueing */
export const SIMULATION_CONFIG = {
  /** Default interval between ticks while running, in ms */
  DEFAULT_PERIOD_MS: 50,
  /** Communicator events buffered between ticks before the oldest is dropped */
  EVENT_QUEUE_CAPACITY: 64,
} as const;

/** Undo/redo */
export const HISTORY_CONFIG = {
  /** Snapshots kept on the undo stack, including the current state */
  MAX_ENTRIES: 200,
} as const;

/** Clipboard slots */
export const CLIPBOARD_CONFIG = {
  /** Numbered slots besides the default clipboard in slot 0 */
  NUM_CLIPBOARDS: 10,
} as const;

/** Serialized canvas framing (see canvas-codec.ts) */
export const FILE_FORMAT = {
  MAGIC: 'CCSB',
  VERSION: 0,
  HEADER_BYTES: 16,
} as const;

/** Named colours used by the element palette */
export const COLORS = {
  RED: { r: 0xe6, g: 0x32, b: 0x32 },
  YELLOW: { r: 0xe6, g: 0xe6, b: 0x2e },
  CYAN: { r: 0x32, g: 0xe6, b: 0xc8 },
  INDIGO: { r: 0x32, g: 0x50, b: 0xe6 },
  MAGENTA: { r: 0xc8, g: 0x32, b: 0xe6 },
  DARK_GREEN: { r: 0x0a, g: 0x66, b: 0x44 },
  ORANGE: { r: 0xe6, g: 0x8c, b: 0x32 },
  GREEN: { r: 0x6e, g: 0xe6, b: 0x32 },
  MAROON: { r: 0xa5, g: 0x0c, b: 0x0c },
  PURPLE: { r: 0x6e, g: 0x32, b: 0xe6 },
  BLUE: { r: 0x32, g: 0xaa, b: 0xe6 },
  WHITE: { r: 0xff, g: 0xff, b: 0xff },
  LIGHT_GREY: { r: 0x99, g: 0x99, b: 0x99 },
  DARK_GREY: { r: 0x18, g: 0x18, b: 0x18 },
  BLACK: { r: 0x00, g: 0x00, b: 0x00 },
} as const satisfies Record<string, RgbColor>;

/** Colour of empty cells and of anything outside the canvas */
export const BACKGROUND_COLOR: RgbColor = COLORS.BLACK;

/** Channel multiplier applied to an element's colour while its level is low */
export const LOW_LEVEL_DIM = 0.4;
