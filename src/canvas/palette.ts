import { BACKGROUND_COLOR, COLORS, LOW_LEVEL_DIM } from '../shared/constants/index.ts';
import type { RgbColor } from '../shared/constants/index.ts';
import { ELEMENT_KINDS } from './element.ts';
import type { CircuitKind, CanvasElement } from './element.ts';
import type { PixelFormat } from './pixel-format.ts';

/** Colour of each element kind while its level is high */
const HIGH_COLORS: Record<CircuitKind, RgbColor> = {
  'conductive-wire': COLORS.YELLOW,
  'insulated-wire': COLORS.ORANGE,
  signal: COLORS.RED,
  source: COLORS.MAROON,
  'positive-relay': COLORS.GREEN,
  'negative-relay': COLORS.DARK_GREEN,
  'and-gate': COLORS.CYAN,
  'or-gate': COLORS.BLUE,
  'nand-gate': COLORS.INDIGO,
  'nor-gate': COLORS.PURPLE,
  'screen-communicator': COLORS.MAGENTA,
  'file-input-communicator': COLORS.LIGHT_GREY,
  'file-output-communicator': COLORS.WHITE,
};

function dim(color: RgbColor): RgbColor {
  return {
    r: Math.round(color.r * LOW_LEVEL_DIM),
    g: Math.round(color.g * LOW_LEVEL_DIM),
    b: Math.round(color.b * LOW_LEVEL_DIM),
  };
}

/** Display colour for one element at the chosen level. */
export function elementColor(element: CanvasElement, useDefaultView: boolean): RgbColor {
  if (element.kind === 'empty') return BACKGROUND_COLOR;
  const high = HIGH_COLORS[element.kind];
  const level = useDefaultView ? element.defaultLogicLevel : element.logicLevel;
  return level ? high : dim(high);
}

/**
 * Pre-mapped pixels for every kind and level in one format, so a fill
 * calls `format.map` once per colour instead of once per pixel.
 */
export interface MappedPalette {
  background: number;
  high: Map<CircuitKind, number>;
  low: Map<CircuitKind, number>;
}

export function mapPalette(format: PixelFormat): MappedPalette {
  const high = new Map<CircuitKind, number>();
  const low = new Map<CircuitKind, number>();
  for (const kind of ELEMENT_KINDS) {
    if (kind === 'empty') continue;
    high.set(kind, format.map(HIGH_COLORS[kind]));
    low.set(kind, format.map(dim(HIGH_COLORS[kind])));
  }
  return { background: format.map(BACKGROUND_COLOR), high, low };
}

export function mappedPixel(palette: MappedPalette, element: CanvasElement, useDefaultView: boolean): number {
  if (element.kind === 'empty') return palette.background;
  const level = useDefaultView ? element.defaultLogicLevel : element.logicLevel;
  return (level ? palette.high : palette.low).get(element.kind) ?? palette.background;
}
