import { formatNumber } from './utils.js';

export type StyleKind = 'plain' | 'transition' | 'background';

export type Style = {
  strokeWidth: number;
  fill: string;
  stroke: string;
  kind?: StyleKind;
};

export type TextStyle = {
  fontSize: number;
  fontStretch?: 'normal' | 'condensed';
};

export const ARROW_MARKER_ID = 'ArrowWideRounded';
export const FONT_FAMILY = 'Arial,sans-serif';

const ANTIQUE_WHITE = '#faebd7';
const BLACK = '#000000';
const WHITE = '#ffffff';
const RED = '#ff0000';

export const Styles = {
  state: { strokeWidth: 0.2, fill: ANTIQUE_WHITE, stroke: BLACK },
  stateHighlighted: { strokeWidth: 0.5, fill: ANTIQUE_WHITE, stroke: RED },
  stateFinal: { strokeWidth: 0.2, fill: WHITE, stroke: BLACK },
  stateFinalHighlighted: { strokeWidth: 0.5, fill: WHITE, stroke: RED },
  stateInitial: { strokeWidth: 0.2, fill: BLACK, stroke: BLACK },
  stateInitialHighlighted: { strokeWidth: 0.5, fill: BLACK, stroke: RED },
  smallCircle: { strokeWidth: 0.15, fill: ANTIQUE_WHITE, stroke: BLACK },
  line: { strokeWidth: 0.15, fill: BLACK, stroke: BLACK },
  history: { strokeWidth: 0.15, fill: WHITE, stroke: BLACK },
  transition: { strokeWidth: 0.15, fill: BLACK, stroke: BLACK, kind: 'transition' },
  background: { strokeWidth: 0.15, fill: ANTIQUE_WHITE, stroke: BLACK, kind: 'background' },
} as const satisfies Record<string, Style>;

export const TextStyles = {
  normal: { fontSize: 2 },
  big: { fontSize: 3 },
  bigCondensed: { fontSize: 3, fontStretch: 'condensed' },
} as const satisfies Record<string, TextStyle>;

export function styleString(style: Style): string {
  const base = `stroke-width:${formatNumber(style.strokeWidth)}px;stroke:${style.stroke};fill:${style.fill}`;
  switch (style.kind) {
    case 'transition':
      return `${base};marker-end:url(#${ARROW_MARKER_ID})`;
    case 'background':
      return `${base};fill-opacity:.25;stroke-dasharray:0.45`;
    default:
      return base;
  }
}

export function textStyleString(style: TextStyle): string {
  return `font-family:${FONT_FAMILY};font-size:${style.fontSize}px;letter-spacing:0px;line-height:1.25;stroke-width:.26458;word-spacing:0px;font-stretch:${style.fontStretch ?? 'normal'}`;
}
