// Stateless constructors for the primitive shapes of a diagram. Every
// numeric attribute goes through formatNumber.

import type { Point } from './geometry.js';
import type { SvgElement } from './types.js';
import { ARROW_MARKER_ID, styleString, textStyleString } from './styles.js';
import type { Style, TextStyle } from './styles.js';
import { formatNumber as num } from './utils.js';

export const SVG_NS = 'http://www.w3.org/2000/svg';

function element(tag: SvgElement['tag'], attrs: Record<string, string>, children: SvgElement[] = [], text?: string): SvgElement {
  return text === undefined ? { tag, attrs, children } : { tag, attrs, children, text };
}

export function group(children: SvgElement[] = [], id?: string): SvgElement {
  return element('g', id === undefined ? {} : { id }, children);
}

export function translatedGroup(className: string, left: number, top: number, children: SvgElement[] = []): SvgElement {
  return element('g', { class: className, transform: `translate(${num(left)} ${num(top)})` }, children);
}

export function circle(cx: number, cy: number, r: number, style: Style, id?: string): SvgElement {
  const attrs: Record<string, string> = { cx: num(cx), cy: num(cy), r: num(r), style: styleString(style) };
  return element('circle', id === undefined ? attrs : { id, ...attrs });
}

export function rect(x: number, y: number, width: number, height: number, r: number, style: Style, id?: string): SvgElement {
  const attrs: Record<string, string> = {
    x: num(x),
    y: num(y),
    width: num(width),
    height: num(height),
    rx: num(r),
    ry: num(r),
    style: styleString(style),
  };
  return element('rect', id === undefined ? attrs : { id, ...attrs });
}

export const STATE_WIDTH = 20;
export const STATE_HEIGHT = 8;
export const STATE_CORNER = 2;

/** The fixed-size rounded rectangle of a state, centred on its location. */
export function stateRect(location: Point, style: Style, id?: string): SvgElement {
  return rect(location.x - STATE_WIDTH / 2, location.y - STATE_HEIGHT / 2, STATE_WIDTH, STATE_HEIGHT, STATE_CORNER, style, id);
}

export function centeredText(content: string, x: number, y: number, style: TextStyle): SvgElement {
  return element(
    'text',
    { x: num(x), y: num(y), style: textStyleString(style), 'text-anchor': 'middle', 'dominant-baseline': 'middle' },
    [],
    content
  );
}

export function text(content: string, x: number, y: number, style: TextStyle): SvgElement {
  return element('text', { x: num(x), y: num(y), style: textStyleString(style) }, [], content);
}

export function line(start: Point, end: Point, style: Style): SvgElement {
  return element('path', { d: `M${num(start.x)} ${num(start.y)} ${num(end.x)} ${num(end.y)}`, style: styleString(style) });
}

function arrowMarker(): SvgElement {
  return element('defs', { id: 'defs1' }, [
    element(
      'marker',
      {
        id: ARROW_MARKER_ID,
        style: 'overflow:visible',
        markerHeight: '1',
        markerWidth: '2',
        orient: 'auto-start-reverse',
        preserveAspectRatio: 'none',
        refX: '1',
        viewBox: '0 0 1 1',
      },
      [
        element('path', {
          id: 'path2',
          transform: 'rotate(180 .125 0)',
          d: 'm3-3-3 3 3 3',
          style: 'fill:none;stroke-linecap:round;stroke:context-stroke',
        }),
      ]
    ),
  ]);
}

/** Root element with the viewBox and the one shared arrowhead definition. */
export function svgDocument(width: number, height: number, children: SvgElement[] = []): SvgElement {
  return element('svg', { xmlns: SVG_NS, viewBox: `0 0 ${num(width)} ${num(height)}` }, [arrowMarker(), ...children]);
}
