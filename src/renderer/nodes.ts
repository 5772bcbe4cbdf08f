import type { Diagram } from './diagram.js';
import { anchor } from './geometry.js';
import type { Anchor, Point } from './geometry.js';
import { centeredText, circle, group, line, stateRect } from './svg-builder.js';
import { Styles, TextStyles } from './styles.js';
import type { Style } from './styles.js';
import type { Appearance, SvgElement } from './types.js';

interface NodeBase {
  id: string;
  name: string;
  location: Point;
  appearance: Appearance;
}

export interface PlainStateNode extends NodeBase {
  kind: 'state';
}

export interface CompositeStateNode extends NodeBase {
  kind: 'composite' | 'history' | 'deep-history' | 'history-deep-history';
  children: readonly Diagram[]; // owned, one per nested machine
}

export interface PseudoStateNode extends NodeBase {
  kind: 'initial' | 'final';
}

export type DiagramNode = PlainStateNode | CompositeStateNode | PseudoStateNode;

// Outgoing offsets point away from the rectangle, incoming ones towards it.
const STATE_OUT: readonly Anchor[] = [anchor(0, -4, -1), anchor(10, 0, 0, -1), anchor(0, 4, 1), anchor(-10, 0, 0, 1)];
const STATE_IN: readonly Anchor[] = [anchor(0, -4, 1), anchor(10, 0, 0, 1), anchor(0, 4, -1), anchor(-10, 0, 0, -1)];

// Bubbles below the rectangle: left one for history, right one for deep
// history when a state has both.
const BUBBLE_LEFT_IN: readonly Anchor[] = [anchor(-6, 6)];
const BUBBLE_RIGHT_IN: readonly Anchor[] = [anchor(-1, 6)];

// Keep arrows at the bottom edge clear of the two bubbles
const BOTH_HISTORIES_OUT: readonly Anchor[] = [anchor(0, -4, -1), anchor(10, 0, 0, -1), anchor(0, 4, 5), anchor(-10, 0, 0, 1)];
const BOTH_HISTORIES_IN: readonly Anchor[] = [anchor(0, -4, 1), anchor(10, 0, 0, 1), anchor(0, 4, 3), anchor(-10, 0, 0, -1)];

const PSEUDO: readonly Anchor[] = [anchor(0, -2), anchor(2, 0), anchor(0, 2), anchor(-2, 0)];

export const PSEUDO_RADIUS = 2;

export function isComposite(node: DiagramNode): node is CompositeStateNode {
  return node.kind === 'composite' || node.kind === 'history' || node.kind === 'deep-history' || node.kind === 'history-deep-history';
}

export function anchorsOut(node: DiagramNode): readonly Anchor[] {
  switch (node.kind) {
    case 'initial':
    case 'final':
      return PSEUDO;
    case 'history-deep-history':
      return BOTH_HISTORIES_OUT;
    default:
      return STATE_OUT;
  }
}

/**
 * Incoming anchors for a connection that targets the history and/or deep
 * history of `node`. When a state has both bubbles and the connection asks
 * for both, the history bubble wins; this precedence is intentional.
 */
export function anchorsIn(node: DiagramNode, hasHistory: boolean, hasDeepHistory: boolean): readonly Anchor[] {
  switch (node.kind) {
    case 'initial':
    case 'final':
      return PSEUDO;
    case 'history':
      return hasHistory ? BUBBLE_LEFT_IN : STATE_IN;
    case 'deep-history':
      return hasDeepHistory ? BUBBLE_LEFT_IN : STATE_IN;
    case 'history-deep-history':
      if (hasHistory) return BUBBLE_LEFT_IN;
      if (hasDeepHistory) return BUBBLE_RIGHT_IN;
      return BOTH_HISTORIES_IN;
    default:
      return STATE_IN;
  }
}

export function highlight(node: DiagramNode): void {
  node.appearance = 'highlighted';
}

export function reset(node: DiagramNode): void {
  node.appearance = 'normal';
}

/** Style of the node's primary element for its current appearance. */
export function nodeStyle(node: DiagramNode): Style {
  const on = node.appearance === 'highlighted';
  switch (node.kind) {
    case 'initial':
      return on ? Styles.stateInitialHighlighted : Styles.stateInitial;
    case 'final':
      return on ? Styles.stateFinalHighlighted : Styles.stateFinal;
    default:
      return on ? Styles.stateHighlighted : Styles.state;
  }
}

function bubble(x: number, y: number, label: 'H' | 'Hd'): SvgElement[] {
  return [
    circle(x, y + 4, 2, Styles.history),
    centeredText(label, x, y + 4.4, label === 'H' ? TextStyles.big : TextStyles.bigCondensed),
  ];
}

function ellipsis(x: number, y: number): SvgElement[] {
  return [
    circle(x + 5, y + 2.8, 0.5, Styles.smallCircle),
    circle(x + 7.5, y + 2.8, 0.5, Styles.smallCircle),
    line({ x: x + 5.5, y: y + 2.8 }, { x: x + 7, y: y + 2.8 }, Styles.line),
  ];
}

/** The node's group: primary element first, then label and decorations. */
export function renderNode(node: DiagramNode): SvgElement {
  const { x, y } = node.location;
  const style = nodeStyle(node);
  const parts: SvgElement[] = [];
  switch (node.kind) {
    case 'initial':
      parts.push(circle(x, y, PSEUDO_RADIUS, style, node.id));
      break;
    case 'final':
      parts.push(circle(x, y, PSEUDO_RADIUS, style, node.id), circle(x, y, 1.3, Styles.stateInitial));
      break;
    default:
      parts.push(stateRect(node.location, style, node.id), centeredText(node.name, x, y, TextStyles.normal));
      if (isComposite(node)) parts.push(...ellipsis(x, y));
      if (node.kind === 'history' || node.kind === 'history-deep-history') parts.push(...bubble(x - 6, y, 'H'));
      if (node.kind === 'deep-history') parts.push(...bubble(x - 6, y, 'Hd'));
      if (node.kind === 'history-deep-history') parts.push(...bubble(x - 1, y, 'Hd'));
  }
  return group(parts, `${node.id}-group`);
}
