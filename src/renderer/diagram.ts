import type { FsmInfo, StateInfo, TransitionInfo } from '../core/types.js';
import { normalStates } from '../core/types.js';
import { selectConnection } from './connections.js';
import type { Segment } from './connections.js';
import { point } from './geometry.js';
import type { Point } from './geometry.js';
import { createNode } from './node-factory.js';
import { isComposite, renderNode } from './nodes.js';
import type { CompositeStateNode, DiagramNode } from './nodes.js';
import { group, line, rect, svgDocument, text, translatedGroup } from './svg-builder.js';
import { Styles, TextStyles } from './styles.js';
import type { SvgElement } from './types.js';

/** Space around the construction circle, partly taken by nodes. */
export const BORDER = 20.0;
/** Arc length between neighbouring states. */
export const STATE_SPACE = 16.0;
/** Inset of the initial and final nodes from the diagram corners. */
export const SPECIAL_NODE_OFFSET = 8.0;

export type Transition = {
  from: DiagramNode;
  to: DiagramNode;
  info: TransitionInfo;
  segment: Segment;
};

/** Where one nested diagram sits, relative to its parent diagram. */
export type NestedPlacement = { diagram: Diagram; left: number; top: number };

/** Background panel behind the nested diagrams of one composite node. */
export type NestedPanel = {
  node: CompositeStateNode;
  left: number;
  top: number;
  width: number;
  height: number;
  placements: readonly NestedPlacement[];
};

/**
 * Lays out one machine: states on a circle, initial node top left, final
 * node in a bottom corner, nested machines of composite states in a row
 * below. The node set is fixed after construction; only node appearance
 * changes later.
 */
export class Diagram {
  readonly fsm: FsmInfo;
  readonly radius: number;
  readonly midPoint: Point;
  readonly width: number;
  readonly height: number;
  readonly transitions: readonly Transition[];
  readonly panels: readonly NestedPanel[];
  readonly totalWidth: number;
  readonly totalHeight: number;

  private readonly entries: Array<{ state: StateInfo; node: DiagramNode }> = [];
  private readonly byId = new Map<string, DiagramNode>();

  constructor(fsm: FsmInfo) {
    this.fsm = fsm;
    const normals = normalStates(fsm);
    this.radius = (Math.max(normals.length - 1, 0) / 2) * STATE_SPACE;
    this.midPoint = point(this.radius + BORDER, this.radius + BORDER);
    this.width = 2 * this.radius + 2 * BORDER;
    this.height = 2 * this.radius + 2 * BORDER;

    this.registerInitialNode();
    this.registerNormalNodes(normals);
    this.registerFinalNode();
    this.transitions = this.calculateTransitions();
    this.panels = this.calculatePanels();

    const children = this.compositeNodes().flatMap(n => n.children);
    this.totalWidth = Math.max(this.width, children.reduce((sum, d) => sum + d.totalWidth, 0));
    this.totalHeight = this.height + children.reduce((max, d) => Math.max(max, d.totalHeight), 0);
  }

  /** Nodes in registration order: initial, normal states clockwise from the top, final. */
  nodes(): readonly DiagramNode[] {
    return this.entries.map(e => e.node);
  }

  node(id: string): DiagramNode | undefined {
    return this.byId.get(id);
  }

  compositeNodes(): CompositeStateNode[] {
    return this.nodes().filter(isComposite);
  }

  baseGroup(): SvgElement {
    return group([
      ...this.entries.map(e => renderNode(e.node)),
      ...this.transitions.map(t => line(t.segment.start, t.segment.end, Styles.transition)),
    ]);
  }

  nestedElements(): SvgElement[] {
    const out: SvgElement[] = [];
    for (const panel of this.panels) {
      out.push(
        rect(panel.left + 2, panel.top + 2, panel.width - 4, panel.height - 4, 5, Styles.background),
        text(panel.node.name, panel.left + 18, panel.top + 6, TextStyles.big)
      );
      for (const p of panel.placements) {
        out.push(translatedGroup('fsm', p.left, p.top, p.diagram.graphElements()));
      }
    }
    return out;
  }

  /** Base group followed by the nested groups, in diagram coordinates. */
  graphElements(): SvgElement[] {
    return [this.baseGroup(), ...this.nestedElements()];
  }

  /**
   * The full vector document. Rebuilt from the stored layout on every call,
   * so it always reflects the current node appearances.
   */
  toDocument(): SvgElement {
    return svgDocument(this.totalWidth, this.totalHeight, this.graphElements());
  }

  private register(state: StateInfo, location: Point): DiagramNode {
    const node = createNode(state, location, fsm => new Diagram(fsm));
    this.entries.push({ state, node });
    // Ids are unique per machine; if not, the first registration answers lookups
    if (!this.byId.has(node.id)) this.byId.set(node.id, node);
    return node;
  }

  private registerInitialNode(): void {
    const initial = this.fsm.states.find(s => s.isInitial);
    if (initial) this.register(initial, point(SPECIAL_NODE_OFFSET, SPECIAL_NODE_OFFSET));
  }

  private registerNormalNodes(normals: StateInfo[]): void {
    const step = (2 * Math.PI) / normals.length;
    normals.forEach((state, k) => this.register(state, this.positionAt(k * step)));
  }

  /**
   * Bottom corner on the same side of the midpoint as the state that leads
   * to it, not the opposite one. Left when that state is strictly left of
   * the midpoint or when no state leads to it, right otherwise.
   */
  private registerFinalNode(): void {
    const final = this.fsm.states.find(s => s.isFinal);
    if (!final) return;
    const owner = this.entries.find(e => !e.state.isInitial && e.state.transitions.some(t => t.isToFinal));
    const left = !owner || owner.node.location.x < this.midPoint.x;
    const far = this.midPoint.x + this.radius + BORDER - SPECIAL_NODE_OFFSET;
    const x = left ? SPECIAL_NODE_OFFSET : far;
    this.register(final, point(x, this.midPoint.y + this.radius + BORDER - SPECIAL_NODE_OFFSET));
  }

  private positionAt(angle: number): Point {
    return point(this.midPoint.x + this.radius * Math.sin(angle), this.midPoint.y - this.radius * Math.cos(angle));
  }

  private calculateTransitions(): Transition[] {
    const out: Transition[] = [];
    for (const { state, node } of this.entries) {
      for (const info of state.transitions) {
        const target = this.byId.get(info.endPointId);
        if (!target) continue; // unreachable states may be left out of the description
        const segment = selectConnection(node, target, info.isHistory, info.isDeepHistory, this.midPoint, this.radius);
        if (segment) out.push({ from: node, to: target, info, segment });
      }
    }
    return out;
  }

  private calculatePanels(): NestedPanel[] {
    const top = this.height;
    const panels: NestedPanel[] = [];
    let left = 0;
    for (const node of this.compositeNodes()) {
      const start = left;
      let height = 0;
      const placements: NestedPlacement[] = [];
      for (const child of node.children) {
        placements.push({ diagram: child, left, top });
        left += child.totalWidth;
        height = Math.max(height, child.totalHeight);
      }
      panels.push({ node, left: start, top, width: left - start, height, placements });
    }
    return panels;
  }
}
