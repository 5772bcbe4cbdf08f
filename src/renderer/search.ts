import type { Diagram } from './diagram.js';
import type { DiagramNode } from './nodes.js';

export type NodeMatch = { diagram: Diagram; node: DiagramNode };

/**
 * Finds the first node satisfying `predicate`. A diagram's own nodes are
 * tried first, then the nested diagrams of its composite nodes, depth
 * first, each level in registration order.
 */
export function findNode(diagram: Diagram, predicate: (node: DiagramNode) => boolean): NodeMatch | undefined {
  const own = diagram.nodes().find(predicate);
  if (own) return { diagram, node: own };
  for (const composite of diagram.compositeNodes()) {
    for (const child of composite.children) {
      const match = findNode(child, predicate);
      if (match) return match;
    }
  }
  return undefined;
}

export function findNodeById(diagram: Diagram, id: string): NodeMatch | undefined {
  return findNode(diagram, n => n.id === id);
}
