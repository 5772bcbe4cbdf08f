import type { FsmInfo, StateInfo } from '../core/types.js';
import { hasChildren } from '../core/types.js';
import type { Diagram } from './diagram.js';
import type { Point } from './geometry.js';
import type { DiagramNode } from './nodes.js';
import type { NodeKind } from './types.js';

type Rule = { when: (state: StateInfo) => boolean; kind: NodeKind };

// First matching rule wins
const RULES: Rule[] = [
  { when: s => s.isInitial, kind: 'initial' },
  { when: s => s.isFinal, kind: 'final' },
  { when: s => hasChildren(s) && s.hasHistory && s.hasDeepHistory, kind: 'history-deep-history' },
  { when: s => hasChildren(s) && s.hasHistory, kind: 'history' },
  { when: s => hasChildren(s) && s.hasDeepHistory, kind: 'deep-history' },
  { when: s => hasChildren(s), kind: 'composite' },
];

/** Picks the node variant for a state; history flags without children yield a plain state. */
export function nodeKindOf(state: StateInfo): NodeKind {
  return RULES.find(r => r.when(state))?.kind ?? 'state';
}

/**
 * Creates the node for `state`. Composite variants lay out each nested
 * machine through `buildChild`; other variants never call it.
 */
export function createNode(state: StateInfo, location: Point, buildChild?: (fsm: FsmInfo) => Diagram): DiagramNode {
  const base = { id: state.id, name: state.name, location, appearance: 'normal' as const };
  const kind = nodeKindOf(state);
  switch (kind) {
    case 'initial':
    case 'final':
      return { ...base, name: '', kind };
    case 'state':
      return { ...base, kind };
    default:
      return { ...base, kind, children: buildChild ? state.children.map(c => buildChild(c)) : [] };
  }
}
