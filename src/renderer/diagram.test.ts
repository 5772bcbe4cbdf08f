import { describe, it, expect, expectTypeOf } from 'vitest';
import type { FsmInfo, StateInfo, TransitionInfo } from '../core/types.js';
import { Diagram } from './diagram.js';
import type { NestedPanel, NestedPlacement, Transition } from './diagram.js';
import type { CompositeStateNode } from './nodes.js';
import type { SvgElement } from './types.js';

function to(endPointId: string, extra: Partial<TransitionInfo> = {}): TransitionInfo {
  return { endPointId, isHistory: false, isDeepHistory: false, isToFinal: false, ...extra };
}

function state(id: string, extra: Partial<StateInfo> = {}): StateInfo {
  return {
    name: id,
    id,
    transitions: [],
    children: [],
    isInitial: false,
    isFinal: false,
    hasHistory: false,
    hasDeepHistory: false,
    ...extra,
  };
}

const simple: FsmInfo = {
  name: 'Door',
  states: [
    state('i', { isInitial: true, transitions: [to('a')] }),
    state('a', { transitions: [to('b')] }),
    state('b', { transitions: [to('f', { isToFinal: true })] }),
    state('f', { isFinal: true }),
  ],
};

function inner(prefix: string): FsmInfo {
  return { name: prefix, states: [state(`${prefix}.i`, { isInitial: true, transitions: [to(`${prefix}.x`)] }), state(`${prefix}.x`)] };
}

const nestedFsm: FsmInfo = {
  name: 'Outer',
  states: [state('i', { isInitial: true, transitions: [to('c')] }), state('c', { children: [inner('c1'), inner('c2')] })],
};

function countByClass(elements: SvgElement[], className: string): number {
  return elements.reduce((n, el) => n + (el.attrs.class === className ? 1 : 0) + countByClass(el.children, className), 0);
}

describe('Diagram layout', () => {
  it('places states on a circle with the pseudo states in the corners', () => {
    const d = new Diagram(simple);
    expect(d.radius).toBe(8);
    expect(d.midPoint).toEqual({ x: 28, y: 28 });
    expect([d.width, d.height, d.totalWidth, d.totalHeight]).toEqual([56, 56, 56, 56]);
    expect(d.nodes().map(n => [n.id, n.location.x, n.location.y])).toEqual([
      ['i', 8, 8],
      ['a', 28, 20],
      ['b', 28, 36],
      ['f', 48, 48],
    ]);
  });

  it('grows the radius with the number of normal states', () => {
    const names = ['a', 'b', 'c', 'd', 'e'];
    const d = new Diagram({ name: 'Five', states: [state('i', { isInitial: true }), ...names.map(n => state(n))] });
    expect(d.radius).toBe(32);
    expect(d.midPoint).toEqual({ x: 52, y: 52 });
    expect(d.node('a')?.location).toEqual({ x: 52, y: 20 });
    const c = d.node('c')?.location;
    expect(c?.x).toBeCloseTo(52 + 32 * Math.sin((4 * Math.PI) / 5), 10);
    expect(c?.y).toBeCloseTo(52 - 32 * Math.cos((4 * Math.PI) / 5), 10);
  });

  it('uses a zero radius for one normal state', () => {
    const d = new Diagram({ name: 'One', states: [state('i', { isInitial: true }), state('a')] });
    expect(d.radius).toBe(0);
    expect(d.node('a')?.location).toEqual({ x: 20, y: 20 });
    expect(d.width).toBe(40);
  });

  it('puts the final node bottom left when no state leads to it from the right', () => {
    const d = new Diagram({
      name: 'Empty',
      states: [state('i', { isInitial: true, transitions: [to('f', { isToFinal: true })] }), state('f', { isFinal: true })],
    });
    expect(d.radius).toBe(0);
    expect(d.node('f')?.location).toEqual({ x: 8, y: 32 });
    expect(d.transitions.map(t => t.segment)).toEqual([{ start: { x: 8, y: 10 }, end: { x: 8, y: 30 } }]);
  });

  it('tolerates a machine without an initial state', () => {
    const d = new Diagram({ name: 'Loose', states: [state('a'), state('b')] });
    expect(d.nodes().map(n => n.id)).toEqual(['a', 'b']);
  });

  it('answers lookups with the first node registered under an id', () => {
    const d = new Diagram({ name: 'Dup', states: [state('i', { isInitial: true }), state('a', { name: 'first' }), state('a', { name: 'second' })] });
    expect(d.nodes()).toHaveLength(3);
    expect(d.node('a')?.name).toBe('first');
  });
});

describe('Diagram transitions', () => {
  it('draws one connector per transition', () => {
    const d = new Diagram(simple);
    expect(d.transitions.map(t => [t.from.id, t.to.id, t.segment])).toEqual([
      ['i', 'a', { start: { x: 8, y: 10 }, end: { x: 18, y: 20 } }],
      ['a', 'b', { start: { x: 28, y: 24 }, end: { x: 28, y: 32 } }],
      ['b', 'f', { start: { x: 38, y: 36 }, end: { x: 48, y: 46 } }],
    ]);
  });

  it('skips transitions to states that are not in the machine', () => {
    const d = new Diagram({ name: 'Gap', states: [state('i', { isInitial: true, transitions: [to('nowhere'), to('a')] }), state('a')] });
    expect(d.transitions.map(t => t.to.id)).toEqual(['a']);
  });
});

describe('Diagram nesting', () => {
  it('lays nested machines out in a row below the parent', () => {
    const d = new Diagram(nestedFsm);
    expect([d.width, d.height]).toEqual([40, 40]);
    expect([d.totalWidth, d.totalHeight]).toEqual([80, 80]);
    expect(d.panels).toHaveLength(1);
    const [panel] = d.panels;
    expect([panel.left, panel.top, panel.width, panel.height]).toEqual([0, 40, 80, 40]);
    expect(panel.placements.map(p => [p.diagram.fsm.name, p.left, p.top])).toEqual([
      ['c1', 0, 40],
      ['c2', 40, 40],
    ]);
  });

  it('emits a background panel and a translated group per nested machine', () => {
    const nested = new Diagram(nestedFsm).nestedElements();
    expect(nested.map(el => el.tag)).toEqual(['rect', 'text', 'g', 'g']);
    expect(nested[0].attrs).toMatchObject({ x: '2', y: '42', width: '76', height: '36', rx: '5' });
    expect(nested[1]).toMatchObject({ text: 'c', attrs: { x: '18', y: '46' } });
    expect(nested.slice(2).map(g => g.attrs)).toEqual([
      { class: 'fsm', transform: 'translate(0 40)' },
      { class: 'fsm', transform: 'translate(40 40)' },
    ]);
  });

  it('nests nested machines recursively in the document', () => {
    const deep: FsmInfo = {
      name: 'Top',
      states: [state('t.i', { isInitial: true }), state('t.c', { children: [nestedFsm] })],
    };
    const d = new Diagram(deep);
    expect(d.totalWidth).toBe(80);
    expect(d.totalHeight).toBe(120);
    expect(countByClass([d.toDocument()], 'fsm')).toBe(3);
  });
});

describe('Diagram immutability', () => {
  it('hands out the layout as read-only arrays', () => {
    const d = new Diagram(nestedFsm);
    expectTypeOf(d.transitions).toEqualTypeOf<readonly Transition[]>();
    expectTypeOf(d.panels).toEqualTypeOf<readonly NestedPanel[]>();
    expectTypeOf(d.panels[0].placements).toEqualTypeOf<readonly NestedPlacement[]>();
    expectTypeOf<CompositeStateNode['children']>().toEqualTypeOf<readonly Diagram[]>();
    expect(d.compositeNodes()[0].children).toHaveLength(2);
  });
});

describe('Diagram document', () => {
  it('starts with the marker definitions followed by the base group', () => {
    const doc = new Diagram(simple).toDocument();
    expect(doc.attrs.viewBox).toBe('0 0 56 56');
    expect(doc.children.map(c => c.tag)).toEqual(['defs', 'g']);
    const base = doc.children[1];
    expect(base.children.map(c => c.attrs.id ?? c.tag)).toEqual(['i-group', 'a-group', 'b-group', 'f-group', 'path', 'path', 'path']);
    expect(base.children[5].attrs.d).toBe('M28 24 28 32');
  });

  it('reflects appearance changes on the next build', () => {
    const d = new Diagram(simple);
    const a = d.node('a');
    if (!a) throw new Error('missing node');
    a.appearance = 'highlighted';
    const rect = d.toDocument().children[1].children[1].children[0];
    expect(rect.attrs.style).toBe('stroke-width:0.5px;stroke:#ff0000;fill:#faebd7');
  });
});
