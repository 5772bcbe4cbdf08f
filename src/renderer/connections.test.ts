import { describe, it, expect } from 'vitest';
import { allConnections, connectionLength, selectConnection, shortestConnections } from './connections.js';
import type { DiagramNode } from './nodes.js';

const pseudo = (id: string, kind: 'initial' | 'final', x: number, y: number): DiagramNode => ({ id, name: '', location: { x, y }, appearance: 'normal', kind });

const ends = (c: { start: { point: { x: number; y: number } }; end: { point: { x: number; y: number } } }) => [
  [c.start.point.x, c.start.point.y],
  [c.end.point.x, c.end.point.y],
];

const plain = (id: string, x: number, y: number): DiagramNode => ({ id, name: id, location: { x, y }, appearance: 'normal', kind: 'state' });

const withHistory = (id: string, x: number, y: number): DiagramNode => ({
  id,
  name: id,
  location: { x, y },
  appearance: 'normal',
  kind: 'history',
  children: [],
});

describe('allConnections', () => {
  it('pairs every outgoing anchor with every incoming anchor', () => {
    expect(allConnections(plain('a', 0, 0), plain('b', 0, 40), false, false)).toHaveLength(16);
  });

  it('targets only the bubble for history transitions', () => {
    const all = allConnections(plain('a', 0, -30), withHistory('h', 0, 0), true, false);
    expect(all).toHaveLength(4);
    expect(all.every(c => c.end.point.x === -6 && c.end.point.y === 6)).toBe(true);
  });

  it('sorts by effective length', () => {
    const all = allConnections(plain('a', 0, -30), withHistory('h', 0, 0), true, false);
    const lengths = all.map(connectionLength);
    expect(lengths).toEqual([...lengths].sort((x, y) => x - y));
    expect(lengths[0]).toBeCloseTo(Math.sqrt(1073), 10);
    expect(lengths[1]).toBeCloseTo(Math.sqrt(1241), 10);
  });
});

describe('shortestConnections', () => {
  it('keeps equally long candidates in enumeration order', () => {
    const all = allConnections(pseudo('i', 'initial', 0, 0), pseudo('f', 'final', 0, 10), false, false);
    expect(shortestConnections(all).map(ends)).toEqual([
      [[0, 2], [0, 8]],
      [[2, 0], [0, 8]],
      [[0, 2], [2, 10]],
      [[0, 2], [-2, 10]],
      [[-2, 0], [0, 8]],
    ]);
  });

  it('is empty for no candidates', () => {
    expect(shortestConnections([])).toEqual([]);
  });

  it('keeps candidates strictly within the tolerance of the shortest', () => {
    const all = allConnections(plain('a', 0, -30), withHistory('h', 0, 0), true, false);
    expect(shortestConnections(all).map(c => c.start.point)).toEqual([
      { x: 0, y: -26 },
      { x: -10, y: -30 },
    ]);
  });
});

describe('selectConnection', () => {
  it('joins facing edges of vertically stacked states', () => {
    const segment = selectConnection(plain('a', 28, 20), plain('b', 28, 36), false, false, { x: 28, y: 28 }, 8);
    expect(segment).toEqual({ start: { x: 28, y: 24 }, end: { x: 28, y: 32 } });
  });

  it('falls back to the shortest candidate when every end is inside the circle', () => {
    const segment = selectConnection(plain('a', 0, -30), withHistory('h', 0, 0), true, false, { x: 0, y: 0 }, 100);
    expect(segment).toEqual({ start: { x: 0, y: -26 }, end: { x: -6, y: 6 } });
  });

  it('prefers a candidate with both ends outside the circle', () => {
    const segment = selectConnection(plain('a', 0, -30), withHistory('h', 0, 0), true, false, { x: 0, y: -26 }, 5);
    expect(segment).toEqual({ start: { x: -10, y: -30 }, end: { x: -6, y: 6 } });
  });

  it('picks the first enumerated pair among zero-length ties', () => {
    const all = allConnections(pseudo('i', 'initial', 0, 0), pseudo('f', 'final', 0, 0), false, false);
    expect(all.slice(0, 4).map(ends)).toEqual([
      [[0, -2], [0, -2]],
      [[2, 0], [2, 0]],
      [[0, 2], [0, 2]],
      [[-2, 0], [-2, 0]],
    ]);
    const segment = selectConnection(pseudo('i', 'initial', 0, 0), pseudo('f', 'final', 0, 0), false, false, { x: 0, y: 0 }, 100);
    expect(segment).toEqual({ start: { x: 0, y: -2 }, end: { x: 0, y: -2 } });
  });

  it('returns base points, not offset ones', () => {
    const segment = selectConnection(plain('b', 28, 36), { id: 'f', name: '', location: { x: 48, y: 48 }, appearance: 'normal', kind: 'final' }, false, false, { x: 28, y: 28 }, 8);
    expect(segment).toEqual({ start: { x: 38, y: 36 }, end: { x: 48, y: 46 } });
  });
});
