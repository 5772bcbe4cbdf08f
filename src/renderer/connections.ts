import { distance, effective, isOutside, translate } from './geometry.js';
import type { Anchor, Point } from './geometry.js';
import { anchorsIn, anchorsOut } from './nodes.js';
import type { DiagramNode } from './nodes.js';

/** Candidates within this distance of the shortest one count as equally short. */
export const MIN_DISTANCE = 4.0;

/** An anchor translated to its node's location. */
export type PlacedAnchor = Anchor;

export type Connection = { start: PlacedAnchor; end: PlacedAnchor };

export type Segment = { start: Point; end: Point };

function place(a: Anchor, location: Point): PlacedAnchor {
  return { point: translate(a.point, location), offset: a.offset };
}

export function connectionLength(c: Connection): number {
  return distance(effective(c.start), effective(c.end));
}

/**
 * Every (outgoing, incoming) pair, start-anchor major, sorted by length.
 * The sort is stable so equal lengths keep enumeration order.
 */
export function allConnections(start: DiagramNode, end: DiagramNode, isHistory: boolean, isDeepHistory: boolean): Connection[] {
  const outs = anchorsOut(start).map(a => place(a, start.location));
  const ins = anchorsIn(end, isHistory, isDeepHistory).map(a => place(a, end.location));
  const pairs: Connection[] = [];
  for (const s of outs) {
    for (const e of ins) pairs.push({ start: s, end: e });
  }
  return pairs
    .map(c => ({ c, length: connectionLength(c) }))
    .sort((a, b) => a.length - b.length)
    .map(x => x.c);
}

export function shortestConnections(sorted: Connection[]): Connection[] {
  if (sorted.length === 0) return [];
  const shortest = connectionLength(sorted[0]);
  return sorted.filter(c => Math.abs(connectionLength(c) - shortest) < MIN_DISTANCE);
}

function outsideCount(c: Connection, midPoint: Point, radius: number): number {
  return (isOutside(c.start.point, midPoint, radius) ? 1 : 0) + (isOutside(c.end.point, midPoint, radius) ? 1 : 0);
}

export function oneEndOutsideFirstDefault(candidates: Connection[], midPoint: Point, radius: number): Connection[] {
  const oneEnd = candidates.filter(c => outsideCount(c, midPoint, radius) >= 1);
  return oneEnd.length > 0 ? oneEnd : candidates.slice(0, 1);
}

export function bothEndsOutsideFirstDefault(candidates: Connection[], midPoint: Point, radius: number): Connection | undefined {
  return candidates.find(c => outsideCount(c, midPoint, radius) === 2) ?? candidates[0];
}

/**
 * Picks the connector between two nodes of one diagram: among the shortest
 * candidates, prefer ones with an end outside the construction circle, then
 * ones with both ends outside. Offsets only take part in the length
 * comparison; the returned segment joins the anchors' base points.
 */
export function selectConnection(
  start: DiagramNode,
  end: DiagramNode,
  isHistory: boolean,
  isDeepHistory: boolean,
  midPoint: Point,
  radius: number
): Segment | undefined {
  const shortest = shortestConnections(allConnections(start, end, isHistory, isDeepHistory));
  const chosen = bothEndsOutsideFirstDefault(oneEndOutsideFirstDefault(shortest, midPoint, radius), midPoint, radius);
  return chosen ? { start: chosen.start.point, end: chosen.end.point } : undefined;
}
