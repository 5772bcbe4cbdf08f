export type Point = { x: number; y: number };

/**
 * A candidate attachment point. `point` is relative to the owning node's
 * location; `offset` is a small per-variant nudge that only takes part in
 * distance comparisons between candidates.
 */
export type Anchor = { point: Point; offset: Point };

export function point(x: number, y: number): Point {
  return { x, y };
}

export function anchor(x: number, y: number, offsetX = 0, offsetY = 0): Anchor {
  return { point: { x, y }, offset: { x: offsetX, y: offsetY } };
}

export function translate(p: Point, by: Point): Point {
  return { x: p.x + by.x, y: p.y + by.y };
}

/** Base plus offset. */
export function effective(a: Anchor): Point {
  return translate(a.point, a.offset);
}

export function distance(p1: Point, p2: Point): number {
  return Math.sqrt(Math.pow(p2.x - p1.x, 2) + Math.pow(p2.y - p1.y, 2));
}

/** Points on the circle itself count as outside. */
export function isOutside(p: Point, center: Point, radius: number): boolean {
  return distance(p, center) >= radius;
}
