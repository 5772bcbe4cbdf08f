import { describe, it, expect } from 'vitest';
import { anchor, distance, effective, isOutside, point, translate } from './geometry.js';

describe('geometry', () => {
  it('computes euclidean distance', () => {
    expect(distance(point(0, 0), point(3, 4))).toBe(5);
    expect(distance(point(-1, -1), point(-1, -1))).toBe(0);
  });

  it('treats the circle boundary as outside', () => {
    const center = point(10, 10);
    expect(isOutside(point(10, 15), center, 5)).toBe(true);
    expect(isOutside(point(10, 14.9), center, 5)).toBe(false);
    expect(isOutside(point(30, 10), center, 5)).toBe(true);
  });

  it('everything is outside a zero radius circle', () => {
    expect(isOutside(point(1, 1), point(1, 1), 0)).toBe(true);
  });

  it('keeps base point and offset apart', () => {
    const a = anchor(0, -4, -1, 0);
    expect(a.point).toEqual({ x: 0, y: -4 });
    expect(a.offset).toEqual({ x: -1, y: 0 });
    expect(effective(a)).toEqual({ x: -1, y: -4 });
    expect(translate(a.point, point(28, 20))).toEqual({ x: 28, y: 16 });
  });
});
