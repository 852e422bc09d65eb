import type { BezierSegment, PathGeometry, Vector2 } from '../timeline/types.js';

export const vector2 = (x: number, y: number): Vector2 => Object.freeze({ x, y });

export const bezierSegment = (
  controlPoint0: Vector2,
  controlPoint1: Vector2,
  controlPoint2: Vector2,
  controlPoint3: Vector2,
): BezierSegment => Object.freeze({ controlPoint0, controlPoint1, controlPoint2, controlPoint3 });

/** A straight segment: tangent handles sit on the end points. */
export const lineSegment = (from: Vector2, to: Vector2): BezierSegment =>
  bezierSegment(from, from, to, to);

export const pathGeometry = (segments: readonly BezierSegment[]): PathGeometry =>
  Object.freeze({ segments: Object.freeze([...segments]) });

/** True iff the cross product of (b - a) and (c - a) is within `tolerance` of zero. */
export const arePointsColinear = (tolerance: number, a: Vector2, b: Vector2, c: Vector2): boolean => {
  const cross = (b.x - a.x) * (c.y - a.y) - (c.x - a.x) * (b.y - a.y);
  return Math.abs(cross) <= tolerance;
};

const isBetweenScalar = (a: number, b: number, c: number): boolean => {
  const deltaAC = Math.abs(a - c);
  return Math.abs(a - b) <= deltaAC && Math.abs(c - b) <= deltaAC;
};

/** True iff `b` lies between `a` and `c` on both axes. */
export const isBetween = (a: Vector2, b: Vector2, c: Vector2): boolean =>
  isBetweenScalar(a.x, b.x, c.x) && isBetweenScalar(a.y, b.y, c.y);

export const isALine = (segment: BezierSegment, tolerance = 0): boolean => {
  const { controlPoint0: p0, controlPoint1: p1, controlPoint2: p2, controlPoint3: p3 } = segment;
  return (
    arePointsColinear(tolerance, p0, p1, p3) &&
    arePointsColinear(tolerance, p0, p2, p3) &&
    isBetween(p0, p1, p3) &&
    isBetween(p0, p2, p3)
  );
};
