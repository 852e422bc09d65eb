import { bezierSegment, pathGeometry, vector2 } from '../geometry/bezier.js';
import { vector2Equals } from './equality.js';
import { combineHash, hashNumbers, hashVector2 } from './hash.js';
import type { BezierSegment, Color, PathGeometry, Scalar, ValueTraits, Vector2 } from './types.js';

const lerpNumber = (from: number, to: number, t: number): number => from + (to - from) * t;

const lerpVector2 = (from: Vector2, to: Vector2, t: number): Vector2 =>
  vector2(lerpNumber(from.x, to.x, t), lerpNumber(from.y, to.y, t));

export const color = (a: number, r: number, g: number, b: number): Color =>
  Object.freeze({ a, r, g, b });

export const scalarTraits: ValueTraits<Scalar> = {
  kind: 'scalar',
  equals: (a, b) => a === b,
  hash: (value) => hashNumbers(value),
  lerp: lerpNumber,
};

export const colorTraits: ValueTraits<Color> = {
  kind: 'color',
  equals: (a, b) => a === b || (a.a === b.a && a.r === b.r && a.g === b.g && a.b === b.b),
  hash: (value) => hashNumbers(value.a, value.r, value.g, value.b),
  lerp: (from, to, t) =>
    color(
      lerpNumber(from.a, to.a, t),
      lerpNumber(from.r, to.r, t),
      lerpNumber(from.g, to.g, t),
      lerpNumber(from.b, to.b, t),
    ),
};

const segmentEquals = (a: BezierSegment, b: BezierSegment): boolean =>
  a === b ||
  (vector2Equals(a.controlPoint0, b.controlPoint0) &&
    vector2Equals(a.controlPoint1, b.controlPoint1) &&
    vector2Equals(a.controlPoint2, b.controlPoint2) &&
    vector2Equals(a.controlPoint3, b.controlPoint3));

const hashSegment = (segment: BezierSegment): number =>
  [segment.controlPoint0, segment.controlPoint1, segment.controlPoint2, segment.controlPoint3].reduce(
    (hash, point) => combineHash(hash, hashVector2(point)),
    17,
  );

const lerpSegment = (from: BezierSegment, to: BezierSegment, t: number): BezierSegment =>
  bezierSegment(
    lerpVector2(from.controlPoint0, to.controlPoint0, t),
    lerpVector2(from.controlPoint1, to.controlPoint1, t),
    lerpVector2(from.controlPoint2, to.controlPoint2, t),
    lerpVector2(from.controlPoint3, to.controlPoint3, t),
  );

export const pathGeometryTraits: ValueTraits<PathGeometry> = {
  kind: 'pathGeometry',
  equals: (a, b) => {
    if (a === b) {
      return true;
    }
    if (a.segments.length !== b.segments.length) {
      return false;
    }
    return a.segments.every((segment, index) => segmentEquals(segment, b.segments[index]));
  },
  hash: (value) => value.segments.reduce((hash, segment) => combineHash(hash, hashSegment(segment)), 17),
  // Geometries with different segment counts cannot be interpolated; they hold.
  lerp: (from, to, t) => {
    if (from.segments.length !== to.segments.length) {
      return from;
    }
    return pathGeometry(
      from.segments.map((segment, index) => lerpSegment(segment, to.segments[index], t)),
    );
  },
};
