import { createAnimatable, createKeyframe } from '../timeline/animatable.js';
import type { Animatable, BezierSegment, Keyframe, PathGeometry } from '../timeline/types.js';
import { arePointsColinear, isALine, isBetween, pathGeometry } from './bezier.js';

/**
 * True for a geometry of one line, or of two lines where the second ends
 * somewhere on the first, i.e. draws back over it.
 */
const isRetraceableLine = (segments: readonly BezierSegment[], tolerance: number): boolean => {
  if (!segments.every((segment) => isALine(segment, tolerance))) {
    return false;
  }
  switch (segments.length) {
    case 1:
      return true;
    case 2: {
      const start = segments[0].controlPoint0;
      const turn = segments[0].controlPoint3;
      const end = segments[1].controlPoint3;
      return arePointsColinear(tolerance, start, turn, end) && isBetween(start, end, turn);
    }
    default:
      return false;
  }
};

const keepFirstSegment = (keyframe: Keyframe<PathGeometry>): Keyframe<PathGeometry> =>
  createKeyframe({
    frame: keyframe.frame,
    value: pathGeometry(keyframe.value.segments.slice(0, 1)),
    easing: keyframe.easing,
  });

export const distinctSegmentCounts = (animatable: Animatable<PathGeometry>): number[] => [
  ...new Set(animatable.keyframes.map((keyframe) => keyframe.value.segments.length)),
];

/**
 * Path keyframes only interpolate when they share a segment count. When
 * `source` mixes one- and two-segment lines whose second segment retraces the
 * first, returns `optimized` rewritten to one segment per keyframe; otherwise
 * returns `optimized` as it is.
 */
export const reconcileSegmentCounts = (
  source: Animatable<PathGeometry>,
  optimized: Animatable<PathGeometry>,
  tolerance = 0,
): Animatable<PathGeometry> => {
  if (distinctSegmentCounts(source).length !== 2) {
    return optimized;
  }
  const repairable = source.keyframes.every((keyframe) =>
    isRetraceableLine(keyframe.value.segments, tolerance),
  );
  if (!repairable) {
    return optimized;
  }
  const keyframes = optimized.keyframes.map(keepFirstSegment);
  return createAnimatable(keyframes[0].value, keyframes, optimized.propertyIndex);
};
