import { assertNever } from '../errors.js';
import type { Animatable, Easing, Keyframe, ValueTraits, Vector2, Vector3 } from './types.js';

export const vector2Equals = (a: Vector2, b: Vector2): boolean => a.x === b.x && a.y === b.y;

export const vector3Equals = (a: Vector3, b: Vector3): boolean =>
  a.x === b.x && a.y === b.y && a.z === b.z;

export const easingEquals = (a: Easing, b: Easing): boolean => {
  if (a === b) {
    return true;
  }
  switch (a.type) {
    case 'linear':
    case 'hold':
      return a.type === b.type;
    case 'cubicBezier':
      return (
        b.type === 'cubicBezier' &&
        vector3Equals(a.controlPoint1, b.controlPoint1) &&
        vector3Equals(a.controlPoint2, b.controlPoint2)
      );
    default:
      return assertNever(a, 'easing/known-type', 'easing type');
  }
};

export const keyframeEquals = <T>(a: Keyframe<T>, b: Keyframe<T>, traits: ValueTraits<T>): boolean =>
  a === b ||
  (a.frame === b.frame &&
    traits.equals(a.value, b.value) &&
    vector3Equals(a.spatialControlPoint1, b.spatialControlPoint1) &&
    vector3Equals(a.spatialControlPoint2, b.spatialControlPoint2) &&
    easingEquals(a.easing, b.easing));

export const keyframeSequenceEquals = <T>(
  a: readonly Keyframe<T>[],
  b: readonly Keyframe<T>[],
  traits: ValueTraits<T>,
): boolean => {
  if (a === b) {
    return true;
  }
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (!keyframeEquals(a[i], b[i], traits)) {
      return false;
    }
  }
  return true;
};

/** `propertyIndex` is not compared. */
export const animatableEquals = <T>(
  a: Animatable<T>,
  b: Animatable<T>,
  traits: ValueTraits<T>,
): boolean =>
  a === b ||
  (traits.equals(a.initialValue, b.initialValue) &&
    keyframeSequenceEquals(a.keyframes, b.keyframes, traits));
