import { InvariantViolationError } from '../errors.js';
import { easingEquals } from './equality.js';
import { LINEAR_EASING, ZERO_VECTOR3 } from './easing.js';
import type { Animatable, Easing, Keyframe, ValueTraits, Vector3 } from './types.js';

export type KeyframeInit<T> = {
  frame: number;
  value: T;
  easing?: Easing;
  spatialControlPoint1?: Vector3;
  spatialControlPoint2?: Vector3;
};

export const createKeyframe = <T>(init: KeyframeInit<T>): Keyframe<T> =>
  Object.freeze({
    frame: init.frame,
    value: init.value,
    spatialControlPoint1: init.spatialControlPoint1 ?? ZERO_VECTOR3,
    spatialControlPoint2: init.spatialControlPoint2 ?? ZERO_VECTOR3,
    easing: init.easing ?? LINEAR_EASING,
  });

export const withEasing = <T>(keyframe: Keyframe<T>, easing: Easing): Keyframe<T> =>
  easingEquals(keyframe.easing, easing) ? keyframe : Object.freeze({ ...keyframe, easing });

export const createAnimatable = <T>(
  initialValue: T,
  keyframes: readonly Keyframe<T>[],
  propertyIndex?: number,
): Animatable<T> =>
  Object.freeze(
    propertyIndex === undefined
      ? { initialValue, keyframes: Object.freeze([...keyframes]) }
      : { initialValue, keyframes: Object.freeze([...keyframes]), propertyIndex },
  );

export const isAnimated = <T>(animatable: Animatable<T>, traits: ValueTraits<T>): boolean =>
  animatable.keyframes.length > 1 &&
  animatable.keyframes.some((keyframe) => !traits.equals(keyframe.value, animatable.initialValue));

export const assertWellFormed = <T>(animatable: Animatable<T>): void => {
  const { keyframes } = animatable;
  if (keyframes.length === 0) {
    throw new InvariantViolationError('animatable/non-empty', 'timeline has no keyframes');
  }
  for (let i = 1; i < keyframes.length; i++) {
    if (!(keyframes[i].frame > keyframes[i - 1].frame)) {
      throw new InvariantViolationError(
        'animatable/ascending-frames',
        `keyframe ${i} at frame ${keyframes[i].frame} does not follow frame ${keyframes[i - 1].frame}`,
      );
    }
  }
};
