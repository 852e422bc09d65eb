import { easeProgress } from './easing.js';
import type { Animatable, Keyframe, ValueTraits } from './types.js';

const findSurroundingKeyframes = <T>(
  keyframes: readonly Keyframe<T>[],
  frame: number,
): { prev: Keyframe<T>; next: Keyframe<T> } | null => {
  for (let i = 1; i < keyframes.length; i++) {
    const current = keyframes[i];
    if (current.frame > frame) {
      return { prev: keyframes[i - 1], next: current };
    }
  }
  return null;
};

/**
 * Samples the value a timeline displays at `frame`. Before the first keyframe the
 * initial value applies; after the last keyframe its value holds.
 */
export const evaluateAnimatable = <T>(
  animatable: Animatable<T>,
  frame: number,
  traits: ValueTraits<T>,
): T => {
  const { keyframes } = animatable;
  if (keyframes.length === 0 || frame < keyframes[0].frame) {
    return animatable.initialValue;
  }
  const surrounding = findSurroundingKeyframes(keyframes, frame);
  if (!surrounding) {
    return keyframes[keyframes.length - 1].value;
  }
  const { prev, next } = surrounding;
  const span = next.frame - prev.frame;
  const progress = easeProgress(next.easing, (frame - prev.frame) / span);
  if (progress === 0) {
    return prev.value;
  }
  return traits.lerp(prev.value, next.value, progress);
};

export type DivergenceOptions = {
  step?: number;
};

/**
 * Compares two timelines sample by sample across the union of their keyframed
 * ranges and returns the first frame where they display different values.
 */
export const findFirstDivergence = <T>(
  expected: Animatable<T>,
  actual: Animatable<T>,
  traits: ValueTraits<T>,
  options: DivergenceOptions = {},
): number | null => {
  const frames = [...expected.keyframes, ...actual.keyframes].map((keyframe) => keyframe.frame);
  if (frames.length === 0) {
    return traits.equals(expected.initialValue, actual.initialValue) ? null : 0;
  }
  const step = options.step !== undefined && options.step > 0 ? options.step : 1;
  const start = Math.min(...frames) - step;
  const end = Math.max(...frames) + step;
  for (let frame = start; frame <= end; frame += step) {
    const a = evaluateAnimatable(expected, frame, traits);
    const b = evaluateAnimatable(actual, frame, traits);
    if (!traits.equals(a, b)) {
      return frame;
    }
  }
  return null;
};
