import { InvariantViolationError } from '../errors.js';
import { withEasing } from './animatable.js';
import { LINEAR_EASING } from './easing.js';
import type { Keyframe } from './types.js';

export type ValueEquals<T> = (a: T, b: T) => boolean;

/**
 * Yields the keyframes of a timeline minus those that never change what is
 * displayed. A keyframe that starts a ramp from an unchanged value is yielded
 * with linear easing, since the constant segment leading into it hides its easing.
 */
export function* optimizeKeyframes<T>(
  initialValue: T,
  keyframes: Iterable<Keyframe<T>>,
  equals: ValueEquals<T>,
): Generator<Keyframe<T>, void, undefined> {
  const iterator = keyframes[Symbol.iterator]();
  const first = iterator.next();
  if (first.done) {
    throw new InvariantViolationError('animatable/non-empty', 'cannot optimize an empty keyframe list');
  }

  let previousValue = initialValue;
  let current = first.value;
  let emitted = false;

  for (let step = iterator.next(); !step.done; step = iterator.next()) {
    const next = step.value;
    if (!equals(current.value, previousValue)) {
      yield current;
      emitted = true;
    } else if (!equals(current.value, next.value)) {
      yield withEasing(current, LINEAR_EASING);
      emitted = true;
    }
    previousValue = current.value;
    current = next;
  }

  if (emitted && !equals(current.value, previousValue)) {
    yield current;
  }
}
