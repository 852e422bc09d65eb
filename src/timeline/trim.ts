import type { Keyframe } from './types.js';

/**
 * Yields the keyframes needed to play `[startFrame, endFrame]`: at most one
 * keyframe at or before the start, then everything up to and including the
 * first keyframe at or after the end.
 */
export function* trimKeyframes<T>(
  keyframes: Iterable<Keyframe<T>>,
  startFrame: number,
  endFrame: number,
): Generator<Keyframe<T>, void, undefined> {
  let firstKeyframeEmitted = false;
  let firstCandidate: Keyframe<T> | null = null;

  for (const keyframe of keyframes) {
    if (keyframe.frame <= startFrame) {
      firstCandidate = keyframe;
    } else if (keyframe.frame === 0) {
      firstCandidate = null;
      yield keyframe;
      firstKeyframeEmitted = true;
    } else {
      if (!firstKeyframeEmitted && firstCandidate !== null) {
        yield firstCandidate;
        firstKeyframeEmitted = true;
      }
      yield keyframe;
      if (keyframe.frame >= endFrame) {
        return;
      }
    }
  }
}
