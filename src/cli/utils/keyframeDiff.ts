import type { Easing, EasingType } from '../../timeline/types.js';

type KeyframeTiming = {
  readonly frame: number;
  readonly easing: Easing;
};

export type KeyframeChange =
  | { kind: 'removed'; frame: number }
  | { kind: 'easing'; frame: number; from: EasingType; to: EasingType };

/**
 * Lists what canonicalization did to a keyframe list: frames it dropped and
 * frames whose easing it rewrote. `after` must hold a subset of `before`'s frames.
 */
export const diffKeyframes = (
  before: readonly KeyframeTiming[],
  after: readonly KeyframeTiming[],
): KeyframeChange[] => {
  const kept = new Map<number, KeyframeTiming>(after.map((keyframe) => [keyframe.frame, keyframe]));
  const changes: KeyframeChange[] = [];
  for (const keyframe of before) {
    const match = kept.get(keyframe.frame);
    if (!match) {
      changes.push({ kind: 'removed', frame: keyframe.frame });
    } else if (match.easing.type !== keyframe.easing.type) {
      changes.push({
        kind: 'easing',
        frame: keyframe.frame,
        from: keyframe.easing.type,
        to: match.easing.type,
      });
    }
  }
  return changes;
};

export const formatKeyframeChange = (change: KeyframeChange): string =>
  change.kind === 'removed'
    ? ` - frame ${change.frame}`
    : ` ~ frame ${change.frame}: easing ${change.from} → ${change.to}`;
