import { assertNever } from '../errors.js';
import type { Animatable, Easing, Keyframe, ValueTraits, Vector2, Vector3 } from './types.js';

export type SequenceHashMode = 'ordered' | 'symmetric';

const HASH_SEED = 17;

export const combineHash = (hash: number, value: number): number =>
  (Math.imul(hash, 31) + value) | 0;

export const hashNumber = (value: number): number => {
  const view = new DataView(new ArrayBuffer(8));
  // 0 and -0 compare equal, so they must hash equal.
  view.setFloat64(0, value === 0 ? 0 : value, true);
  return combineHash(view.getInt32(0, true), view.getInt32(4, true));
};

export const hashString = (value: string): number => {
  let hash = HASH_SEED;
  for (let i = 0; i < value.length; i++) {
    hash = combineHash(hash, value.charCodeAt(i));
  }
  return hash;
};

export const hashNumbers = (...values: number[]): number =>
  values.reduce((hash, value) => combineHash(hash, hashNumber(value)), HASH_SEED);

export const hashVector2 = (value: Vector2): number => hashNumbers(value.x, value.y);

export const hashVector3 = (value: Vector3): number => hashNumbers(value.x, value.y, value.z);

export const hashEasing = (easing: Easing): number => {
  switch (easing.type) {
    case 'linear':
    case 'hold':
      return hashString(easing.type);
    case 'cubicBezier':
      return combineHash(
        combineHash(hashString(easing.type), hashVector3(easing.controlPoint1)),
        hashVector3(easing.controlPoint2),
      );
    default:
      return assertNever(easing, 'easing/known-type', 'easing type');
  }
};

export const hashKeyframe = <T>(keyframe: Keyframe<T>, traits: ValueTraits<T>): number => {
  let hash = combineHash(HASH_SEED, hashNumber(keyframe.frame));
  hash = combineHash(hash, traits.hash(keyframe.value));
  hash = combineHash(hash, hashVector3(keyframe.spatialControlPoint1));
  hash = combineHash(hash, hashVector3(keyframe.spatialControlPoint2));
  return combineHash(hash, hashEasing(keyframe.easing));
};

/**
 * `symmetric` XORs the keyframe hashes together, so permutations of one sequence
 * collide. `ordered` weights each keyframe by its position.
 */
export const hashKeyframeSequence = <T>(
  keyframes: readonly Keyframe<T>[],
  traits: ValueTraits<T>,
  mode: SequenceHashMode = 'ordered',
): number => {
  if (mode === 'symmetric') {
    return keyframes.reduce((hash, keyframe) => hash ^ hashKeyframe(keyframe, traits), 0);
  }
  return keyframes.reduce(
    (hash, keyframe) => combineHash(hash, hashKeyframe(keyframe, traits)),
    HASH_SEED,
  );
};

export const hashAnimatable = <T>(
  animatable: Animatable<T>,
  traits: ValueTraits<T>,
  mode: SequenceHashMode = 'ordered',
): number =>
  combineHash(
    traits.hash(animatable.initialValue),
    hashKeyframeSequence(animatable.keyframes, traits, mode),
  );
