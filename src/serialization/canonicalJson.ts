import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';

import { assertNever } from '../errors.js';
import type {
  Animatable,
  Color,
  Easing,
  Keyframe,
  PathGeometry,
  Scalar,
  Vector2,
  Vector3,
} from '../timeline/types.js';

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type ValueEncoder<T> = (value: T) => JsonValue;

const normalizeNumber = (value: number): number => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  return Object.is(value, -0) ? 0 : value;
};

const encodeVector2 = (value: Vector2): JsonValue => [normalizeNumber(value.x), normalizeNumber(value.y)];

const encodeVector3 = (value: Vector3): JsonValue => [
  normalizeNumber(value.x),
  normalizeNumber(value.y),
  normalizeNumber(value.z),
];

export const encodeScalar: ValueEncoder<Scalar> = (value) => normalizeNumber(value);

export const encodeColor: ValueEncoder<Color> = (value) => ({
  a: normalizeNumber(value.a),
  r: normalizeNumber(value.r),
  g: normalizeNumber(value.g),
  b: normalizeNumber(value.b),
});

export const encodePathGeometry: ValueEncoder<PathGeometry> = (value) => ({
  segments: value.segments.map((segment) => [
    encodeVector2(segment.controlPoint0),
    encodeVector2(segment.controlPoint1),
    encodeVector2(segment.controlPoint2),
    encodeVector2(segment.controlPoint3),
  ]),
});

export const encodeEasing = (easing: Easing): JsonValue => {
  switch (easing.type) {
    case 'linear':
    case 'hold':
      return { type: easing.type };
    case 'cubicBezier':
      return {
        type: easing.type,
        controlPoint1: encodeVector3(easing.controlPoint1),
        controlPoint2: encodeVector3(easing.controlPoint2),
      };
    default:
      return assertNever(easing, 'easing/known-type', 'easing type');
  }
};

const encodeKeyframe = <T>(keyframe: Keyframe<T>, encodeValue: ValueEncoder<T>): JsonValue => ({
  frame: normalizeNumber(keyframe.frame),
  value: encodeValue(keyframe.value),
  easing: encodeEasing(keyframe.easing),
  spatialControlPoint1: encodeVector3(keyframe.spatialControlPoint1),
  spatialControlPoint2: encodeVector3(keyframe.spatialControlPoint2),
});

export type CanonicalAnimatableOptions = {
  indent?: number;
  /** Property indices are not part of timeline identity and are left out by default. */
  includePropertyIndex?: boolean;
};

export const encodeAnimatable = <T>(
  animatable: Animatable<T>,
  encodeValue: ValueEncoder<T>,
  includePropertyIndex = false,
): { [key: string]: JsonValue } => {
  const record: { [key: string]: JsonValue } = {
    initialValue: encodeValue(animatable.initialValue),
    keyframes: animatable.keyframes.map((keyframe) => encodeKeyframe(keyframe, encodeValue)),
  };
  if (includePropertyIndex && animatable.propertyIndex !== undefined) {
    record.propertyIndex = normalizeNumber(animatable.propertyIndex);
  }
  return record;
};

export const writeCanonicalAnimatable = <T>(
  animatable: Animatable<T>,
  encodeValue: ValueEncoder<T>,
  options: CanonicalAnimatableOptions = {},
): string => {
  const indent =
    typeof options.indent === 'number' && options.indent > 0 ? Math.min(options.indent, 10) : undefined;
  return JSON.stringify(
    encodeAnimatable(animatable, encodeValue, options.includePropertyIndex ?? false),
    null,
    indent,
  );
};

export const hashCanonicalJsonString = (json: string): string => bytesToHex(blake3(utf8ToBytes(json)));

/** BLAKE3 digest of the compact canonical JSON; equal for structurally equal timelines. */
export const fingerprintAnimatable = <T>(
  animatable: Animatable<T>,
  encodeValue: ValueEncoder<T>,
): string => hashCanonicalJsonString(writeCanonicalAnimatable(animatable, encodeValue));
