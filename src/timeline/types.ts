export type Vector2 = {
  readonly x: number;
  readonly y: number;
};

export type Vector3 = {
  readonly x: number;
  readonly y: number;
  readonly z: number;
};

export type Color = {
  readonly a: number;
  readonly r: number;
  readonly g: number;
  readonly b: number;
};

export type Scalar = number;

export type LinearEasing = { readonly type: 'linear' };

export type HoldEasing = { readonly type: 'hold' };

export type CubicBezierEasing = {
  readonly type: 'cubicBezier';
  readonly controlPoint1: Vector3;
  readonly controlPoint2: Vector3;
};

export type Easing = LinearEasing | HoldEasing | CubicBezierEasing;

export type EasingType = Easing['type'];

export type BezierSegment = {
  readonly controlPoint0: Vector2;
  readonly controlPoint1: Vector2;
  readonly controlPoint2: Vector2;
  readonly controlPoint3: Vector2;
};

export type PathGeometry = {
  readonly segments: readonly BezierSegment[];
};

export type Keyframe<T> = {
  readonly frame: number;
  readonly value: T;
  readonly spatialControlPoint1: Vector3;
  readonly spatialControlPoint2: Vector3;
  /** Shapes the ramp from the previous keyframe into this one. */
  readonly easing: Easing;
};

export type Animatable<T> = {
  readonly initialValue: T;
  readonly keyframes: readonly Keyframe<T>[];
  readonly propertyIndex?: number;
};

export type ValueKind = 'color' | 'scalar' | 'pathGeometry';

/**
 * Per-type operations the equality engine, the optimizer and the evaluator are
 * composed from.
 */
export type ValueTraits<T> = {
  readonly kind: ValueKind;
  equals(a: T, b: T): boolean;
  hash(value: T): number;
  lerp(from: T, to: T, t: number): T;
};
