import { assertNever } from '../errors.js';
import type { CubicBezierEasing, Easing, HoldEasing, LinearEasing, Vector3 } from './types.js';

export const ZERO_VECTOR3: Vector3 = Object.freeze({ x: 0, y: 0, z: 0 });

export const LINEAR_EASING: LinearEasing = Object.freeze({ type: 'linear' });

export const HOLD_EASING: HoldEasing = Object.freeze({ type: 'hold' });

export const cubicBezierEasing = (controlPoint1: Vector3, controlPoint2: Vector3): CubicBezierEasing =>
  Object.freeze({
    type: 'cubicBezier',
    controlPoint1: Object.freeze({ ...controlPoint1 }),
    controlPoint2: Object.freeze({ ...controlPoint2 }),
  });

const BISECTION_STEPS = 48;

const cubic = (p1: number, p2: number, s: number): number => {
  const inv = 1 - s;
  return 3 * inv * inv * s * p1 + 3 * inv * s * s * p2 + s * s * s;
};

const solveCubicBezier = (easing: CubicBezierEasing, t: number): number => {
  const { controlPoint1: c1, controlPoint2: c2 } = easing;
  let lo = 0;
  let hi = 1;
  let s = t;
  for (let i = 0; i < BISECTION_STEPS; i++) {
    s = (lo + hi) / 2;
    const x = cubic(c1.x, c2.x, s);
    if (x < t) {
      lo = s;
    } else {
      hi = s;
    }
  }
  return cubic(c1.y, c2.y, s);
};

/** Maps linear progress `t` in [0, 1] through the easing curve. */
export const easeProgress = (easing: Easing, t: number): number => {
  if (t <= 0) {
    return 0;
  }
  if (t >= 1) {
    return 1;
  }
  switch (easing.type) {
    case 'linear':
      return t;
    case 'hold':
      return 0;
    case 'cubicBezier':
      return solveCubicBezier(easing, t);
    default:
      return assertNever(easing, 'easing/known-type', 'easing type');
  }
};
