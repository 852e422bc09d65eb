import test from 'node:test';
import assert from 'node:assert/strict';

import { InvariantViolationError } from '../src/errors.js';
import {
  createKeyframe,
  cubicBezierEasing,
  HOLD_EASING,
  LINEAR_EASING,
  optimizeKeyframes,
  type Keyframe,
} from '../src/timeline/index.js';

const same = (a: number, b: number) => a === b;

const easeInOut = cubicBezierEasing({ x: 0.42, y: 0, z: 0 }, { x: 0.58, y: 1, z: 0 });

test('optimizeKeyframes drops a frame that never leaves the initial value and linearizes the launch frame', () => {
  const landing = createKeyframe({ frame: 10, value: 2, easing: HOLD_EASING });
  const keyframes = [
    createKeyframe({ frame: 0, value: 1, easing: HOLD_EASING }),
    createKeyframe({ frame: 5, value: 1, easing: easeInOut }),
    landing,
  ];

  const result = [...optimizeKeyframes(1, keyframes, same)];

  assert.deepEqual(
    result.map((keyframe) => [keyframe.frame, keyframe.value, keyframe.easing.type]),
    [
      [5, 1, 'linear'],
      [10, 2, 'hold'],
    ],
  );
  assert.equal(result[1], landing);
});

test('optimizeKeyframes emits nothing when the value never changes', () => {
  const keyframes = [0, 1, 2].map((frame) => createKeyframe({ frame, value: 7 }));
  assert.deepEqual([...optimizeKeyframes(7, keyframes, same)], []);
});

test('optimizeKeyframes keeps a landing frame and drops the redundant tail', () => {
  const first = createKeyframe({ frame: 0, value: 2 });
  const keyframes = [first, createKeyframe({ frame: 5, value: 2 }), createKeyframe({ frame: 10, value: 2 })];

  const result = [...optimizeKeyframes(1, keyframes, same)];

  assert.equal(result.length, 1);
  assert.equal(result[0], first);
});

test('optimizeKeyframes keeps the launch, landing and return of a round trip', () => {
  const keyframes = [
    createKeyframe({ frame: 0, value: 1, easing: easeInOut }),
    createKeyframe({ frame: 5, value: 2 }),
    createKeyframe({ frame: 10, value: 1, easing: HOLD_EASING }),
  ];

  const result = [...optimizeKeyframes(1, keyframes, same)];

  assert.deepEqual(
    result.map((keyframe) => [keyframe.frame, keyframe.easing.type]),
    [
      [0, 'linear'],
      [5, 'linear'],
      [10, 'hold'],
    ],
  );
});

test('optimizeKeyframes drops plateau frames between changes', () => {
  const keyframes = [
    createKeyframe({ frame: 0, value: 2 }),
    createKeyframe({ frame: 5, value: 2 }),
    createKeyframe({ frame: 10, value: 2, easing: HOLD_EASING }),
    createKeyframe({ frame: 15, value: 3 }),
  ];

  const result = [...optimizeKeyframes(2, keyframes, same)];

  assert.deepEqual(
    result.map((keyframe) => [keyframe.frame, keyframe.easing.type]),
    [
      [10, 'linear'],
      [15, 'linear'],
    ],
  );
});

test('optimizeKeyframes reuses a launch frame that is already linear', () => {
  const launch = createKeyframe({ frame: 0, value: 1, easing: LINEAR_EASING });
  const result = [...optimizeKeyframes(1, [launch, createKeyframe({ frame: 10, value: 4 })], same)];
  assert.equal(result[0], launch);
});

test('optimizeKeyframes rejects an empty keyframe list', () => {
  assert.throws(
    () => [...optimizeKeyframes(0, [], same)],
    (error: unknown) =>
      error instanceof InvariantViolationError && error.invariant === 'animatable/non-empty',
  );
});

test('optimizeKeyframes pulls its input lazily', () => {
  let pulled = 0;
  function* source(): Generator<Keyframe<number>> {
    for (let i = 0; i < 10; i++) {
      pulled++;
      yield createKeyframe({ frame: i * 10, value: i + 2 });
    }
  }

  const iterator = optimizeKeyframes(1, source(), same);
  const first = iterator.next();

  if (first.done) {
    assert.fail('expected a keyframe');
  }
  assert.equal(first.value.frame, 0);
  assert.equal(pulled, 2);
});
