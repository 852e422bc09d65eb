import test from 'node:test';
import assert from 'node:assert/strict';

import { diffKeyframes, formatKeyframeChange } from '../src/cli/utils/keyframeDiff.js';
import { createKeyframe, HOLD_EASING } from '../src/timeline/index.js';

test('diffKeyframes lists dropped frames and rewritten easings', () => {
  const before = [
    createKeyframe({ frame: 0, value: 1 }),
    createKeyframe({ frame: 5, value: 1, easing: HOLD_EASING }),
    createKeyframe({ frame: 10, value: 2 }),
  ];
  const after = [createKeyframe({ frame: 5, value: 1 }), before[2]];

  const changes = diffKeyframes(before, after);

  assert.deepEqual(changes, [
    { kind: 'removed', frame: 0 },
    { kind: 'easing', frame: 5, from: 'hold', to: 'linear' },
  ]);
  assert.deepEqual(changes.map(formatKeyframeChange), [' - frame 0', ' ~ frame 5: easing hold → linear']);
});

test('diffKeyframes is empty when nothing changed', () => {
  const keyframes = [createKeyframe({ frame: 0, value: 0 }), createKeyframe({ frame: 4, value: 1 })];
  assert.deepEqual(diffKeyframes(keyframes, keyframes), []);
});
