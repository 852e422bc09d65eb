import test from 'node:test';
import assert from 'node:assert/strict';

import { lineSegment, pathGeometry, vector2 } from '../src/geometry/bezier.js';
import {
  encodeColor,
  encodeEasing,
  encodePathGeometry,
  encodeScalar,
  fingerprintAnimatable,
  hashCanonicalJsonString,
  writeCanonicalAnimatable,
} from '../src/serialization/canonicalJson.js';
import {
  color,
  createAnimatable,
  createKeyframe,
  cubicBezierEasing,
  HOLD_EASING,
} from '../src/timeline/index.js';

const SINGLE_ZERO =
  '{"initialValue":0,"keyframes":[{"frame":0,"value":0,"easing":{"type":"linear"},' +
  '"spatialControlPoint1":[0,0,0],"spatialControlPoint2":[0,0,0]}]}';

test('canonical JSON writes keys in a fixed order and normalizes -0', () => {
  const zero = createAnimatable(0, [createKeyframe({ frame: 0, value: 0 })]);
  const negativeZero = createAnimatable(-0, [createKeyframe({ frame: -0, value: -0 })]);

  assert.equal(writeCanonicalAnimatable(zero, encodeScalar), SINGLE_ZERO);
  assert.equal(writeCanonicalAnimatable(negativeZero, encodeScalar), SINGLE_ZERO);
});

test('property indices are written only on request', () => {
  const indexed = createAnimatable(0, [createKeyframe({ frame: 0, value: 0 })], 3);
  assert.equal(writeCanonicalAnimatable(indexed, encodeScalar), SINGLE_ZERO);
  assert.equal(
    writeCanonicalAnimatable(indexed, encodeScalar, { includePropertyIndex: true }),
    `${SINGLE_ZERO.slice(0, -1)},"propertyIndex":3}`,
  );
});

test('value and easing encoders', () => {
  assert.deepEqual(encodeColor(color(1, 0.5, 0, 0.25)), { a: 1, r: 0.5, g: 0, b: 0.25 });
  assert.deepEqual(encodePathGeometry(pathGeometry([lineSegment(vector2(0, 0), vector2(1, 2))])), {
    segments: [
      [
        [0, 0],
        [0, 0],
        [1, 2],
        [1, 2],
      ],
    ],
  });
  assert.deepEqual(encodeEasing(HOLD_EASING), { type: 'hold' });
  assert.deepEqual(encodeEasing(cubicBezierEasing({ x: 0.42, y: 0, z: 0 }, { x: 0.58, y: 1, z: 0 })), {
    type: 'cubicBezier',
    controlPoint1: [0.42, 0, 0],
    controlPoint2: [0.58, 1, 0],
  });
});

test('canonical JSON refuses non-finite numbers', () => {
  const broken = createAnimatable(Number.NaN, [createKeyframe({ frame: 0, value: 1 })]);
  assert.throws(() => writeCanonicalAnimatable(broken, encodeScalar), TypeError);
});

test('fingerprints identify timeline content', () => {
  const build = (end: number, propertyIndex?: number) =>
    createAnimatable(
      0,
      [createKeyframe({ frame: 0, value: 0 }), createKeyframe({ frame: 10, value: end })],
      propertyIndex,
    );

  const fingerprint = fingerprintAnimatable(build(5, 1), encodeScalar);
  assert.match(fingerprint, /^[0-9a-f]{64}$/);
  assert.equal(fingerprintAnimatable(build(5, 2), encodeScalar), fingerprint);
  assert.notEqual(fingerprintAnimatable(build(6), encodeScalar), fingerprint);
  assert.equal(
    fingerprint,
    hashCanonicalJsonString(writeCanonicalAnimatable(build(5), encodeScalar)),
  );
});
