import test from 'node:test';
import assert from 'node:assert/strict';

import { Canonicalizer } from '../src/canonicalizer/canonicalizer.js';
import {
  arePointsColinear,
  bezierSegment,
  isALine,
  isBetween,
  lineSegment,
  pathGeometry,
  vector2,
} from '../src/geometry/bezier.js';
import { distinctSegmentCounts, reconcileSegmentCounts } from '../src/geometry/reconcile.js';
import { createLogger, type LogSink } from '../src/logging/logger.js';
import {
  createAnimatable,
  createKeyframe,
  HOLD_EASING,
  pathGeometryTraits,
  type Animatable,
  type PathGeometry,
} from '../src/timeline/index.js';

const line = (x0: number, y0: number, x1: number, y1: number) => lineSegment(vector2(x0, y0), vector2(x1, y1));

const path = (...segments: ReturnType<typeof line>[]) => pathGeometry(segments);

const twoFrames = (first: PathGeometry, second: PathGeometry): Animatable<PathGeometry> =>
  createAnimatable(first, [
    createKeyframe({ frame: 0, value: first }),
    createKeyframe({
      frame: 10,
      value: second,
      easing: HOLD_EASING,
      spatialControlPoint1: { x: 1, y: 2, z: 0 },
    }),
  ]);

const quiet = () => new Canonicalizer({ logLevel: 'silent' });

const endPoints = (value: PathGeometry) =>
  value.segments.map((segment) => [
    segment.controlPoint0.x,
    segment.controlPoint0.y,
    segment.controlPoint3.x,
    segment.controlPoint3.y,
  ]);

test('isALine accepts straight segments and rejects curves', () => {
  assert.ok(isALine(line(0, 0, 10, 0)));
  assert.ok(isALine(bezierSegment(vector2(0, 0), vector2(2, 2), vector2(6, 6), vector2(8, 8))));
  assert.ok(!isALine(bezierSegment(vector2(0, 0), vector2(0, 5), vector2(10, 5), vector2(10, 0))));
  // Colinear, but the handle overshoots the start point.
  assert.ok(!isALine(bezierSegment(vector2(0, 0), vector2(-5, 0), vector2(10, 0), vector2(10, 0))));
});

test('arePointsColinear honours the tolerance', () => {
  assert.ok(arePointsColinear(0, vector2(0, 0), vector2(1, 1), vector2(2, 2)));
  assert.ok(!arePointsColinear(0, vector2(0, 0), vector2(1, 1), vector2(2, 3)));
  assert.ok(arePointsColinear(1, vector2(0, 0), vector2(1, 1), vector2(2, 3)));
});

test('isBetween checks both axes', () => {
  assert.ok(isBetween(vector2(0, 0), vector2(5, 5), vector2(10, 10)));
  assert.ok(isBetween(vector2(10, 0), vector2(10, 0), vector2(0, 0)));
  assert.ok(!isBetween(vector2(0, 0), vector2(11, 5), vector2(10, 10)));
});

test('a line that doubles back is reduced to its first segment', () => {
  const source = twoFrames(path(line(0, 0, 10, 0)), path(line(0, 0, 20, 0), line(20, 0, 0, 0)));

  const result = reconcileSegmentCounts(source, source);

  assert.notEqual(result, source);
  assert.deepEqual(distinctSegmentCounts(result), [1]);
  assert.deepEqual(
    result.keyframes.map((keyframe) => endPoints(keyframe.value)),
    [[[0, 0, 10, 0]], [[0, 0, 20, 0]]],
  );
  assert.equal(result.initialValue, result.keyframes[0].value);
  assert.equal(result.keyframes[1].easing, HOLD_EASING);
  assert.deepEqual(result.keyframes[1].spatialControlPoint1, { x: 0, y: 0, z: 0 });
});

test('a retrace that ends part way along the line is repaired', () => {
  const partial = twoFrames(path(line(0, 0, 10, 0)), path(line(0, 0, 10, 0), line(10, 0, 5, 0)));
  const diagonal = twoFrames(path(line(0, 0, 4, 4)), path(line(0, 0, 4, 4), line(4, 4, 2, 2)));

  assert.deepEqual(distinctSegmentCounts(reconcileSegmentCounts(partial, partial)), [1]);
  assert.deepEqual(distinctSegmentCounts(reconcileSegmentCounts(diagonal, diagonal)), [1]);
});

test('geometries that are not retraced lines are left alone', () => {
  const extended = twoFrames(path(line(0, 0, 10, 0)), path(line(0, 0, 10, 0), line(10, 0, 20, 0)));
  const curved = twoFrames(
    path(bezierSegment(vector2(0, 0), vector2(0, 5), vector2(10, 5), vector2(10, 0))),
    path(line(0, 0, 10, 0), line(10, 0, 0, 0)),
  );
  const threeSegments = twoFrames(
    path(line(0, 0, 10, 0)),
    path(line(0, 0, 10, 0), line(10, 0, 0, 0), line(0, 0, 10, 0)),
  );
  const one = path(line(0, 0, 10, 0));
  const threeCounts = createAnimatable(one, [
    createKeyframe({ frame: 0, value: one }),
    createKeyframe({ frame: 5, value: path(line(0, 0, 10, 0), line(10, 0, 0, 0)) }),
    createKeyframe({ frame: 10, value: path(line(0, 0, 1, 0), line(1, 0, 0, 0), line(0, 0, 1, 0)) }),
  ]);

  for (const source of [extended, curved, threeSegments, threeCounts]) {
    assert.equal(reconcileSegmentCounts(source, source), source);
  }
});

test('the canonicalizer repairs retraced paths and caches the repaired form', () => {
  const canonicalizer = quiet();
  const build = () => twoFrames(path(line(0, 0, 10, 0)), path(line(0, 0, 10, 0), line(10, 0, 0, 0)));
  const source = build();

  const result = canonicalizer.getOptimizedPathGeometry(source);

  assert.equal(result.keyframes.length, 2);
  assert.ok(result.keyframes.every((keyframe) => keyframe.value.segments.length === 1));
  assert.ok(
    result.keyframes.every((keyframe) =>
      pathGeometryTraits.equals(keyframe.value, path(line(0, 0, 10, 0))),
    ),
  );
  assert.equal(canonicalizer.getOptimizedPathGeometry(build()), result);
  assert.equal(canonicalizer.getOptimizedPathGeometry(result), result);
  assert.equal(quiet().getOptimizedPathGeometry(result), result);

  const stats = canonicalizer.stats();
  assert.equal(stats.reconciled, 1);
  assert.equal(stats.entries.pathGeometry, 2);
});

test('the canonicalizer returns unrepairable paths unchanged and warns about them', () => {
  const lines: string[] = [];
  const record = (message: string) => {
    lines.push(message);
  };
  const sink: LogSink = { error: record, warn: record, info: record, debug: record };
  const canonicalizer = new Canonicalizer({ logger: createLogger('test', 'warn', sink) });
  const source = twoFrames(path(line(0, 0, 10, 0)), path(line(0, 0, 10, 0), line(10, 0, 20, 0)));

  assert.equal(canonicalizer.getOptimizedPathGeometry(source), source);
  assert.equal(canonicalizer.stats().reconciled, 0);
  assert.deepEqual(lines, ['[test] path timeline mixes segment counts 1, 2; keyframes will not interpolate']);
});
