import { bezierSegment, pathGeometry, vector2 } from '../geometry/bezier.js';
import { createAnimatable, createKeyframe } from '../timeline/animatable.js';
import { cubicBezierEasing, HOLD_EASING, LINEAR_EASING } from '../timeline/easing.js';
import type {
  Animatable,
  BezierSegment,
  Color,
  Easing,
  Keyframe,
  PathGeometry,
  Scalar,
  Vector2,
  Vector3,
} from '../timeline/types.js';
import { color } from '../timeline/values.js';
import type {
  AnimationDocument,
  DocumentValidationIssue,
  DocumentValidationResult,
  TimelineEntry,
} from './types.js';

type Path = readonly (string | number)[];

type ValueParser<T> = (value: unknown, issues: DocumentValidationIssue[], path: Path) => T | null;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const asFiniteNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const numberList = (value: unknown): number[] | null => {
  if (!Array.isArray(value)) {
    return null;
  }
  const numbers: number[] = [];
  for (const entry of value) {
    const number = asFiniteNumber(entry);
    if (number === null) {
      return null;
    }
    numbers.push(number);
  }
  return numbers;
};

const pushIssue = (
  issues: DocumentValidationIssue[],
  code: string,
  message: string,
  path: Path,
  severity: DocumentValidationIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

const parseVector2 = (value: unknown): Vector2 | null => {
  const numbers = numberList(value);
  return numbers && numbers.length === 2 ? vector2(numbers[0], numbers[1]) : null;
};

const parseVector3: ValueParser<Vector3> = (value, issues, path) => {
  const numbers = numberList(value);
  if (!numbers || numbers.length < 2 || numbers.length > 3) {
    pushIssue(issues, 'vector/shape', 'Vector must be an array of 2 or 3 finite numbers', path);
    return null;
  }
  return Object.freeze({ x: numbers[0], y: numbers[1], z: numbers[2] ?? 0 });
};

const parseScalar: ValueParser<Scalar> = (value, issues, path) => {
  const number = asFiniteNumber(value);
  if (number === null) {
    pushIssue(issues, 'value/scalar', 'Scalar value must be a finite number', path);
  }
  return number;
};

const parseColor: ValueParser<Color> = (value, issues, path) => {
  const channels = Array.isArray(value)
    ? numberList(value)
    : isRecord(value)
      ? numberList([value.a ?? 1, value.r, value.g, value.b])
      : null;
  if (!channels || channels.length !== 4) {
    pushIssue(
      issues,
      'value/color',
      'Color must be {a?, r, g, b} or [a, r, g, b] with finite channels',
      path,
    );
    return null;
  }
  return color(channels[0], channels[1], channels[2], channels[3]);
};

const parseSegment = (value: unknown, issues: DocumentValidationIssue[], path: Path): BezierSegment | null => {
  const points = Array.isArray(value) ? value.map(parseVector2) : [];
  const [p0, p1, p2, p3] = points;
  if (points.length !== 4 || !p0 || !p1 || !p2 || !p3) {
    pushIssue(
      issues,
      'value/path/segment',
      'Path segment must list four [x, y] control points',
      path,
    );
    return null;
  }
  return bezierSegment(p0, p1, p2, p3);
};

const parsePathGeometry: ValueParser<PathGeometry> = (value, issues, path) => {
  if (!isRecord(value) || !Array.isArray(value.segments)) {
    pushIssue(issues, 'value/path', 'Path geometry must be an object with a segments array', path);
    return null;
  }
  const segments: BezierSegment[] = [];
  let valid = true;
  value.segments.forEach((entry, index) => {
    const segment = parseSegment(entry, issues, [...path, 'segments', index]);
    if (segment) {
      segments.push(segment);
    } else {
      valid = false;
    }
  });
  return valid ? pathGeometry(segments) : null;
};

const parseEasing = (value: unknown, issues: DocumentValidationIssue[], path: Path): Easing | null => {
  if (value === undefined) {
    return LINEAR_EASING;
  }
  const type = isRecord(value) ? asString(value.type) : asString(value);
  switch (type) {
    case 'linear':
      return LINEAR_EASING;
    case 'hold':
      return HOLD_EASING;
    case 'cubicBezier': {
      if (!isRecord(value)) {
        pushIssue(issues, 'easing/cubicBezier', 'Cubic bezier easing needs control points', path);
        return null;
      }
      const controlPoint1 = parseVector3(value.controlPoint1, issues, [...path, 'controlPoint1']);
      const controlPoint2 = parseVector3(value.controlPoint2, issues, [...path, 'controlPoint2']);
      return controlPoint1 && controlPoint2 ? cubicBezierEasing(controlPoint1, controlPoint2) : null;
    }
    default:
      pushIssue(
        issues,
        'easing/type',
        `Unknown easing type ${JSON.stringify(type ?? value)}`,
        path,
      );
      return null;
  }
};

const parseOptionalVector3 = (
  value: unknown,
  issues: DocumentValidationIssue[],
  path: Path,
): Vector3 | undefined | null => (value === undefined ? undefined : parseVector3(value, issues, path));

const parseKeyframe = <T>(
  value: unknown,
  parseValue: ValueParser<T>,
  issues: DocumentValidationIssue[],
  path: Path,
): Keyframe<T> | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'keyframe/type', 'Keyframe must be an object', path);
    return null;
  }
  const frame = asFiniteNumber(value.frame);
  if (frame === null) {
    pushIssue(issues, 'keyframe/frame', 'Keyframe must define a finite frame', [...path, 'frame']);
  }
  const parsed = parseValue(value.value, issues, [...path, 'value']);
  const easing = parseEasing(value.easing, issues, [...path, 'easing']);
  const spatialControlPoint1 = parseOptionalVector3(
    value.spatialControlPoint1,
    issues,
    [...path, 'spatialControlPoint1'],
  );
  const spatialControlPoint2 = parseOptionalVector3(
    value.spatialControlPoint2,
    issues,
    [...path, 'spatialControlPoint2'],
  );
  if (
    frame === null ||
    parsed === null ||
    easing === null ||
    spatialControlPoint1 === null ||
    spatialControlPoint2 === null
  ) {
    return null;
  }
  return createKeyframe<T>({ frame, value: parsed, easing, spatialControlPoint1, spatialControlPoint2 });
};

const parseAnimatable = <T>(
  raw: Record<string, unknown>,
  parseValue: ValueParser<T>,
  issues: DocumentValidationIssue[],
  path: Path,
): Animatable<T> | null => {
  if (!Array.isArray(raw.keyframes) || raw.keyframes.length === 0) {
    pushIssue(
      issues,
      'timeline/keyframes/empty',
      'Timeline must define at least one keyframe',
      [...path, 'keyframes'],
    );
    return null;
  }
  const keyframes: Keyframe<T>[] = [];
  let valid = true;
  raw.keyframes.forEach((entry, index) => {
    const keyframe = parseKeyframe(entry, parseValue, issues, [...path, 'keyframes', index]);
    if (!keyframe) {
      valid = false;
      return;
    }
    const previous = keyframes[keyframes.length - 1];
    if (previous && keyframe.frame <= previous.frame) {
      pushIssue(
        issues,
        'timeline/keyframes/order',
        `Keyframe at frame ${keyframe.frame} must come after frame ${previous.frame}`,
        [...path, 'keyframes', index, 'frame'],
      );
      valid = false;
    }
    keyframes.push(keyframe);
  });

  let propertyIndex: number | undefined;
  if (raw.propertyIndex !== undefined) {
    const index = asFiniteNumber(raw.propertyIndex);
    if (index === null || !Number.isInteger(index)) {
      pushIssue(
        issues,
        'timeline/propertyIndex',
        'propertyIndex must be an integer; ignoring it',
        [...path, 'propertyIndex'],
        'warning',
      );
    } else {
      propertyIndex = index;
    }
  }

  const initialValue =
    raw.initialValue === undefined
      ? keyframes[0]?.value ?? null
      : parseValue(raw.initialValue, issues, [...path, 'initialValue']);
  if (!valid || initialValue === null) {
    return null;
  }
  return createAnimatable<T>(initialValue, keyframes, propertyIndex);
};

const withPropertyIndex = <E extends TimelineEntry>(entry: E): E =>
  entry.animatable.propertyIndex === undefined
    ? entry
    : { ...entry, propertyIndex: entry.animatable.propertyIndex };

const parseTimeline = (
  value: unknown,
  issues: DocumentValidationIssue[],
  path: Path,
): TimelineEntry | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'timeline/type', 'Timeline entry must be an object', path);
    return null;
  }
  const id = asString(value.id);
  if (!id) {
    pushIssue(issues, 'timeline/id', 'Timeline must define a string id', [...path, 'id']);
    return null;
  }
  const kind = asString(value.kind);
  switch (kind) {
    case 'color': {
      const animatable = parseAnimatable(value, parseColor, issues, path);
      return animatable ? withPropertyIndex({ id, kind: 'color', animatable }) : null;
    }
    case 'scalar': {
      const animatable = parseAnimatable(value, parseScalar, issues, path);
      return animatable ? withPropertyIndex({ id, kind: 'scalar', animatable }) : null;
    }
    case 'pathGeometry': {
      const animatable = parseAnimatable(value, parsePathGeometry, issues, path);
      return animatable ? withPropertyIndex({ id, kind: 'pathGeometry', animatable }) : null;
    }
    default:
      pushIssue(
        issues,
        'timeline/kind',
        `Unknown timeline kind ${JSON.stringify(value.kind)}; expected color, scalar or pathGeometry`,
        [...path, 'kind'],
      );
      return null;
  }
};

export class DocumentValidationError extends Error {
  constructor(
    message: string,
    readonly issues: DocumentValidationIssue[],
  ) {
    super(message);
    this.name = 'DocumentValidationError';
  }
}

export function validateDocument(payload: unknown): DocumentValidationResult {
  const issues: DocumentValidationIssue[] = [];

  if (!isRecord(payload)) {
    pushIssue(issues, 'document/type', 'Document root must be an object', []);
    throw new DocumentValidationError('Document root must be an object', issues);
  }

  if (payload.version !== 1) {
    pushIssue(
      issues,
      'document/version',
      `Unsupported document version ${JSON.stringify(payload.version)}; expected 1`,
      ['version'],
    );
  }

  const name = payload.name === undefined ? undefined : asString(payload.name) ?? undefined;
  if (payload.name !== undefined && name === undefined) {
    pushIssue(issues, 'document/name', 'Document name must be a string; ignoring it', ['name'], 'warning');
  }

  const timelines: TimelineEntry[] = [];
  if (!Array.isArray(payload.timelines)) {
    pushIssue(issues, 'document/timelines', 'Document must define a timelines array', ['timelines']);
  } else {
    const seen = new Set<string>();
    payload.timelines.forEach((entry, index) => {
      const timeline = parseTimeline(entry, issues, ['timelines', index]);
      if (!timeline) {
        return;
      }
      if (seen.has(timeline.id)) {
        pushIssue(
          issues,
          'timeline/id/duplicate',
          `Duplicate timeline id "${timeline.id}"`,
          ['timelines', index, 'id'],
        );
        return;
      }
      seen.add(timeline.id);
      timelines.push(timeline);
    });
  }

  if (issues.some((issue) => issue.severity === 'error')) {
    throw new DocumentValidationError('Document validation failed', issues);
  }

  const document: AnimationDocument =
    name === undefined ? { version: 1, timelines } : { version: 1, name, timelines };
  return { document, issues };
}
