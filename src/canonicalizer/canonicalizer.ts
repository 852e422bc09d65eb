import { distinctSegmentCounts, reconcileSegmentCounts } from '../geometry/reconcile.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { assertWellFormed, createAnimatable, isAnimated } from '../timeline/animatable.js';
import { keyframeSequenceEquals } from '../timeline/equality.js';
import { optimizeKeyframes } from '../timeline/optimize.js';
import { trimKeyframes } from '../timeline/trim.js';
import type { Animatable, Color, Keyframe, PathGeometry, Scalar, ValueKind } from '../timeline/types.js';
import { colorTraits, pathGeometryTraits, scalarTraits } from '../timeline/values.js';
import { CanonicalTable } from './cache.js';
import {
  resolveCanonicalizerConfig,
  type CanonicalizerConfig,
  type CanonicalizerConfigInit,
} from './config.js';

export type CanonicalizerOptions = CanonicalizerConfigInit & {
  logger?: Logger;
};

export type CanonicalizerStats = {
  lookups: number;
  hits: number;
  misses: number;
  /** Misses whose keyframes were rewritten. */
  optimized: number;
  /** Path timelines whose segment counts were repaired. */
  reconciled: number;
  entries: Record<ValueKind, number>;
};

/**
 * Reduces timelines to canonical forms. Structurally equal inputs of one value
 * type get the same result object back for the lifetime of the instance, so
 * callers may detect sharing by identity. Create one per generation run.
 */
export class Canonicalizer {
  readonly config: CanonicalizerConfig;
  private readonly logger: Logger;
  private readonly colors: CanonicalTable<Color>;
  private readonly scalars: CanonicalTable<Scalar>;
  private readonly paths: CanonicalTable<PathGeometry>;
  private lookups = 0;
  private hits = 0;
  private optimizedCount = 0;
  private reconciledCount = 0;

  constructor(options: CanonicalizerOptions = {}) {
    const { logger, ...init } = options;
    this.config = resolveCanonicalizerConfig(init);
    this.logger = logger ?? createLogger('canonicalizer', this.config.logLevel);
    this.colors = new CanonicalTable(colorTraits, this.config.sequenceHash);
    this.scalars = new CanonicalTable(scalarTraits, this.config.sequenceHash);
    this.paths = new CanonicalTable(pathGeometryTraits, this.config.sequenceHash);
  }

  getOptimizedColor(value: Animatable<Color>): Animatable<Color> {
    return this.canonicalize(this.colors, value);
  }

  getOptimizedScalar(value: Animatable<Scalar>): Animatable<Scalar> {
    return this.canonicalize(this.scalars, value);
  }

  getOptimizedPathGeometry(value: Animatable<PathGeometry>): Animatable<PathGeometry> {
    assertWellFormed(value);
    this.lookups++;
    const cached = this.paths.lookup(value);
    if (cached) {
      this.hits++;
      return cached;
    }

    const optimized = this.optimize(this.paths, value);
    const reconciled = reconcileSegmentCounts(value, optimized, this.config.colinearityTolerance);
    if (reconciled === optimized) {
      const counts = distinctSegmentCounts(value);
      if (counts.length > 1) {
        this.logger.warn(
          `path timeline mixes segment counts ${counts.join(', ')}; keyframes will not interpolate`,
        );
      }
      return this.remember(this.paths, value, optimized);
    }

    this.reconciledCount++;
    this.logger.info(
      `collapsed retraced line over ${reconciled.keyframes.length} keyframes to one segment`,
    );
    // The one-segment form may expose further redundant keyframes.
    const repaired =
      this.paths.lookup(reconciled) ??
      this.remember(this.paths, reconciled, this.optimize(this.paths, reconciled));
    return this.remember(this.paths, value, repaired);
  }

  trimKeyframes<T>(
    keyframes: Iterable<Keyframe<T>>,
    startFrame: number,
    endFrame: number,
  ): Generator<Keyframe<T>, void, undefined> {
    return trimKeyframes(keyframes, startFrame, endFrame);
  }

  stats(): CanonicalizerStats {
    return {
      lookups: this.lookups,
      hits: this.hits,
      misses: this.lookups - this.hits,
      optimized: this.optimizedCount,
      reconciled: this.reconciledCount,
      entries: {
        color: this.colors.size,
        scalar: this.scalars.size,
        pathGeometry: this.paths.size,
      },
    };
  }

  private canonicalize<T>(table: CanonicalTable<T>, value: Animatable<T>): Animatable<T> {
    assertWellFormed(value);
    this.lookups++;
    const cached = table.lookup(value);
    if (cached) {
      this.hits++;
      return cached;
    }
    return this.remember(table, value, this.optimize(table, value));
  }

  /** Result of the keyframe optimizer alone; `value` itself when nothing changes. */
  private optimize<T>(table: CanonicalTable<T>, value: Animatable<T>): Animatable<T> {
    const { traits } = table;
    if (!isAnimated(value, traits)) {
      return value;
    }
    const keyframes = [...optimizeKeyframes(value.initialValue, value.keyframes, traits.equals)];
    if (keyframeSequenceEquals(keyframes, value.keyframes, traits)) {
      return value;
    }
    this.optimizedCount++;
    this.logger.debug(
      `${traits.kind} timeline reduced from ${value.keyframes.length} to ${keyframes.length} keyframes`,
    );
    return createAnimatable(value.initialValue, keyframes);
  }

  private remember<T>(table: CanonicalTable<T>, key: Animatable<T>, canonical: Animatable<T>): Animatable<T> {
    const stored = table.insert(key, canonical);
    if (stored !== key) {
      table.insert(stored, stored);
    }
    return stored;
  }
}
