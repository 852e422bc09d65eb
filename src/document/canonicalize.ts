import type { Canonicalizer } from '../canonicalizer/canonicalizer.js';
import { distinctSegmentCounts } from '../geometry/reconcile.js';
import {
  encodeColor,
  encodePathGeometry,
  encodeScalar,
  fingerprintAnimatable,
} from '../serialization/canonicalJson.js';
import { findFirstDivergence } from '../timeline/evaluate.js';
import { colorTraits, pathGeometryTraits, scalarTraits } from '../timeline/values.js';
import type { AnimationDocument, TimelineEntry } from './types.js';

export type TimelineReport = {
  readonly id: string;
  readonly kind: TimelineEntry['kind'];
  readonly keyframesBefore: number;
  readonly keyframesAfter: number;
  readonly reconciled: boolean;
  readonly fingerprint: string;
  /** Id of the first timeline that canonicalized to the same object, if another did. */
  readonly sharedWith: string | null;
  /** First sampled frame where output differs from input; checked only when verifying. */
  readonly divergence: number | null;
};

export type DocumentCanonicalization = {
  readonly document: AnimationDocument;
  readonly reports: TimelineReport[];
  readonly distinctCanonical: number;
};

export type CanonicalizeDocumentOptions = {
  verify?: boolean;
};

type Canonicalized = {
  entry: TimelineEntry;
  handle: object;
  fingerprint: string;
  reconciled: boolean;
  divergence: number | null;
};

const canonicalizeEntry = (
  entry: TimelineEntry,
  canonicalizer: Canonicalizer,
  verify: boolean,
): Canonicalized => {
  switch (entry.kind) {
    case 'color': {
      const animatable = canonicalizer.getOptimizedColor(entry.animatable);
      return {
        entry: { ...entry, animatable },
        handle: animatable,
        fingerprint: fingerprintAnimatable(animatable, encodeColor),
        reconciled: false,
        divergence: verify ? findFirstDivergence(entry.animatable, animatable, colorTraits) : null,
      };
    }
    case 'scalar': {
      const animatable = canonicalizer.getOptimizedScalar(entry.animatable);
      return {
        entry: { ...entry, animatable },
        handle: animatable,
        fingerprint: fingerprintAnimatable(animatable, encodeScalar),
        reconciled: false,
        divergence: verify ? findFirstDivergence(entry.animatable, animatable, scalarTraits) : null,
      };
    }
    case 'pathGeometry': {
      const animatable = canonicalizer.getOptimizedPathGeometry(entry.animatable);
      const reconciled =
        distinctSegmentCounts(entry.animatable).length === 2 &&
        distinctSegmentCounts(animatable).length === 1;
      return {
        entry: { ...entry, animatable },
        handle: animatable,
        fingerprint: fingerprintAnimatable(animatable, encodePathGeometry),
        reconciled,
        // A repaired geometry draws fewer segments by construction, so only
        // unrepaired paths are compared.
        divergence:
          verify && !reconciled
            ? findFirstDivergence(entry.animatable, animatable, pathGeometryTraits)
            : null,
      };
    }
  }
};

/** Canonicalizes every timeline of a document through one canonicalizer. */
export const canonicalizeDocument = (
  document: AnimationDocument,
  canonicalizer: Canonicalizer,
  options: CanonicalizeDocumentOptions = {},
): DocumentCanonicalization => {
  const owners = new Map<object, string>();
  const timelines: TimelineEntry[] = [];
  const reports: TimelineReport[] = [];

  for (const source of document.timelines) {
    const result = canonicalizeEntry(source, canonicalizer, options.verify ?? false);
    const owner = owners.get(result.handle);
    if (owner === undefined) {
      owners.set(result.handle, source.id);
    }
    timelines.push(result.entry);
    reports.push({
      id: source.id,
      kind: source.kind,
      keyframesBefore: source.animatable.keyframes.length,
      keyframesAfter: result.entry.animatable.keyframes.length,
      reconciled: result.reconciled,
      fingerprint: result.fingerprint,
      sharedWith: owner ?? null,
      divergence: result.divergence,
    });
  }

  return {
    document: { ...document, timelines },
    reports,
    distinctCanonical: owners.size,
  };
};
