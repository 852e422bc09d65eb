import type { Animatable, Color, PathGeometry, Scalar } from '../timeline/types.js';

export interface TimelineEntryBase {
  readonly id: string;
  /**
   * Slot of the property this timeline drives. Canonical timelines are shared
   * between entries, so the index on `animatable` need not be this entry's.
   */
  readonly propertyIndex?: number;
}

export interface ColorTimelineEntry extends TimelineEntryBase {
  readonly kind: 'color';
  readonly animatable: Animatable<Color>;
}

export interface ScalarTimelineEntry extends TimelineEntryBase {
  readonly kind: 'scalar';
  readonly animatable: Animatable<Scalar>;
}

export interface PathGeometryTimelineEntry extends TimelineEntryBase {
  readonly kind: 'pathGeometry';
  readonly animatable: Animatable<PathGeometry>;
}

export type TimelineEntry = ColorTimelineEntry | ScalarTimelineEntry | PathGeometryTimelineEntry;

export interface AnimationDocument {
  readonly version: 1;
  readonly name?: string;
  readonly timelines: TimelineEntry[];
}

export interface DocumentValidationIssue {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: 'error' | 'warning';
}

export interface DocumentValidationResult {
  readonly document: AnimationDocument;
  readonly issues: DocumentValidationIssue[];
}
