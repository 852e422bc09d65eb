import {
  encodeAnimatable,
  encodeColor,
  encodePathGeometry,
  encodeScalar,
  type JsonValue,
} from '../serialization/canonicalJson.js';
import type { AnimationDocument, TimelineEntry } from './types.js';

const encodeEntry = (entry: TimelineEntry): { [key: string]: JsonValue } => {
  const head: { [key: string]: JsonValue } = { id: entry.id, kind: entry.kind };
  if (entry.propertyIndex !== undefined) {
    head.propertyIndex = entry.propertyIndex;
  }
  switch (entry.kind) {
    case 'color':
      return { ...head, ...encodeAnimatable(entry.animatable, encodeColor) };
    case 'scalar':
      return { ...head, ...encodeAnimatable(entry.animatable, encodeScalar) };
    case 'pathGeometry':
      return { ...head, ...encodeAnimatable(entry.animatable, encodePathGeometry) };
  }
};

export type WriteDocumentOptions = {
  indent?: number;
};

/** Writes a document in the format `validateDocument` reads. */
export const writeDocument = (document: AnimationDocument, options: WriteDocumentOptions = {}): string => {
  const payload: { [key: string]: JsonValue } = { version: document.version };
  if (document.name !== undefined) {
    payload.name = document.name;
  }
  payload.timelines = document.timelines.map(encodeEntry);
  return JSON.stringify(payload, null, options.indent ?? 2);
};
