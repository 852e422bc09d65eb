export * from './timeline/index.js';
export * from './geometry/bezier.js';
export * from './geometry/reconcile.js';
export { Canonicalizer, type CanonicalizerOptions, type CanonicalizerStats } from './canonicalizer/canonicalizer.js';
export { CanonicalTable } from './canonicalizer/cache.js';
export {
  CanonicalizerConfigError,
  getDefaultCanonicalizerConfig,
  resolveCanonicalizerConfig,
  type CanonicalizerConfig,
  type CanonicalizerConfigInit,
} from './canonicalizer/config.js';
export * from './serialization/canonicalJson.js';
export * from './document/types.js';
export { validateDocument, DocumentValidationError } from './document/schema.js';
export { loadDocumentFromJson, loadDocumentFromFile, type DocumentLoadResult } from './document/loader.js';
export { writeDocument, type WriteDocumentOptions } from './document/serializer.js';
export * from './document/canonicalize.js';
export { InvariantViolationError } from './errors.js';
export { createLogger, type Logger, type LogLevel, type LogSink } from './logging/logger.js';
