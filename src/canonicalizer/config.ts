import { isLogLevel, type LogLevel } from '../logging/logger.js';
import type { SequenceHashMode } from '../timeline/hash.js';

export type CanonicalizerConfig = {
  /** Combiner for keyframe-sequence hashes. `symmetric` matches legacy cache keys. */
  sequenceHash: SequenceHashMode;
  /** Largest cross product still treated as colinear when classifying path segments. */
  colinearityTolerance: number;
  logLevel: LogLevel;
};

export type CanonicalizerConfigInit = Partial<CanonicalizerConfig>;

const DEFAULT_CONFIG: CanonicalizerConfig = {
  sequenceHash: 'ordered',
  colinearityTolerance: 0,
  logLevel: 'warn',
};

export const getDefaultCanonicalizerConfig = (): CanonicalizerConfig => ({ ...DEFAULT_CONFIG });

export class CanonicalizerConfigError extends Error {
  readonly field: keyof CanonicalizerConfig;

  constructor(field: keyof CanonicalizerConfig, message: string) {
    super(`Invalid canonicalizer ${field}: ${message}`);
    this.name = 'CanonicalizerConfigError';
    this.field = field;
  }
}

export const resolveCanonicalizerConfig = (
  init: CanonicalizerConfigInit = {},
): CanonicalizerConfig => {
  const config = { ...DEFAULT_CONFIG, ...init };
  if (config.sequenceHash !== 'ordered' && config.sequenceHash !== 'symmetric') {
    throw new CanonicalizerConfigError(
      'sequenceHash',
      `expected "ordered" or "symmetric", received ${JSON.stringify(config.sequenceHash)}`,
    );
  }
  if (!Number.isFinite(config.colinearityTolerance) || config.colinearityTolerance < 0) {
    throw new CanonicalizerConfigError(
      'colinearityTolerance',
      `expected a finite non-negative number, received ${config.colinearityTolerance}`,
    );
  }
  if (!isLogLevel(config.logLevel)) {
    throw new CanonicalizerConfigError(
      'logLevel',
      `unknown level ${JSON.stringify(config.logLevel)}`,
    );
  }
  return config;
};
