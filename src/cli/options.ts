import type { CanonicalizerConfigInit } from '../canonicalizer/config.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type OptimizeOptions = {
  input: string;
  output?: string;
  json: boolean;
  verbose: boolean;
  verify: boolean;
  config: CanonicalizerConfigInit;
};

export type TrimOptions = {
  input: string;
  start: number;
  end: number;
  id?: string;
  json: boolean;
};

const takeValue = (args: readonly string[], index: number, flag: string): string => {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value.`);
  }
  return value;
};

const parseNumberFlag = (raw: string, flag: string): number => {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new UsageError(`${flag} expects a number, received "${raw}".`);
  }
  return value;
};

/** `KFCANON_LOG_LEVEL` sets the level; `--verbose` raises it to info. */
export const resolveLogLevel = (env: Record<string, string | undefined>, verbose: boolean): LogLevel => {
  const fromEnv = env.KFCANON_LOG_LEVEL;
  if (fromEnv === undefined) {
    return verbose ? 'info' : 'warn';
  }
  if (!isLogLevel(fromEnv)) {
    throw new UsageError('KFCANON_LOG_LEVEL must be one of silent, error, warn, info, debug.');
  }
  return fromEnv;
};

export const parseOptimizeArgs = (
  args: readonly string[],
  env: Record<string, string | undefined> = {},
): OptimizeOptions => {
  let input: string | undefined;
  let output: string | undefined;
  let json = false;
  let verbose = false;
  let verify = false;
  const config: CanonicalizerConfigInit = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--verbose':
        verbose = true;
        break;
      case '--verify':
        verify = true;
        break;
      case '--output':
        output = takeValue(args, i++, arg);
        break;
      case '--hash': {
        const mode = takeValue(args, i++, arg);
        if (mode !== 'ordered' && mode !== 'symmetric') {
          throw new UsageError(`--hash expects "ordered" or "symmetric", received "${mode}".`);
        }
        config.sequenceHash = mode;
        break;
      }
      case '--tolerance': {
        const tolerance = parseNumberFlag(takeValue(args, i++, arg), arg);
        if (tolerance < 0) {
          throw new UsageError('--tolerance must not be negative.');
        }
        config.colinearityTolerance = tolerance;
        break;
      }
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option "${arg}".`);
        }
        if (input !== undefined) {
          throw new UsageError(`Unexpected argument "${arg}".`);
        }
        input = arg;
    }
  }

  if (input === undefined) {
    throw new UsageError('optimize requires a document path.');
  }
  config.logLevel = resolveLogLevel(env, verbose);
  return { input, output, json, verbose, verify, config };
};

export const parseTrimArgs = (args: readonly string[]): TrimOptions => {
  let input: string | undefined;
  let start: number | undefined;
  let end: number | undefined;
  let id: string | undefined;
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--start':
        start = parseNumberFlag(takeValue(args, i++, arg), arg);
        break;
      case '--end':
        end = parseNumberFlag(takeValue(args, i++, arg), arg);
        break;
      case '--id':
        id = takeValue(args, i++, arg);
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option "${arg}".`);
        }
        if (input !== undefined) {
          throw new UsageError(`Unexpected argument "${arg}".`);
        }
        input = arg;
    }
  }

  if (input === undefined) {
    throw new UsageError('trim requires a document path.');
  }
  if (start === undefined || end === undefined) {
    throw new UsageError('trim requires --start and --end.');
  }
  if (end < start) {
    throw new UsageError('--end must not be before --start.');
  }
  return { input, start, end, id, json };
};
