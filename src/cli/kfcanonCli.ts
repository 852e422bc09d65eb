#!/usr/bin/env node
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';

import { Canonicalizer } from '../canonicalizer/canonicalizer.js';
import { CanonicalizerConfigError } from '../canonicalizer/config.js';
import { canonicalizeDocument } from '../document/canonicalize.js';
import { loadDocumentFromFile, type DocumentLoadResult } from '../document/loader.js';
import { writeDocument } from '../document/serializer.js';
import type { AnimationDocument, TimelineEntry } from '../document/types.js';
import { InvariantViolationError } from '../errors.js';
import { trimKeyframes } from '../timeline/trim.js';
import { parseOptimizeArgs, parseTrimArgs, UsageError } from './options.js';
import { diffKeyframes, formatKeyframeChange } from './utils/keyframeDiff.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const printMainUsage = () => {
  console.log(`kfcanon – keyframe canonicalizer for vector animation timelines

Commands:
  optimize <document.json> [--json] [--output <path>] [--hash ordered|symmetric] [--tolerance <n>] [--verify] [--verbose]
  trim <document.json> --start <frame> --end <frame> [--id <timeline>] [--json]

Run "kfcanon <command> --help" to learn more about a command.`);
};

const printOptimizeUsage = () => {
  console.log(`kfcanon optimize

Removes redundant keyframes from every timeline of a document, shares structurally
equal timelines and repairs retraced line paths.

Required:
  <document.json>        Animation document to canonicalize

Optional:
  --output <path>        Write the canonical document to this path
  --hash <mode>          Keyframe sequence hash: "ordered" (default) or "symmetric"
  --tolerance <n>        Colinearity tolerance for path segment checks (default 0)
  --verify               Sample input and output and report any frame that differs
  --verbose              List dropped keyframes and rewritten easings
  --json                 Emit the report as JSON

Environment:
  KFCANON_LOG_LEVEL      silent | error | warn | info | debug
`);
};

const printTrimUsage = () => {
  console.log(`kfcanon trim

Prints the keyframes each timeline needs to play a frame window.

Required:
  <document.json>        Animation document
  --start <frame>        First frame of the window
  --end <frame>          Last frame of the window

Optional:
  --id <timeline>        Only trim this timeline
  --json                 Emit the result as JSON
`);
};

const loadOrExit = async (input: string, json: boolean): Promise<AnimationDocument> => {
  const result: DocumentLoadResult = await loadDocumentFromFile(resolve(process.cwd(), input));
  if (result.kind === 'success') {
    result.issues.forEach((issue) => {
      console.warn(`⚠ ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
    });
    return result.document;
  }
  if (json) {
    console.log(JSON.stringify({ status: 'error', message: result.message, issues: result.issues }, null, 2));
  } else {
    console.error(`✖ Document invalid: ${input}`);
    console.error(`  ${result.message}`);
    result.issues?.forEach((issue) => {
      console.error(`   • ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
    });
  }
  return exitWithError(`Could not load ${input}.`);
};

const handleOptimizeCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printOptimizeUsage();
    process.exit(0);
  }
  const options = parseOptimizeArgs(args, process.env);
  const document = await loadOrExit(options.input, options.json);
  const canonicalizer = new Canonicalizer(options.config);
  const result = canonicalizeDocument(document, canonicalizer, { verify: options.verify });
  const stats = canonicalizer.stats();

  if (options.output) {
    await writeFile(resolve(process.cwd(), options.output), `${writeDocument(result.document)}\n`, 'utf8');
  }

  const diverged = result.reports.filter((report) => report.divergence !== null);

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          status: diverged.length === 0 ? 'ok' : 'diverged',
          timelines: result.reports,
          distinctCanonical: result.distinctCanonical,
          stats,
        },
        null,
        2,
      ),
    );
  } else {
    result.reports.forEach((report, index) => {
      const notes = [
        report.reconciled ? 'segments repaired' : null,
        report.sharedWith !== null ? `shares ${report.sharedWith}` : null,
      ].filter((note): note is string => note !== null);
      console.log(
        `${report.id} (${report.kind}): ${report.keyframesBefore} → ${report.keyframesAfter} keyframes` +
          `${notes.length > 0 ? ` [${notes.join(', ')}]` : ''}  ${report.fingerprint.slice(0, 16)}`,
      );
      if (options.verbose) {
        const before: TimelineEntry = document.timelines[index];
        const after: TimelineEntry = result.document.timelines[index];
        diffKeyframes(before.animatable.keyframes, after.animatable.keyframes)
          .map(formatKeyframeChange)
          .forEach((line) => console.log(line));
      }
    });
    console.log(
      `${result.reports.length} timelines → ${result.distinctCanonical} canonical ` +
        `(${stats.hits} cache hits, ${stats.optimized} optimized, ${stats.reconciled} repaired)`,
    );
    diverged.forEach((report) => {
      console.error(`✖ ${report.id} differs from its input at frame ${report.divergence}`);
    });
    if (options.output) {
      console.log(`Wrote ${options.output}`);
    }
  }

  if (diverged.length > 0) {
    process.exitCode = 1;
  }
};

const handleTrimCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printTrimUsage();
    process.exit(0);
  }
  const options = parseTrimArgs(args);
  const document = await loadOrExit(options.input, options.json);
  const timelines = options.id
    ? document.timelines.filter((timeline) => timeline.id === options.id)
    : document.timelines;
  if (options.id && timelines.length === 0) {
    exitWithError(`No timeline with id "${options.id}".`);
  }

  const trimmed = timelines.map((timeline) => ({
    id: timeline.id,
    frames: [
      ...trimKeyframes<unknown>(timeline.animatable.keyframes, options.start, options.end),
    ].map((keyframe) => keyframe.frame),
  }));

  if (options.json) {
    console.log(
      JSON.stringify({ status: 'ok', start: options.start, end: options.end, timelines: trimmed }, null, 2),
    );
    return;
  }
  trimmed.forEach((entry) => {
    console.log(`${entry.id}: ${entry.frames.length > 0 ? entry.frames.join(', ') : '(none)'}`);
  });
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'optimize':
      await handleOptimizeCommand(rest);
      break;
    case 'trim':
      await handleTrimCommand(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error) => {
  if (error instanceof UsageError || error instanceof CanonicalizerConfigError) {
    exitWithError(error.message);
  }
  if (error instanceof InvariantViolationError) {
    exitWithError(`Internal invariant violated (${error.invariant}): ${error.message}`);
  }
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
