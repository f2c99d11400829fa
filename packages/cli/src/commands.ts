// ============================================================================
// @fimsmith/cli — Commands
// ============================================================================
// Commands:
//   fimsmith eval    --input <f> --output <f> [--samples N] [--with-meta]
//   fimsmith mix     --inputs <f...> --fim-percent P [--output-dir d]
//                    [--out-ext .jsonl] [--mix-mode interleave|random-replay]
//   fimsmith inspect <f> [--encoding cl100k_base] [--json]
//
// Command functions return an exit code instead of exiting, so they can be
// driven in-process.
// ============================================================================

import {
  type EvalFileResult,
  FimsmithError,
  type InspectReport,
  type MixFileResult,
  type RunStats,
  STRATEGY_NAMES,
  type TokenizerEncoding,
  TypeScriptSyntaxProvider,
  inspectJsonl,
  isTokenizerEncoding,
  loadConfigFile,
  logger,
  mergeRunStats,
  parseEvalOptions,
  parseMixMode,
  parseMixOptions,
  runEvalFile,
  runMixFiles,
} from '@fimsmith/core';
import { ArgReader, UsageError, isPlainRecord } from './args.js';
import { type ColorEnv, type Palette, createPalette, formatPercent, padR, supportsColor } from './ui.js';

export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
  env: ColorEnv;
  isTTY: boolean;
}

export const processIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
  isTTY: process.stdout.isTTY === true,
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

interface CommandContext {
  args: ArgReader;
  io: CommandIO;
  ui: Palette;
  json: boolean;
}

// ---- Option Assembly ----

const NUMERIC_FLAGS: ReadonlyArray<[flag: string, key: string]> = [
  ['min-middle-chars', 'minMiddleChars'],
  ['max-middle-chars', 'maxMiddleChars'],
  ['seed', 'seed'],
  ['max-retries', 'maxRetriesPerRecord'],
];

/**
 * Config file values first, flags on top. The result is validated by the
 * caller's schema in one pass.
 */
export function collectSharedOptions(args: ArgReader): Record<string, unknown> {
  const configPath = args.getFlag('config');
  const input: Record<string, unknown> = configPath ? { ...loadConfigFile(configPath) } : {};

  for (const [flag, key] of NUMERIC_FLAGS) {
    const value = args.getNumber(flag);
    if (value !== undefined) input[key] = value;
  }

  const language = args.getFlag('language');
  if (language !== undefined) input.language = language;

  const weightOverrides: Record<string, number> = {};
  for (const name of STRATEGY_NAMES) {
    const value = args.getNumber(`p-${name}`);
    if (value !== undefined) weightOverrides[name] = value;
  }
  if (Object.keys(weightOverrides).length > 0) {
    const fromFile = isPlainRecord(input.weights) ? input.weights : {};
    input.weights = { ...fromFile, ...weightOverrides };
  }

  return input;
}

// ---- Reporting ----

function printRunStats(ctx: CommandContext, title: string, stats: RunStats): void {
  const { io, ui } = ctx;
  const row = (label: string, value: number | string): void =>
    io.out(`  ${padR(label, 18)}${ui.num(String(value))}`);

  io.out(`\n  ${ui.heading(title)}`);
  row('Records read:', stats.recordsSeen);
  row('Records loaded:', stats.recordsLoaded);
  const skipped = stats.skipped.noText + stats.skipped.malformedJson + stats.skipped.notAnObject;
  if (skipped > 0) {
    io.out(
      `  ${padR('Skipped:', 18)}${ui.warn(String(skipped))} ${ui.dim(
        `(no text ${stats.skipped.noText}, malformed ${stats.skipped.malformedJson}, not an object ${stats.skipped.notAnObject})`,
      )}`,
    );
  }
  row('Selected:', stats.selected);
  row('Converted:', `${stats.converted}/${stats.attempted}`);
  const failures = Object.entries(stats.failed).filter(([, n]) => n > 0);
  if (failures.length > 0) {
    io.out(`  ${padR('No span:', 18)}${ui.warn(failures.map(([r, n]) => `${r} ${n}`).join(', '))}`);
  }
  io.out(
    `  ${padR('By strategy:', 18)}${STRATEGY_NAMES.map((name) => `${name} ${stats.byStrategy[name]}`).join(', ')}`,
  );
  if (stats.originalsRetained > 0) row('Originals kept:', stats.originalsRetained);
  io.out(`  ${padR('Lines written:', 18)}${ui.pass(String(stats.linesWritten))}`);
}

function printInspectReport(ctx: CommandContext, report: InspectReport): void {
  const { io, ui } = ctx;
  io.out(`\n  ${ui.heading('Inspect')}: ${ui.accent(report.path)}`);
  io.out(`  ${padR('Lines:', 18)}${ui.num(String(report.lines))}`);
  io.out(
    `  ${padR('FIM lines:', 18)}${ui.num(String(report.fimLines))} ${ui.dim(`(${formatPercent(report.fimRatio)})`)}`,
  );
  io.out(`  ${padR('Plain lines:', 18)}${ui.num(String(report.plainLines))}`);
  if (report.malformedLines > 0) {
    io.out(`  ${padR('Malformed:', 18)}${ui.fail(String(report.malformedLines))}`);
  }
  if (report.brokenFimLines > 0) {
    io.out(`  ${padR('Broken FIM tags:', 18)}${ui.fail(String(report.brokenFimLines))}`);
  }
  if (report.middleLength) {
    const { min, max, mean } = report.middleLength;
    io.out(`  ${padR('Middle chars:', 18)}min ${min}, max ${max}, mean ${mean.toFixed(1)}`);
  }
  if (report.tokens) {
    io.out(
      `  ${padR('Tokens:', 18)}${ui.num(report.tokens.total.toLocaleString('en-US'))} ${ui.dim(
        `(${report.tokens.encoding}; fim ${report.tokens.fim}, plain ${report.tokens.plain})`,
      )}`,
    );
  }
}

// ============================================================================
// eval
// ============================================================================

function evalCommand(ctx: CommandContext): EvalFileResult {
  const { args } = ctx;
  const inputPath = args.getFlag('input');
  const outputPath = args.getFlag('output');
  if (!inputPath) throw new UsageError('missing --input');
  if (!outputPath) throw new UsageError('missing --output');

  const input = collectSharedOptions(args);
  const samples = args.getNumber('samples');
  if (samples !== undefined) input.samplesCap = samples;
  if (args.hasFlag('with-meta')) input.includeMeta = true;
  const options = parseEvalOptions(input);

  const result = runEvalFile(inputPath, outputPath, options, new TypeScriptSyntaxProvider());

  if (ctx.json) {
    ctx.io.out(JSON.stringify({ input: inputPath, output: outputPath, stats: result.stats }, null, 2));
  } else {
    printRunStats(ctx, `Eval: ${inputPath} -> ${outputPath}`, result.stats);
  }
  return result;
}

// ============================================================================
// mix
// ============================================================================

function mixCommand(ctx: CommandContext): MixFileResult[] {
  const { args } = ctx;
  const inputs = args.getList('inputs') ?? [];
  if (inputs.length === 0) throw new UsageError('missing --inputs');

  const input = collectSharedOptions(args);
  const fimPercent = args.getNumber('fim-percent');
  if (fimPercent !== undefined) input.fimPercent = fimPercent;
  const outputDir = args.getFlag('output-dir');
  if (outputDir !== undefined) input.outputDir = outputDir;
  const outExt = args.getFlag('out-ext');
  if (outExt !== undefined) input.outExt = outExt;
  const mode = args.getFlag('mix-mode') ?? input.mixMode;
  if (typeof mode === 'string') input.mixMode = parseMixMode(mode);
  const options = parseMixOptions(input);

  const results = runMixFiles(inputs, options, new TypeScriptSyntaxProvider());

  if (ctx.json) {
    ctx.io.out(
      JSON.stringify(
        results.map((r) => ({
          input: r.inputPath,
          output: r.outputPath,
          seed: r.seed,
          originals: r.originalCount,
          fim: r.fimCount,
          stats: r.stats,
        })),
        null,
        2,
      ),
    );
    return results;
  }

  for (const r of results) {
    printRunStats(ctx, `Mix: ${r.inputPath} -> ${r.outputPath}`, r.stats);
  }
  if (results.length > 1) {
    const total = results.map((r) => r.stats).reduce(mergeRunStats);
    printRunStats(ctx, `Mix total (${results.length} files)`, total);
  }
  return results;
}

// ============================================================================
// inspect
// ============================================================================

function inspectCommand(ctx: CommandContext): InspectReport {
  const { args } = ctx;
  const [filePath] = args.positionals();
  if (!filePath) throw new UsageError('missing input file');

  const encodingFlag = args.getFlag('encoding');
  let encoding: TokenizerEncoding | undefined;
  if (encodingFlag !== undefined) {
    if (!isTokenizerEncoding(encodingFlag)) {
      throw new UsageError(`unknown encoding "${encodingFlag}"`);
    }
    encoding = encodingFlag;
  }
  const report = inspectJsonl(filePath, { encoding });

  if (ctx.json) {
    ctx.io.out(JSON.stringify(report, null, 2));
  } else {
    printInspectReport(ctx, report);
  }
  return report;
}

// ============================================================================
// Dispatch
// ============================================================================

export function usageText(): string {
  return `
  fimsmith: Fill-In-the-Middle dataset construction

  Usage:
    fimsmith eval     --input <file.jsonl> --output <file.jsonl> [--samples 2000] [--with-meta]
                      Build an FIM-only evaluation set
    fimsmith mix      --inputs <a.jsonl> [b.jsonl ...] --fim-percent <0-100>
                      [--output-dir <dir>] [--out-ext .jsonl] [--mix-mode interleave|random-replay]
                      Convert a share of each file to FIM and blend it with the originals
    fimsmith inspect  <file.jsonl> [--encoding cl100k_base] [--json]
                      Summarize an output file

  Span Options (eval, mix):
    --min-middle-chars N   Shortest middle (default 80)
    --max-middle-chars N   Longest middle (default 1200)
    --p-function W         Strategy weights (defaults 0.4 / 0.3 / 0.2 / 0.1)
    --p-line W
    --p-identifier W
    --p-token W
    --max-retries N        Span attempts per text (default 12)
    --seed N               Random seed (default 42)
    --language L           Language hint for the parser (default typescript)
    --config <file.json>   Option defaults; flags win

  Display Options:
    --json                 Machine-readable output
    --no-color             Disable colored output
    --verbose              Debug logging on stderr
    --quiet                Warnings only on stderr

  Environment Variables:
    FIMSMITH_DEBUG=1       Debug logging on stderr (=warn for warnings only)
    NO_COLOR=1             Disable colored output
  `;
}

/**
 * Run one CLI invocation. `argv` excludes the node and script paths.
 */
export function runCommand(argv: readonly string[], io: CommandIO = processIO): number {
  const [command, ...rest] = argv;
  const args = new ArgReader(rest);
  const ui = createPalette(supportsColor((name) => args.hasFlag(name), io.env, io.isTTY));
  const ctx: CommandContext = { args, io, ui, json: args.hasFlag('json') };

  if (args.hasFlag('help')) {
    io.out(usageText());
    return EXIT_OK;
  }

  const previousLevel = logger.getLogLevel();
  if (args.hasFlag('verbose')) logger.setLogLevel('debug');
  else if (args.hasFlag('quiet')) logger.setLogLevel('warn');

  try {
    switch (command) {
      case 'eval':
        evalCommand(ctx);
        return EXIT_OK;
      case 'mix':
        mixCommand(ctx);
        return EXIT_OK;
      case 'inspect':
        inspectCommand(ctx);
        return EXIT_OK;
      case undefined:
      case 'help':
      case '--help':
        io.out(usageText());
        return EXIT_OK;
      default:
        io.err(`Error: unknown command "${command}"`);
        io.err(usageText());
        return EXIT_USAGE;
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`Error: ${error.message}`);
      io.err(`Run "fimsmith help" for usage.`);
      return EXIT_USAGE;
    }
    if (error instanceof FimsmithError) {
      io.err(`Error: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  } finally {
    logger.setLogLevel(previousLevel);
  }
}
