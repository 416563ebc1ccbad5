#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { basename, join, resolve } from 'node:path';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { stringify } from 'csv-stringify/sync';
import { analyze, normalize } from './index.js';
import { formatDependency, selectConfirmed } from './core/analysis/dependency.js';
import type { FunctionalDependency } from './core/analysis/dependency.js';
import { detectFunctionalDependencies } from './core/analysis/inferFds.js';
import { readCsvFile } from './core/dataset/load.js';
import type { Dataset } from './core/dataset/types.js';
import type { DecompositionPlan, TargetForm } from './core/decompose/plan.js';
import { InternalInvariantViolationError, NormalizerError } from './core/errors.js';
import { generateDependencyFile } from './core/persist/generate.js';
import { parseDependencyFile, parsePlanFile } from './core/persist/parse.js';
import type { OutputFormat } from './core/report/reportTypes.js';
import { toJson } from './core/report/toJson.js';
import { toMermaidErd } from './core/report/toMermaidErd.js';
import { toReadme } from './core/report/toReadme.js';
import { toSqlDdl } from './core/report/toSqlDdl.js';
import { toText } from './core/report/toText.js';
import type { TransformResult } from './core/transform/applyPlan.js';
import { applyPlan } from './core/transform/applyPlan.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_DATA_ERROR = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_INPUT_ERROR = 3;
const EXIT_INTERNAL_ERROR = 4;

const OPTIONS = {
  out: { type: 'string' },
  'out-dir': { type: 'string' },
  format: { type: 'string' },
  pretty: { type: 'boolean' },
  'max-arity': { type: 'string' },
  'sample-threshold': { type: 'string' },
  seed: { type: 'string' },
  'dependencies-out': { type: 'string' },
  'no-timestamp': { type: 'boolean' },
  dependencies: { type: 'string' },
  target: { type: 'string' },
  'root-name': { type: 'string' },
  plan: { type: 'string' },
  strict: { type: 'boolean' },
  quiet: { type: 'boolean' },
  help: { type: 'boolean' },
} as const;

function printUsage(): void {
  process.stdout.write(
    `Usage: schema-normalizer <command> <csv> [options]

Commands:
  analyze <csv>     Detect functional dependencies and assess the normal form
  normalize <csv>   Decompose the dataset into normalized tables
  transform <csv>   Re-apply a saved plan to new data

Analyze options:
  --format <fmt>            Output format: json | text (default: json)
  --out <path>              Write the report to a file instead of stdout
  --pretty                  Pretty-print JSON output
  --max-arity <n>           Largest determinant size to try (default: 2)
  --sample-threshold <n>    Sample datasets with more rows than this (default: 10000)
  --seed <n>                Sampling seed (default: 42)
  --dependencies-out <path> Write an editable dependency file
  --no-timestamp            Omit timestamp from output

Normalize options:
  --out-dir <dir>           Directory for plan.json, schema.sql, erd.md and tables/
  --dependencies <path>     Dependency file (default: auto-confirmed detections)
  --target <form>           3NF | BCNF (default: 3NF)
  --root-name <name>        Name for the relation keyed like the whole dataset

Transform options:
  --out-dir <dir>           Directory for tables/
  --plan <path>             Plan file written by normalize
  --strict                  Fail instead of skipping optional relations

General:
  --quiet                   Suppress progress messages
  --help                    Show this help message
`,
  );
}

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

type CommandLine = ReturnType<typeof parseCommandLine>;

/** Thrown for input files that cannot be read or validated. */
class InputFileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InputFileError';
  }
}

/** Thrown for bad arguments. */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export async function main(argv?: string[]): Promise<number> {
  let args: CommandLine;

  try {
    args = parseCommandLine(argv ?? process.argv.slice(2));
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values.help === true) {
    printUsage();
    return EXIT_OK;
  }

  const quiet = args.values.quiet === true;
  const log = (message: string): void => {
    if (!quiet) {
      process.stderr.write(`[schema-normalizer] ${message}\n`);
    }
  };

  const [command, csvArg, ...rest] = args.positionals;
  if (command === undefined) {
    process.stderr.write('Error: Missing command. Use --help for usage.\n');
    return EXIT_CLI_ERROR;
  }

  try {
    if (rest.length > 0) {
      throw new UsageError(`Unexpected argument "${rest.join(' ')}"`);
    }
    if (csvArg === undefined) {
      throw new UsageError(`Missing <csv> argument for "${command}"`);
    }
    switch (command) {
      case 'analyze':
        runAnalyze(args, csvArg, log);
        break;
      case 'normalize':
        runNormalize(args, csvArg, log);
        break;
      case 'transform':
        runTransform(args, csvArg, log);
        break;
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
    return EXIT_OK;
  } catch (error: unknown) {
    return reportError(error);
  }
}

function runAnalyze(args: CommandLine, csvArg: string, log: (message: string) => void): void {
  const format = args.values.format ?? 'json';
  if (format !== 'json' && format !== 'text') {
    throw new UsageError(`Invalid format "${format}". Must be "json" or "text"`);
  }
  const outputFormat: OutputFormat = format;

  const maxArity = positiveInteger(args.values['max-arity'], '--max-arity');
  const sampleThreshold = positiveInteger(args.values['sample-threshold'], '--sample-threshold');
  const seed = nonNegativeInteger(args.values.seed, '--seed');

  const csvPath = requireFile(csvArg, 'CSV file');
  const dataset = loadCsv(csvPath);
  log(`Loaded ${String(dataset.rows.length)} rows, ${String(dataset.columns.length)} columns from ${csvPath}`);

  const report = analyze(dataset, {
    source: csvPath,
    noTimestamp: args.values['no-timestamp'] === true,
    maxArity,
    sampleThreshold,
    seed,
  });
  if (report.metadata.sampled) {
    log(`Detection ran on a sample of ${String(report.metadata.rowsScanned)} rows; reported confidences are full-data values`);
  }
  log(`Found ${String(report.dependencies.length)} dependencies, ${String(report.questions.length)} need review`);

  const output = outputFormat === 'json' ? toJson(report, args.values.pretty === true) : toText(report);
  writeOutput(output, args.values.out);

  const dependenciesOut = args.values['dependencies-out'];
  if (dependenciesOut !== undefined) {
    writeFileSync(resolve(dependenciesOut), `${toJson(generateDependencyFile(report.dependencies), true)}\n`, 'utf-8');
    log(`Wrote dependency file ${resolve(dependenciesOut)}`);
  }
}

function runNormalize(args: CommandLine, csvArg: string, log: (message: string) => void): void {
  const outDir = requireOption(args.values['out-dir'], '--out-dir');
  const target = parseTarget(args.values.target);
  const csvPath = requireFile(csvArg, 'CSV file');
  const dependenciesArg = args.values.dependencies;
  const dependenciesPath = dependenciesArg !== undefined ? requireFile(dependenciesArg, 'Dependency file') : undefined;

  const dataset = loadCsv(csvPath);
  let dependencies: readonly FunctionalDependency[];
  if (dependenciesPath !== undefined) {
    dependencies = readInput(() => parseDependencyFile(dependenciesPath), dependenciesPath);
  } else {
    dependencies = selectConfirmed(detectFunctionalDependencies(dataset).dependencies);
    log(`No --dependencies given; using ${String(dependencies.length)} auto-confirmed dependencies`);
  }

  const result = normalize(dataset, dependencies, { target, rootName: args.values['root-name'] });
  const { plan } = result;

  const dir = resolve(outDir);
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, 'plan.json'), `${toJson(plan, true)}\n`, 'utf-8');
  writeFileSync(join(dir, 'schema.sql'), toSqlDdl(plan, dataset), 'utf-8');
  writeFileSync(join(dir, 'erd.md'), `\`\`\`mermaid\n${toMermaidErd(plan, dataset.columns)}\`\`\`\n`, 'utf-8');
  writeFileSync(join(dir, 'README.md'), toReadme(plan, basename(csvPath)), 'utf-8');
  writeTables(dir, result.transform);

  log(`${plan.target} plan with ${String(plan.relations.length)} relations written to ${dir}`);
  for (const fd of plan.lostDependencies) {
    log(`warning: ${formatDependency(fd)} is not enforceable by any single relation`);
  }
  reportTransform(result.transform, log);
}

function runTransform(args: CommandLine, csvArg: string, log: (message: string) => void): void {
  const outDir = requireOption(args.values['out-dir'], '--out-dir');
  const planPath = requireFile(requireOption(args.values.plan, '--plan'), 'Plan file');
  const csvPath = requireFile(csvArg, 'CSV file');

  const plan: DecompositionPlan = readInput(() => parsePlanFile(planPath), planPath);
  const dataset = loadCsv(csvPath);
  const result = applyPlan(plan, dataset, { strict: args.values.strict === true });

  const dir = resolve(outDir);
  mkdirSync(dir, { recursive: true });
  writeTables(dir, result);

  log(`Wrote ${String(result.tables.size)} of ${String(plan.relations.length)} relations to ${dir}`);
  reportTransform(result, log);
}

function reportTransform(result: TransformResult, log: (message: string) => void): void {
  for (const warning of result.warnings) {
    log(`warning: ${warning}`);
  }
  for (const conflict of result.keyConflicts) {
    log(
      `warning: ${conflict.relation} has ${String(conflict.rowCount)} different rows for key ${JSON.stringify(conflict.value)}`,
    );
  }
}

function writeTables(dir: string, result: TransformResult): void {
  const tablesDir = join(dir, 'tables');
  mkdirSync(tablesDir, { recursive: true });
  for (const [name, table] of result.tables) {
    writeFileSync(join(tablesDir, `${name}.csv`), toCsv(table), 'utf-8');
  }
}

/** Serialize a table as CSV with a header row; nulls become empty cells. */
export function toCsv(table: Dataset): string {
  const columns = table.columns.map((c) => c.name);
  return stringify(
    table.rows.map((row) => columns.map((c) => row[c] ?? null)),
    {
      header: true,
      columns,
      cast: { boolean: (value) => String(value) },
    },
  );
}

function loadCsv(csvPath: string): Dataset {
  return readInput(() => readCsvFile(csvPath), csvPath);
}

function readInput<T>(read: () => T, filePath: string): T {
  try {
    return read();
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InputFileError(`Failed to read ${filePath}. ${detail}`, { cause: error });
  }
}

function writeOutput(output: string, outPath: string | undefined): void {
  if (outPath !== undefined) {
    writeFileSync(resolve(outPath), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }
}

function requireFile(filePath: string, label: string): string {
  const resolved = resolve(filePath);
  if (!existsSync(resolved)) {
    throw new InputFileError(`${label} not found: ${resolved}`);
  }
  return resolved;
}

function requireOption(value: string | undefined, flag: string): string {
  if (value === undefined) {
    throw new UsageError(`Missing required option ${flag}`);
  }
  return value;
}

function parseTarget(value: string | undefined): TargetForm {
  const target = (value ?? '3NF').toUpperCase();
  if (target !== '3NF' && target !== 'BCNF') {
    throw new UsageError(`Invalid --target "${value ?? ''}". Must be "3NF" or "BCNF"`);
  }
  return target;
}

function positiveInteger(value: string | undefined, flag: string): number | undefined {
  const parsed = nonNegativeInteger(value, flag);
  if (parsed === 0) {
    throw new UsageError(`Invalid ${flag} "0". Must be a positive integer`);
  }
  return parsed;
}

function nonNegativeInteger(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`Invalid ${flag} "${value}". Must be a non-negative integer`);
  }
  return Number(value);
}

function reportError(error: unknown): number {
  const detail = error instanceof Error ? error.message : String(error);
  if (error instanceof UsageError) {
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }
  if (error instanceof InputFileError) {
    process.stderr.write(`Error: ${detail}\n`);
    return EXIT_INPUT_ERROR;
  }
  if (error instanceof InternalInvariantViolationError) {
    process.stderr.write(`Internal error: ${detail}\n`);
    return EXIT_INTERNAL_ERROR;
  }
  if (error instanceof NormalizerError) {
    process.stderr.write(`Error [${error.kind}]: ${detail}\n`);
    return EXIT_DATA_ERROR;
  }
  process.stderr.write(`Internal error: ${detail}\n`);
  return EXIT_INTERNAL_ERROR;
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch(() => {
      process.exitCode = EXIT_INTERNAL_ERROR;
    });
}
