#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { fileURLToPath } from 'node:url';
import fs from 'node:fs/promises';
import path from 'node:path';

import { ReportConfigError, loadReportConfig } from './config.js';
import { loadMemorySeries, normalizeExtension, renderMemoryTable } from './memory/series.js';
import {
  ReportError,
  SKIP_REASONS,
  aggregateMeasurements,
  collectMeasurements,
  renderReport,
  tallySkipped,
  unrenderedRanges
} from './report/index.js';

async function writeOutput(args: { out?: string | unknown }, content: string): Promise<void> {
  if (args.out) {
    await fs.writeFile(String(args.out), content, 'utf8');
    return;
  }
  process.stdout.write(content);
}

function reportKnownError(err: unknown): boolean {
  if (err instanceof ReportConfigError) {
    console.error(`${err.message}${err.details?.error ? `: ${String(err.details.error)}` : ''}`);
    process.exitCode = 2;
    return true;
  }
  if (err instanceof ReportError && err.code === 'SERIES_PARSE_ERROR') {
    console.error(err.message);
    process.exitCode = 1;
    return true;
  }
  return false;
}

export async function main(argv = process.argv): Promise<number> {
  // `process.exitCode` persists across multiple `main()` calls in the same process (tests).
  process.exitCode = 0;

  const parser = yargs(hideBin(argv))
    .scriptName('bench-tables')
    .strict()
    .help()
    .option('config', {
      type: 'string',
      describe: 'Path to report config YAML (default: ./bench-tables.yaml when present)'
    })
    .option('out', {
      type: 'string',
      describe: 'Write output to this file (default: stdout)'
    })
    .command(
      ['tables [group]', '$0'],
      'Render variable- and fixed-length markdown tables for a benchmark group',
      (cmd) =>
        cmd
          .positional('group', {
            type: 'string',
            describe: 'Benchmark group name (default: config default_group)'
          })
          .option('criterion-dir', {
            type: 'string',
            describe: 'Root directory of benchmark harness output (default: target/criterion)'
          })
          .option('verbose', {
            type: 'boolean',
            default: false,
            describe: 'Print skipped result directories to stderr'
          }),
      async (args) => {
        try {
          const config = await loadReportConfig({ configPath: args.config ? String(args.config) : undefined });
          const group = args.group ? String(args.group) : config.default_group;
          const criterionDir = args.criterionDir ? path.resolve(String(args.criterionDir)) : config.criterion_dir;

          const collected = await collectMeasurements(criterionDir, group, { statistic: config.statistic });
          const matrix = aggregateMeasurements(collected.measurements, config.ops_per_iteration);

          if (args.verbose) {
            const counts = tallySkipped(collected.skipped);
            for (const reason of SKIP_REASONS) {
              console.error(`skipped ${reason}: ${counts[reason]}`);
            }
            for (const entry of collected.skipped) {
              console.error(`- [${entry.reason}] ${entry.message}`);
            }
            const dead = unrenderedRanges(matrix);
            if (dead.length > 0) {
              console.error(`ranges in no table: ${dead.map((range) => `${range.min}..=${range.max}`).join(', ')}`);
            }
          }

          await writeOutput(args, renderReport(matrix, group, config.layout));
        } catch (err) {
          if (err instanceof ReportError && err.code === 'GROUP_ROOT_MISSING') {
            console.error(`Error: ${err.message}`);
            return;
          }
          if (reportKnownError(err)) return;
          throw err;
        }
      }
    )
    .command(
      'memory [dir]',
      'Render per-length memory series files (<length>,<bytes> per line) as a markdown table',
      (cmd) =>
        cmd
          .positional('dir', {
            type: 'string',
            default: '.',
            describe: 'Directory holding one series file per implementation'
          })
          .option('ext', {
            type: 'string',
            describe: 'Series file extension (default: config memory.extension)'
          }),
      async (args) => {
        try {
          const config = await loadReportConfig({ configPath: args.config ? String(args.config) : undefined });
          const ext = args.ext ? String(args.ext) : config.memory.extension;
          const dir = String(args.dir);

          const series = await loadMemorySeries(dir, ext);
          if (series.length === 0) {
            console.error(`No ${normalizeExtension(ext)} files found in ${dir}.`);
            return;
          }
          await writeOutput(args, renderMemoryTable(series, config.layout));
        } catch (err) {
          if (err instanceof ReportError && err.code === 'SERIES_DIR_MISSING') {
            console.error(`Error: ${err.message}`);
            return;
          }
          if (reportKnownError(err)) return;
          throw err;
        }
      }
    );

  await parser.parse();
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}

// Only run if invoked as a binary, not imported by tests.
const isInvokedAsBin = (() => {
  try {
    const thisFile = fileURLToPath(import.meta.url);
    return process.argv[1] === thisFile;
  } catch {
    return false;
  }
})();

if (isInvokedAsBin) {
  main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
