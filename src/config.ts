import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';

import { DEFAULT_OPS_PER_ITERATION, DEFAULT_TABLE_LAYOUT } from './report/types.js';
import type { PointEstimateStatistic, TableLayout } from './report/types.js';

export const DEFAULT_CONFIG_FILENAME = 'bench-tables.yaml';

type ReportConfigErrorReason = 'REPORT_CONFIG_PARSE_ERROR' | 'REPORT_CONFIG_INVALID';

const STATISTICS: PointEstimateStatistic[] = ['mean', 'median'];

export interface ReportConfig {
  criterion_dir: string;
  default_group: string;
  ops_per_iteration: number;
  statistic: PointEstimateStatistic;
  layout: TableLayout;
  memory: {
    extension: string;
  };
}

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
  criterion_dir: path.join('target', 'criterion'),
  default_group: 'construction',
  ops_per_iteration: DEFAULT_OPS_PER_ITERATION,
  statistic: 'mean',
  layout: { ...DEFAULT_TABLE_LAYOUT },
  memory: { extension: 'csv' }
};

export class ReportConfigError extends Error {
  readonly reason: ReportConfigErrorReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: ReportConfigErrorReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ReportConfigError';
    this.reason = reason;
    this.details = details;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function readString(value: unknown, field: string, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ReportConfigError('REPORT_CONFIG_INVALID', `${field} must be a non-empty string`, { field, value });
  }
  return value.trim();
}

function readInteger(value: unknown, field: string, fallback: number, options: { min?: number } = {}): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || !Number.isInteger(value)) {
    throw new ReportConfigError('REPORT_CONFIG_INVALID', `${field} must be an integer`, { field, value });
  }

  if (options.min !== undefined && value < options.min) {
    throw new ReportConfigError('REPORT_CONFIG_INVALID', `${field} must be >= ${options.min}`, { field, value });
  }

  return value;
}

function readStatistic(value: unknown): PointEstimateStatistic {
  if (value === undefined || value === null) return DEFAULT_REPORT_CONFIG.statistic;
  const statistic = STATISTICS.find((candidate) => candidate === value);
  if (!statistic) {
    throw new ReportConfigError('REPORT_CONFIG_INVALID', `statistic must be one of ${STATISTICS.join(', ')}`, {
      field: 'statistic',
      value
    });
  }
  return statistic;
}

function readSection(value: unknown, field: string): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ReportConfigError('REPORT_CONFIG_INVALID', `${field} must be an object`, { field });
  }
  return value;
}

export function parseReportConfig(raw: string): ReportConfig {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw) as unknown;
  } catch (err) {
    throw new ReportConfigError('REPORT_CONFIG_PARSE_ERROR', 'Failed to parse report config YAML', {
      error: err instanceof Error ? err.message : String(err)
    });
  }

  // An empty document parses to null.
  if (parsed === null || parsed === undefined) return { ...DEFAULT_REPORT_CONFIG };
  if (!isRecord(parsed)) {
    throw new ReportConfigError('REPORT_CONFIG_INVALID', 'report config must be a YAML object');
  }

  const layout = readSection(parsed.layout, 'layout');
  const memory = readSection(parsed.memory, 'memory');
  const defaults = DEFAULT_REPORT_CONFIG;

  return {
    criterion_dir: readString(parsed.criterion_dir, 'criterion_dir', defaults.criterion_dir),
    default_group: readString(parsed.default_group, 'default_group', defaults.default_group),
    ops_per_iteration: readInteger(parsed.ops_per_iteration, 'ops_per_iteration', defaults.ops_per_iteration, { min: 1 }),
    statistic: readStatistic(parsed.statistic),
    layout: {
      firstColumnWidth: readInteger(layout.first_column_width, 'layout.first_column_width', defaults.layout.firstColumnWidth, {
        min: 1
      }),
      cellWidth: readInteger(layout.cell_width, 'layout.cell_width', defaults.layout.cellWidth, { min: 1 })
    },
    memory: {
      extension: readString(memory.extension, 'memory.extension', defaults.memory.extension)
    }
  };
}

export interface LoadReportConfigOptions {
  configPath?: string;
  cwd?: string;
}

/**
 * An explicit config path must exist. Without one, `bench-tables.yaml` in `cwd`
 * is used when present, otherwise the defaults.
 * Relative `criterion_dir` values resolve against the config file's directory.
 */
export async function loadReportConfig(options: LoadReportConfigOptions = {}): Promise<ReportConfig> {
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf8');
  } catch (err) {
    if (explicit) {
      throw new ReportConfigError('REPORT_CONFIG_INVALID', `config file not readable: ${configPath}`, {
        path: configPath,
        error: err instanceof Error ? err.message : String(err)
      });
    }
    return { ...DEFAULT_REPORT_CONFIG, criterion_dir: path.resolve(cwd, DEFAULT_REPORT_CONFIG.criterion_dir) };
  }

  const config = parseReportConfig(raw);
  return { ...config, criterion_dir: path.resolve(path.dirname(configPath), config.criterion_dir) };
}
