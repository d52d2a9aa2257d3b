/**
 * Shapes shared by the report pipeline.
 *
 * A result directory written by the benchmark harness is named
 * `<implementation>-len=<min>-<max>` and holds `new/estimates.json`.
 */

export const RANGE_DELIMITER = '-len=' as const;
export const RANGE_SEPARATOR = '-' as const;

export const DEFAULT_OPS_PER_ITERATION = 1000;

export type PointEstimateStatistic = 'mean' | 'median';

export interface LengthRange {
  min: number;
  max: number;
}

/** Name of the competing implementation ("crate") under test. */
export type ImplementationId = string;

export interface ParsedResultDir {
  implementation: ImplementationId;
  range: LengthRange;
}

export interface RawMeasurement extends ParsedResultDir {
  /** Nanoseconds for one harness iteration (one batch of operations). */
  pointEstimate: number;
}

export interface MeasurementRecord extends ParsedResultDir {
  nanosPerOp: number;
}

export interface ResultMatrix {
  /** implementation -> range key -> ns/op */
  values: Map<ImplementationId, Map<string, number>>;
  ranges: Map<string, LengthRange>;
}

export type SkipReason = 'malformed_name' | 'estimate_missing' | 'estimate_invalid';

export const SKIP_REASONS: readonly SkipReason[] = ['malformed_name', 'estimate_missing', 'estimate_invalid'];

export interface SkippedResultDir {
  name: string;
  reason: SkipReason;
  message: string;
}

export interface CollectedMeasurements {
  groupDir: string;
  measurements: RawMeasurement[];
  skipped: SkippedResultDir[];
}

export interface TableLayout {
  firstColumnWidth: number;
  cellWidth: number;
}

export const DEFAULT_TABLE_LAYOUT: TableLayout = {
  firstColumnWidth: 18,
  cellWidth: 10
};

export interface ReportTable {
  id: 'variable' | 'fixed';
  title: (groupLabel: string) => string;
  includes: (range: LengthRange) => boolean;
  label: (range: LengthRange) => string;
}

export type ReportErrorCode = 'GROUP_ROOT_MISSING' | 'SERIES_DIR_MISSING' | 'SERIES_PARSE_ERROR';

export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ReportErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ReportError';
    this.code = code;
    this.details = details;
  }
}

export function rangeKey(range: LengthRange): string {
  return `${range.min}${RANGE_SEPARATOR}${range.max}`;
}

export function compareRanges(a: LengthRange, b: LengthRange): number {
  return a.max - b.max || a.min - b.min;
}
