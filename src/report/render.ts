import { lookupMeasurement, matrixImplementations, matrixRanges } from './matrix.js';
import { DEFAULT_TABLE_LAYOUT } from './types.js';
import type { LengthRange, ReportTable, ResultMatrix, TableLayout } from './types.js';

const MISSING_CELL = '-';
const COLUMN_JOIN = ' | ';

export const REPORT_TABLES: readonly ReportTable[] = [
  {
    id: 'variable',
    title: (groupLabel) => `${groupLabel}: Variable Length (0..=N) [ns/op]`,
    includes: (range) => range.min === 0,
    label: (range) => `0..=${range.max}`
  },
  {
    id: 'fixed',
    title: (groupLabel) => `${groupLabel}: Fixed Length (N..=N) [ns/op]`,
    includes: (range) => range.min === range.max && range.min !== 0,
    label: (range) => `${range.max}..=${range.max}`
  }
];

/** Odd padding goes to the right. */
export function center(text: string, width: number): string {
  const margin = width - text.length;
  if (margin <= 0) return text;
  const left = Math.floor(margin / 2);
  return ' '.repeat(left) + text + ' '.repeat(margin - left);
}

/**
 * One decimal place. Exact ties (x.25, x.75, ...) round to the even tenth;
 * `toFixed` alone would round them up.
 */
export function formatNanos(value: number): string {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const tenths = Math.floor(value * 10);
    return ((tenths % 2 === 0 ? tenths : tenths + 1) / 10).toFixed(1);
  }
  return value.toFixed(1);
}

/** First character upper-cased, the rest lower-cased. */
export function groupLabel(group: string): string {
  return group.charAt(0).toUpperCase() + group.slice(1).toLowerCase();
}

export function renderMarkdownTable(
  matrix: ResultMatrix,
  title: string,
  table: Pick<ReportTable, 'includes' | 'label'>,
  layout: TableLayout = DEFAULT_TABLE_LAYOUT
): string[] {
  const ranges = matrixRanges(matrix).filter((range) => table.includes(range));
  if (ranges.length === 0) return [];

  const lines: string[] = [];
  lines.push(`### ${title}`);
  lines.push(
    ['Crate'.padEnd(layout.firstColumnWidth), ...ranges.map((range) => center(table.label(range), layout.cellWidth))].join(
      COLUMN_JOIN
    )
  );
  lines.push([':---'.padEnd(layout.firstColumnWidth), ...ranges.map(() => center(':---:', layout.cellWidth))].join(COLUMN_JOIN));

  for (const implementation of matrixImplementations(matrix)) {
    const cells = ranges.map((range) => {
      const value = lookupMeasurement(matrix, implementation, range);
      return value === undefined ? center(MISSING_CELL, layout.cellWidth) : formatNanos(value).padStart(layout.cellWidth);
    });
    lines.push([implementation.padEnd(layout.firstColumnWidth), ...cells].join(COLUMN_JOIN));
  }

  lines.push('');
  return lines;
}

/** Ranges present in the matrix that no table selects. */
export function unrenderedRanges(matrix: ResultMatrix, tables: readonly ReportTable[] = REPORT_TABLES): LengthRange[] {
  return matrixRanges(matrix).filter((range) => !tables.some((table) => table.includes(range)));
}

export function renderReport(
  matrix: ResultMatrix,
  group: string,
  layout: TableLayout = DEFAULT_TABLE_LAYOUT
): string {
  const label = groupLabel(group);
  const lines = REPORT_TABLES.flatMap((table) => renderMarkdownTable(matrix, table.title(label), table, layout));
  return lines.length === 0 ? '' : `${lines.join('\n')}\n`;
}
