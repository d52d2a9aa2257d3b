import fs from 'node:fs/promises';
import path from 'node:path';

import { isDirectory } from '../report/locate.js';
import { center } from '../report/render.js';
import { DEFAULT_TABLE_LAYOUT, ReportError } from '../report/types.js';
import type { TableLayout } from '../report/types.js';

export const MEMORY_TABLE_TITLE = 'Memory Usage by String Length [bytes]';

export interface MemoryPoint {
  length: number;
  bytes: number;
}

export interface MemorySeries {
  implementation: string;
  points: MemoryPoint[];
}

function parseNumber(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/** One `<length>,<bytes>` pair per line; blank lines are ignored. */
export function parseMemorySeries(raw: string, implementation: string): MemorySeries {
  const points: MemoryPoint[] = [];
  const lines = raw.split(/\r?\n/);

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (!line) continue;

    const fields = line.split(',');
    const length = fields.length === 2 ? parseNumber(fields[0]) : undefined;
    const bytes = fields.length === 2 ? parseNumber(fields[1]) : undefined;
    if (length === undefined || bytes === undefined) {
      throw new ReportError('SERIES_PARSE_ERROR', `${implementation}:${index + 1}: expected "<length>,<bytes>"`, {
        implementation,
        line: index + 1,
        text: line
      });
    }
    points.push({ length, bytes });
  }

  return { implementation, points };
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export function normalizeExtension(ext: string): string {
  return ext.startsWith('.') ? ext : `.${ext}`;
}

export async function loadMemorySeries(dir: string, ext = 'csv'): Promise<MemorySeries[]> {
  const suffix = normalizeExtension(ext);
  if (!(await isDirectory(dir))) {
    throw new ReportError('SERIES_DIR_MISSING', `Directory ${dir} not found.`, { dir });
  }

  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    // Dotfiles (including a bare `.csv`) are not series.
    if (entry.name.startsWith('.') || !entry.name.endsWith(suffix)) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && (await isFile(path.join(dir, entry.name))))) {
      files.push(entry.name);
    }
  }
  files.sort();

  const series: MemorySeries[] = [];
  for (const file of files) {
    const raw = await fs.readFile(path.join(dir, file), 'utf8');
    series.push(parseMemorySeries(raw, path.basename(file, suffix)));
  }
  return series;
}

export function renderMemoryTable(series: MemorySeries[], layout: TableLayout = DEFAULT_TABLE_LAYOUT): string {
  if (series.length === 0) return '';

  const lengths = [...new Set(series.flatMap((entry) => entry.points.map((point) => point.length)))].sort((a, b) => a - b);
  const byImplementation = series.map(
    (entry) => new Map(entry.points.map((point) => [point.length, point.bytes] as const))
  );

  const lines: string[] = [];
  lines.push(`### ${MEMORY_TABLE_TITLE}`);
  lines.push(
    ['Length'.padEnd(layout.firstColumnWidth), ...series.map((entry) => center(entry.implementation, layout.cellWidth))].join(
      ' | '
    )
  );
  lines.push([':---'.padEnd(layout.firstColumnWidth), ...series.map(() => center(':---:', layout.cellWidth))].join(' | '));

  for (const length of lengths) {
    const cells = byImplementation.map((points) => {
      const bytes = points.get(length);
      return bytes === undefined ? center('-', layout.cellWidth) : bytes.toFixed(1).padStart(layout.cellWidth);
    });
    lines.push([String(length).padEnd(layout.firstColumnWidth), ...cells].join(' | '));
  }

  return `${lines.join('\n')}\n\n`;
}
