import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { main } from '../src/cli.js';
import { loadMemorySeries, parseMemorySeries, renderMemoryTable } from '../src/memory/series.js';
import { ReportError } from '../src/report/types.js';
import { makeTmpDir } from './helpers/fixtures.js';

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = 0;
});

describe('memory series', () => {
  it('parses length,bytes pairs and skips blank lines', () => {
    expect(parseMemorySeries('0,24\n\n1,24.5\r\n', 'std')).toEqual({
      implementation: 'std',
      points: [
        { length: 0, bytes: 24 },
        { length: 1, bytes: 24.5 }
      ]
    });
  });

  it('rejects malformed lines with their line number', () => {
    expect(() => parseMemorySeries('0,24\n1;24\n', 'std')).toThrow('std:2: expected "<length>,<bytes>"');
    expect(() => parseMemorySeries('0,24,1\n', 'std')).toThrow(ReportError);
    expect(() => parseMemorySeries('0,\n', 'std')).toThrow(ReportError);
  });

  it('renders one row per length and one column per implementation', () => {
    const table = renderMemoryTable([
      { implementation: 'a', points: [{ length: 1, bytes: 24 }, { length: 0, bytes: 24 }] },
      { implementation: 'b', points: [{ length: 1, bytes: 32.5 }] }
    ]);
    expect(table).toBe(
      [
        '### Memory Usage by String Length [bytes]',
        'Length             |     a      |     b     ',
        ':---               |   :---:    |   :---:   ',
        '0                  |       24.0 |     -     ',
        '1                  |       24.0 |       32.5',
        '',
        ''
      ].join('\n')
    );
  });

  it('loads matching files sorted by name, named after their base name', async () => {
    const dir = await makeTmpDir('memory');
    try {
      await fs.writeFile(path.join(dir, 'std.csv'), '0,24\n', 'utf8');
      await fs.writeFile(path.join(dir, 'cold-string.csv'), '0,8\n', 'utf8');
      await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored', 'utf8');

      const series = await loadMemorySeries(dir, 'csv');
      expect(series.map((entry) => entry.implementation)).toEqual(['cold-string', 'std']);
      expect(await loadMemorySeries(dir, '.txt')).toHaveLength(1);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('skips dotfiles and follows symlinked series files', async () => {
    const dir = await makeTmpDir('memory-links');
    try {
      await fs.mkdir(path.join(dir, 'src'));
      await fs.writeFile(path.join(dir, 'src', 'data.txt'), '0,16\n', 'utf8');
      await fs.mkdir(path.join(dir, 'series'));
      await fs.symlink(path.join(dir, 'src', 'data.txt'), path.join(dir, 'series', 'linked.csv'));
      await fs.writeFile(path.join(dir, 'series', '.csv'), '0,1\n', 'utf8');
      await fs.writeFile(path.join(dir, 'series', '.hidden.csv'), '0,1\n', 'utf8');

      expect(await loadMemorySeries(path.join(dir, 'series'), 'csv')).toEqual([
        { implementation: 'linked', points: [{ length: 0, bytes: 16 }] }
      ]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing series directory through the memory command', async () => {
    const dir = await makeTmpDir('memory-missing');
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      const missing = path.join(dir, 'absent');
      await expect(loadMemorySeries(missing)).rejects.toMatchObject({ code: 'SERIES_DIR_MISSING' });

      expect(await main(['node', 'bench-tables', 'memory', missing])).toBe(0);
      expect(errors).toHaveBeenCalledWith(`Error: Directory ${missing} not found.`);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('renders series through the memory command', async () => {
    const dir = await makeTmpDir('memory-cli');
    const out = path.join(dir, 'memory.md');
    try {
      await fs.writeFile(path.join(dir, 'a.csv'), '0,24\n1,24\n', 'utf8');
      await fs.writeFile(path.join(dir, 'b.csv'), '1,32.5\n', 'utf8');

      const code = await main(['node', 'bench-tables', 'memory', dir, '--out', out]);
      expect(code).toBe(0);
      expect((await fs.readFile(out, 'utf8')).split('\n')[4]).toBe('1                  |       24.0 |       32.5');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('reports an empty directory and a malformed file', async () => {
    const dir = await makeTmpDir('memory-empty');
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      expect(await main(['node', 'bench-tables', 'memory', dir])).toBe(0);
      expect(errors).toHaveBeenCalledWith(`No .csv files found in ${dir}.`);

      await fs.writeFile(path.join(dir, 'bad.csv'), 'oops\n', 'utf8');
      expect(await main(['node', 'bench-tables', 'memory', dir])).toBe(1);
      expect(errors).toHaveBeenLastCalledWith('bad:1: expected "<length>,<bytes>"');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
