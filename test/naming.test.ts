import { describe, expect, it } from 'vitest';

import { formatResultDirName, parseResultDirName } from '../src/report/naming.js';

describe('result directory names', () => {
  it('parses implementation and range', () => {
    expect(parseResultDirName('compact_str-len=0-16')).toEqual({
      ok: true,
      value: { implementation: 'compact_str', range: { min: 0, max: 16 } }
    });
  });

  it('splits at the last delimiter so implementation names keep hyphens and delimiters', () => {
    expect(parseResultDirName('cold-string-len=4-4')).toEqual({
      ok: true,
      value: { implementation: 'cold-string', range: { min: 4, max: 4 } }
    });
    expect(parseResultDirName('odd-len=name-len=0-8')).toEqual({
      ok: true,
      value: { implementation: 'odd-len=name', range: { min: 0, max: 8 } }
    });
  });

  it('round-trips formatted names', () => {
    const cases = [
      { implementation: 'std', range: { min: 0, max: 0 } },
      { implementation: 'smol-str', range: { min: 0, max: 128 } },
      { implementation: 'a-len=b', range: { min: 24, max: 24 } },
      { implementation: 'x', range: { min: 3, max: 9 } }
    ];
    for (const entry of cases) {
      const name = formatResultDirName(entry.implementation, entry.range);
      expect(parseResultDirName(name)).toEqual({ ok: true, value: entry });
    }
  });

  it('accepts ranges that belong to neither table', () => {
    const parsed = parseResultDirName('std-len=2-6');
    expect(parsed.ok && parsed.value.range).toEqual({ min: 2, max: 6 });
  });

  it.each([
    ['std-len=', 'empty range'],
    ['std', 'no delimiter'],
    ['-len=0-8', 'empty implementation'],
    ['std-len=8-0', 'min above max'],
    ['std-len=+1-8', 'signed bound'],
    ['std-len=0-8-9', 'extra separator'],
    ['std-len=0-8.5', 'fractional bound'],
    ['std-len=0-', 'missing max'],
    ['std-len= 0-8', 'whitespace'],
    ['std-len=0-99999999999999999999', 'unsafe integer']
  ])('rejects %s (%s)', (name) => {
    const parsed = parseResultDirName(name);
    expect(parsed.ok).toBe(false);
  });

  it('names the directory in the failure message', () => {
    expect(parseResultDirName('std-len=8-0')).toEqual({ ok: false, message: 'std-len=8-0: min 8 exceeds max 0' });
  });
});
