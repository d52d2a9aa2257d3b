import { RANGE_DELIMITER, RANGE_SEPARATOR } from './types.js';
import type { ImplementationId, LengthRange, ParsedResultDir } from './types.js';

export type ParseResultDirOutcome =
  | { ok: true; value: ParsedResultDir }
  | { ok: false; message: string };

const UNSIGNED_DECIMAL = /^[0-9]+$/;

function parseLength(raw: string): number | undefined {
  if (!UNSIGNED_DECIMAL.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

function malformed(name: string, why: string): ParseResultDirOutcome {
  return { ok: false, message: `${name}: ${why}` };
}

export function hasRangeDelimiter(name: string): boolean {
  return name.includes(RANGE_DELIMITER);
}

/**
 * Decodes `<implementation>-len=<min>-<max>`.
 *
 * Splits at the last delimiter so implementation names may contain `-len=` themselves.
 */
export function parseResultDirName(name: string): ParseResultDirOutcome {
  const at = name.lastIndexOf(RANGE_DELIMITER);
  if (at < 0) return malformed(name, `missing "${RANGE_DELIMITER}"`);

  const implementation = name.slice(0, at);
  if (implementation.length === 0) return malformed(name, 'empty implementation name');

  const parts = name.slice(at + RANGE_DELIMITER.length).split(RANGE_SEPARATOR);
  if (parts.length !== 2) return malformed(name, 'range must be <min>-<max>');

  const min = parseLength(parts[0]);
  const max = parseLength(parts[1]);
  if (min === undefined || max === undefined) {
    return malformed(name, 'range bounds must be unsigned base-10 integers');
  }
  if (min > max) return malformed(name, `min ${min} exceeds max ${max}`);

  return { ok: true, value: { implementation, range: { min, max } } };
}

export function formatResultDirName(implementation: ImplementationId, range: LengthRange): string {
  return `${implementation}${RANGE_DELIMITER}${range.min}${RANGE_SEPARATOR}${range.max}`;
}
