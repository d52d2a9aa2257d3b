import fs from 'node:fs/promises';
import path from 'node:path';

import type { PointEstimateStatistic } from './types.js';

export const ESTIMATES_RELATIVE_PATH = path.join('new', 'estimates.json');

export type PointEstimateOutcome =
  | { ok: true; value: number }
  | { ok: false; reason: 'estimate_missing' | 'estimate_invalid'; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function extractPointEstimate(
  parsed: unknown,
  statistic: PointEstimateStatistic
): number | undefined {
  if (!isRecord(parsed)) return undefined;
  const entry = parsed[statistic];
  if (!isRecord(entry)) return undefined;
  const estimate = entry.point_estimate;
  if (typeof estimate !== 'number' || !Number.isFinite(estimate) || estimate < 0) return undefined;
  return estimate;
}

/**
 * Reads `<resultDir>/new/estimates.json` and returns `<statistic>.point_estimate`
 * (nanoseconds per harness iteration).
 */
export async function readPointEstimate(
  resultDir: string,
  statistic: PointEstimateStatistic = 'mean'
): Promise<PointEstimateOutcome> {
  const estimatesPath = path.join(resultDir, ESTIMATES_RELATIVE_PATH);

  let raw: string;
  try {
    raw = await fs.readFile(estimatesPath, 'utf8');
  } catch (err) {
    return {
      ok: false,
      reason: 'estimate_missing',
      message: `${estimatesPath}: ${err instanceof Error ? err.message : String(err)}`
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (err) {
    return {
      ok: false,
      reason: 'estimate_invalid',
      message: `${estimatesPath}: ${err instanceof Error ? err.message : String(err)}`
    };
  }

  const value = extractPointEstimate(parsed, statistic);
  if (value === undefined) {
    return {
      ok: false,
      reason: 'estimate_invalid',
      message: `${estimatesPath}: ${statistic}.point_estimate must be a non-negative number`
    };
  }

  return { ok: true, value };
}
