import path from 'node:path';

import { readPointEstimate } from './estimates.js';
import { locateResultDirs } from './locate.js';
import { parseResultDirName } from './naming.js';
import type {
  CollectedMeasurements,
  PointEstimateStatistic,
  RawMeasurement,
  SkipReason,
  SkippedResultDir
} from './types.js';

export interface CollectOptions {
  statistic?: PointEstimateStatistic;
}

/**
 * Walks one benchmark group and gathers a point estimate per result directory.
 * Unusable directories are recorded in `skipped`; only a missing group root throws.
 */
export async function collectMeasurements(
  criterionDir: string,
  group: string,
  options: CollectOptions = {}
): Promise<CollectedMeasurements> {
  const { groupDir, names } = await locateResultDirs(criterionDir, group);
  const measurements: RawMeasurement[] = [];
  const skipped: SkippedResultDir[] = [];

  for (const name of names) {
    const parsed = parseResultDirName(name);
    if (!parsed.ok) {
      skipped.push({ name, reason: 'malformed_name', message: parsed.message });
      continue;
    }

    const estimate = await readPointEstimate(path.join(groupDir, name), options.statistic);
    if (!estimate.ok) {
      skipped.push({ name, reason: estimate.reason, message: estimate.message });
      continue;
    }

    measurements.push({ ...parsed.value, pointEstimate: estimate.value });
  }

  return { groupDir, measurements, skipped };
}

export function tallySkipped(skipped: SkippedResultDir[]): Record<SkipReason, number> {
  const counts: Record<SkipReason, number> = { malformed_name: 0, estimate_missing: 0, estimate_invalid: 0 };
  for (const entry of skipped) {
    counts[entry.reason] += 1;
  }
  return counts;
}
