import { DEFAULT_OPS_PER_ITERATION, compareRanges, rangeKey } from './types.js';
import type { ImplementationId, LengthRange, MeasurementRecord, RawMeasurement, ResultMatrix } from './types.js';

export function createResultMatrix(): ResultMatrix {
  return { values: new Map(), ranges: new Map() };
}

/** Later records for the same implementation and range replace earlier ones. */
export function insertMeasurement(matrix: ResultMatrix, record: MeasurementRecord): void {
  const key = rangeKey(record.range);
  const row = matrix.values.get(record.implementation);
  if (row) {
    row.set(key, record.nanosPerOp);
  } else {
    matrix.values.set(record.implementation, new Map([[key, record.nanosPerOp]]));
  }
  matrix.ranges.set(key, { min: record.range.min, max: record.range.max });
}

export function toMeasurementRecord(
  measurement: RawMeasurement,
  opsPerIteration = DEFAULT_OPS_PER_ITERATION
): MeasurementRecord {
  return {
    implementation: measurement.implementation,
    range: measurement.range,
    nanosPerOp: measurement.pointEstimate / opsPerIteration
  };
}

export function aggregateMeasurements(
  measurements: Iterable<RawMeasurement>,
  opsPerIteration = DEFAULT_OPS_PER_ITERATION
): ResultMatrix {
  const matrix = createResultMatrix();
  for (const measurement of measurements) {
    insertMeasurement(matrix, toMeasurementRecord(measurement, opsPerIteration));
  }
  return matrix;
}

export function lookupMeasurement(
  matrix: ResultMatrix,
  implementation: ImplementationId,
  range: LengthRange
): number | undefined {
  return matrix.values.get(implementation)?.get(rangeKey(range));
}

export function matrixImplementations(matrix: ResultMatrix): ImplementationId[] {
  return [...matrix.values.keys()].sort();
}

/** Ascending by upper bound, then lower bound. */
export function matrixRanges(matrix: ResultMatrix): LengthRange[] {
  return [...matrix.ranges.values()].sort(compareRanges);
}
