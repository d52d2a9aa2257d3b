export { collectMeasurements, tallySkipped } from './collect.js';
export { extractPointEstimate, readPointEstimate } from './estimates.js';
export { groupDirFor, locateResultDirs } from './locate.js';
export {
  aggregateMeasurements,
  createResultMatrix,
  insertMeasurement,
  lookupMeasurement,
  matrixImplementations,
  matrixRanges
} from './matrix.js';
export { formatResultDirName, parseResultDirName } from './naming.js';
export { REPORT_TABLES, renderMarkdownTable, renderReport, unrenderedRanges } from './render.js';
export * from './types.js';
