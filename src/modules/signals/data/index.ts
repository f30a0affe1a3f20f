/**
 * Signals data layer exports
 */

export { validateSeries, isIsoDate } from './validateSeries';
export { parseBarsCsv, parseBarsJson } from './parseBars';
export { loadBarsFile } from './loadBarsFile';
