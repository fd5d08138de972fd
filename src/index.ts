/**
 * zramfree public API
 */

export * from './types/quantity.js';
export type { PressureStats, PressureTriple, Report, ReportOptions, Snapshot, SourcePaths } from './types/report.js';
export { convert, convertAll, autorange, toBytes, magnitudeTier, MULTIPLIERS } from './units/convert.js';
export * from './parsers/index.js';
export { checkOpenRead, readRequired, gatherSnapshot } from './sources/reader.js';
export { formatValueUnit, formatValueUnitAll, formatTable, ABSENT_TEXT } from './format/table.js';
export { formatMemory, formatZram, formatPressure } from './format/report.js';
export { collectReport, renderReport, buildReport } from './report/index.js';
export { run } from './cli/index.js';
export * from './errors/index.js';
