/**
 * Report assembly: snapshot, parse, convert, render
 */

import { SourceReadError } from '../errors/index.js';
import { formatMemory, formatPressure, formatZram } from '../format/report.js';
import { getLogger } from '../logger/index.js';
import { parseDiskSwap, parseMeminfo, parsePressure, gatherZramStats, parseZramSwap } from '../parsers/index.js';
import { gatherSnapshot } from '../sources/reader.js';
import type { Report, ReportOptions, SourcePaths } from '../types/report.js';
import { convertAll } from '../units/convert.js';

/**
 * Read every source, parse the sections that will be shown and convert them
 * into the display unit
 */
export function collectReport(options: ReportOptions, paths: SourcePaths): Report {
  const logger = getLogger();
  const snapshot = gatherSnapshot(paths);

  const mmStat =
    options.showZram && snapshot.swaps !== null
      ? gatherZramStats(snapshot.swaps, paths.sysBlockDir, paths.swaps)
      : null;

  const pressure =
    options.showPsi && snapshot.pressure !== null ? parsePressure(snapshot.pressure, paths.pressure) : null;

  const diskSwap =
    options.showDiskSwap && snapshot.swaps !== null ? parseDiskSwap(snapshot.swaps, paths.swaps) : null;

  const zram = mmStat !== null ? parseZramSwap(mmStat) : null;

  if (!snapshot.meminfo) {
    throw new SourceReadError(`cannot read ${paths.meminfo}`, { path: paths.meminfo });
  }
  const memory = parseMeminfo(snapshot.meminfo, paths.meminfo);

  logger.debug('Sections collected', {
    diskSwap: diskSwap !== null,
    zram: zram !== null,
    pressure: pressure !== null,
    unit: options.unit,
  });

  return {
    memory: convertAll(memory, options.unit),
    diskSwap: diskSwap && convertAll(diskSwap, options.unit),
    zram: zram && convertAll(zram, options.unit),
    pressure,
  };
}

/**
 * Render collected sections, one block after another
 */
export function renderReport(report: Report, options: ReportOptions): string {
  const blocks = [formatMemory(report.memory, report.diskSwap, options)];

  if (options.showZram && report.zram) {
    blocks.push(formatZram(report.zram, report.memory, options));
  }
  if (options.showPsi && report.pressure) {
    blocks.push(formatPressure(report.pressure));
  }

  return blocks.join('\n');
}

/**
 * The whole report as text
 */
export function buildReport(options: ReportOptions, paths: SourcePaths): string {
  return renderReport(collectReport(options, paths), options);
}
