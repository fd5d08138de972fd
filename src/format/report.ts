/**
 * Report section renderers
 */

import { InternalError } from '../errors/index.js';
import { ABSENT, getField, quantity, type DiskSwapRecord, type MemoryRecord, type ZramRecord } from '../types/quantity.js';
import type { PressureStats, ReportOptions } from '../types/report.js';
import { toBytes } from '../units/convert.js';
import { formatTable, formatValueUnit, formatValueUnitAll, type Row } from './table.js';

type TableOptions = Pick<ReportOptions, 'width' | 'showUnit'>;

/**
 * Memory block, with disk swap alongside when there is some to show
 */
export function formatMemory(
  memory: MemoryRecord,
  swap: DiskSwapRecord | null,
  options: TableOptions & Pick<ReportOptions, 'showDiskSwap'>
): string {
  const swapValues =
    swap && options.showDiskSwap ? new Map<string, string>(formatValueUnitAll(swap, options.showUnit)) : null;

  const rows: Row[] = formatValueUnitAll(memory, options.showUnit).map(([name, text]) =>
    swapValues ? [name, text, swapValues.get(name) ?? ''] : [name, text]
  );

  const header = swapValues ? 'Memory/swap' : 'Memory';
  return `${header}\n${formatTable(rows, options.width)}`;
}

/**
 * zram block: sizes, compression ratio and zram total as a share of RAM
 */
export function formatZram(zram: ZramRecord, memory: MemoryRecord, options: TableOptions): string {
  const memTotal = toBytes(getField(memory, 'total') ?? ABSENT);
  const zramTotal = toBytes(getField(zram, 'total') ?? ABSENT);
  if (memTotal === null || zramTotal === null) {
    throw new InternalError('total RAM or zram is unknown');
  }
  const totalPercent = memTotal === 0 ? ABSENT : quantity((zramTotal / memTotal) * 100, '%');

  const rows: Row[] = [
    ['data', formatValueUnit(getField(zram, 'data') ?? ABSENT, 1, options.showUnit)],
    ['total', formatValueUnit(getField(zram, 'total') ?? ABSENT, 1, options.showUnit)],
    ['ratio', formatValueUnit(getField(zram, 'ratio') ?? ABSENT, 2)],
    ['comp%', formatValueUnit(totalPercent, 2)],
  ];

  return `zram\n${formatTable(rows, options.width)}`;
}

/**
 * One-line PSI summary: "psi some/full: s10, s60, s300 / f10, f60, f300"
 */
export function formatPressure(psi: PressureStats): string {
  const triples = [psi.some, psi.full].map((triple) => triple.map((value) => value.toFixed(2)).join(', '));
  return `psi some/full: ${triples.join(' / ')}`;
}
