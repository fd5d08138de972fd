/**
 * /proc/swaps parsing
 *
 * Columns: Filename Type Size Used Priority, sizes in KiB, one header line.
 */

import { ErrorCode, SourceFormatError, UnsupportedConfigurationError } from '../errors/index.js';
import { quantity, type DiskSwapRecord } from '../types/quantity.js';
import { parseInteger, splitColumns } from './fields.js';

export const ZRAM_MARKER = 'zram';

/**
 * Device rows without the header line
 */
function swapRows(swaps: string): string[][] {
  return splitColumns(swaps).slice(1);
}

function isZramRow(columns: readonly string[]): boolean {
  return (columns[0] ?? '').includes(ZRAM_MARKER);
}

/**
 * Disk (non-zram) swap totals: total, used, free (KiB).
 * Returns null when there is no disk swap.
 */
export function parseDiskSwap(swaps: string, source: string = '/proc/swaps'): DiskSwapRecord | null {
  const rows = swapRows(swaps).filter((columns) => !isZramRow(columns));

  if (rows.length > 1) {
    throw new UnsupportedConfigurationError(
      'having multiple disk swap devices is unsupported',
      ErrorCode.MULTIPLE_DISK_SWAP,
      { devices: rows.map((columns) => columns[0]) }
    );
  }

  const [row] = rows;
  if (!row) return null;

  if (row.length < 4) {
    throw new SourceFormatError(`${source} not in expected format`, { source, row: row.join(' ') });
  }

  const total = parseInteger(row[2], 'size', source);
  const used = parseInteger(row[3], 'used', source);

  return [
    { name: 'total', quantity: quantity(total, 'KiB') },
    { name: 'used', quantity: quantity(used, 'KiB') },
    { name: 'free', quantity: quantity(total - used, 'KiB') },
  ];
}

/**
 * Short device name (e.g. "zram0") of the first zram swap device, or null
 */
export function findZramDevice(swaps: string, source: string = '/proc/swaps'): string | null {
  const row = swapRows(swaps).find(isZramRow);
  if (!row) return null;

  const device = (row[0] ?? '').split('/').pop();
  if (!device) {
    throw new SourceFormatError(`${source} not in expected format`, { source, row: row.join(' ') });
  }
  return device;
}
