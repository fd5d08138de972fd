/**
 * zram mm_stat discovery and parsing
 */

import { join } from 'path';
import { readRequired } from '../sources/reader.js';
import { ABSENT, quantity, type ZramRecord } from '../types/quantity.js';
import { parseInteger } from './fields.js';
import { findZramDevice } from './swaps.js';

/**
 * Locate the zram swap device named in /proc/swaps and read its mm_stat.
 * Returns null when no zram swap is active.
 */
export function gatherZramStats(swaps: string, sysBlockDir: string, source?: string): string | null {
  const device = findZramDevice(swaps, source);
  if (device === null) return null;

  return readRequired(join(sysBlockDir, device, 'mm_stat'), 'zram swap mm_stat');
}

/**
 * zram data size, total size (bytes) and their ratio.
 * The ratio is absent when total is zero.
 */
export function parseZramSwap(mmStat: string, source: string = 'mm_stat'): ZramRecord {
  const columns = mmStat.trim().split(/\s+/);
  const data = parseInteger(columns[0], 'data size', source);
  const total = parseInteger(columns[2], 'total size', source);

  return [
    { name: 'data', quantity: quantity(data, 'B') },
    { name: 'total', quantity: quantity(total, 'B') },
    { name: 'ratio', quantity: total === 0 ? ABSENT : quantity(data / total, '') },
  ];
}
