/**
 * /proc/meminfo parsing
 */

import { SourceFormatError, UnsupportedKernelError } from '../errors/index.js';
import { quantity, type MemoryRecord } from '../types/quantity.js';
import { parseInteger } from './fields.js';

/**
 * Parse /proc/meminfo into a key-value map. Values stay in KiB.
 */
export function parseMeminfoFields(meminfo: string, source: string = '/proc/meminfo'): Map<string, number> {
  const fields = new Map<string, number>();

  for (const line of meminfo.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex <= 0 || trimmed.indexOf(':', colonIndex + 1) !== -1) {
      throw new SourceFormatError(`${source} not in expected format: "${trimmed}"`, { source });
    }

    const key = trimmed.substring(0, colonIndex).trim();
    // Strip the unit; "kB" in meminfo means KiB
    const [value] = trimmed.substring(colonIndex + 1).trim().split(/\s+/);
    fields.set(key, parseInteger(value, key, source));
  }

  return fields;
}

/**
 * Memory totals in display order: total, used, avail, cache, free (KiB)
 */
export function parseMeminfo(meminfo: string, source: string = '/proc/meminfo'): MemoryRecord {
  const fields = parseMeminfoFields(meminfo, source);

  const field = (key: string): number => {
    const value = fields.get(key);
    if (value === undefined) {
      throw new SourceFormatError(`${source} not in expected format: ${key} missing`, { source, key });
    }
    return value;
  };

  const available = fields.get('MemAvailable');
  if (available === undefined) {
    throw new UnsupportedKernelError(`MemAvailable in ${source} absent. How old is this kernel?`, { source });
  }

  const total = field('MemTotal');
  const free = field('MemFree');
  const cache = field('Buffers') + field('Cached');
  const used = total - available;

  return [
    { name: 'total', quantity: quantity(total, 'KiB') },
    { name: 'used', quantity: quantity(used, 'KiB') },
    { name: 'avail', quantity: quantity(available, 'KiB') },
    { name: 'cache', quantity: quantity(cache, 'KiB') },
    { name: 'free', quantity: quantity(free, 'KiB') },
  ];
}
