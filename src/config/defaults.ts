import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables or config files override them
 */
export const defaultConfig: Config = {
  logging: {
    level: 'warn',
    format: 'simple',
  },
  display: {
    unit: 'MiB',
    width: 11,
    showDiskSwap: true,
    showZram: true,
    showPsi: true,
    showUnit: true,
  },
  sources: {
    meminfo: '/proc/meminfo',
    swaps: '/proc/swaps',
    pressure: '/proc/pressure/memory',
    sysBlockDir: '/sys/class/block',
  },
};
