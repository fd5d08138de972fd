/**
 * Kernel source parsers
 */

export { parseMeminfo, parseMeminfoFields } from './meminfo.js';
export { parseDiskSwap, findZramDevice, ZRAM_MARKER } from './swaps.js';
export { gatherZramStats, parseZramSwap } from './zram.js';
export { parsePressure } from './pressure.js';
