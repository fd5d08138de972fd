/**
 * Report type definitions
 */

import type { DiskSwapRecord, MemoryRecord, Unit, ZramRecord } from './quantity.js';

/**
 * avg10, avg60, avg300 percentages
 */
export type PressureTriple = readonly [number, number, number];

export interface PressureStats {
  some: PressureTriple;
  full: PressureTriple;
}

/**
 * Everything the formatting and conversion passes need to know about the
 * invocation. Built once by the CLI and passed down explicitly
 */
export interface ReportOptions {
  readonly unit: Unit;
  readonly width: number;
  readonly showDiskSwap: boolean;
  readonly showZram: boolean;
  readonly showPsi: boolean;
  readonly showUnit: boolean;
}

export interface SourcePaths {
  readonly meminfo: string;
  readonly swaps: string;
  readonly pressure: string;
  readonly sysBlockDir: string;
}

/**
 * Raw contents of the read-once kernel files; null where a file was absent
 */
export interface Snapshot {
  meminfo: string | null;
  swaps: string | null;
  pressure: string | null;
}

/**
 * Parsed and converted sections, ready to render
 */
export interface Report {
  memory: MemoryRecord;
  diskSwap: DiskSwapRecord | null;
  zram: ZramRecord | null;
  pressure: PressureStats | null;
}
