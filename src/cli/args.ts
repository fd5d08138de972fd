/**
 * Command-line flags and their resolution into report options
 */

import { parseArgs } from 'util';
import type { Config } from '../config/schema.js';
import { ErrorCode, UsageError, errorMessage } from '../errors/index.js';
import { isAutoUnit, type ConcreteUnit, type Unit } from '../types/quantity.js';
import type { ReportOptions } from '../types/report.js';

export const VERSION = '0.1.0';

export interface CliFlags {
  /** Explicitly selected unit; 'auto' for -h */
  unit: ConcreteUnit | 'auto' | null;
  decimal: boolean;
  hideDiskSwap: boolean;
  hideZram: boolean;
  hidePsi: boolean;
  noUnit: boolean;
  width: number | null;
  help: boolean;
  version: boolean;
}

export const HELP_TEXT = `zramfree: a zram-aware free-alike
Usage: zramfree [options]

Unit options (pick at most one; default MiB)
  -k, --kibi          show output in kibibytes
  -K, --kilo          show output in kilobytes
  -m, --mebi          show output in mebibytes
  -M, --mega          show output in megabytes
  -g, --gibi          show output in gibibytes
  -G, --giga          show output in gigabytes
      --tebi          show output in tebibytes
      --tera          show output in terabytes
  -h, --human         do autoranging ("human-readable")
      --si, --decimal (-h only) use powers of 1000 not 1024

Display options
  -S, --no-disk-swap  do not display disk swap stats
  -Z, --no-zram       do not display zram swap stats
  -P, --no-psi        do not display PSI
  -n, --no-unit       do not show units in output
  -w, --width <n>     output width of each column (default 11)

      --help          this help
      --version       print the version`;

const OPTIONS = {
  kibi: { type: 'boolean', short: 'k' },
  kilo: { type: 'boolean', short: 'K' },
  mebi: { type: 'boolean', short: 'm' },
  mega: { type: 'boolean', short: 'M' },
  gibi: { type: 'boolean', short: 'g' },
  giga: { type: 'boolean', short: 'G' },
  tebi: { type: 'boolean' },
  tera: { type: 'boolean' },
  human: { type: 'boolean', short: 'h' },
  si: { type: 'boolean' },
  decimal: { type: 'boolean' },
  'no-disk-swap': { type: 'boolean', short: 'S' },
  'no-zram': { type: 'boolean', short: 'Z' },
  'no-psi': { type: 'boolean', short: 'P' },
  'no-unit': { type: 'boolean', short: 'n' },
  width: { type: 'string', short: 'w' },
  help: { type: 'boolean' },
  version: { type: 'boolean' },
} as const;

function parseWidth(value: string | undefined): number | null {
  if (value === undefined) return null;
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    throw new UsageError(`invalid column width "${value}"`, ErrorCode.INVALID_OPTION, { width: value });
  }
  return parseInt(value, 10);
}

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    throw new UsageError(errorMessage(error), ErrorCode.INVALID_OPTION);
  }
}

/**
 * Parse argv (without the node and script entries) into flags
 */
export function parseCliArgs(argv: readonly string[]): CliFlags {
  const values = parseRawArgs(argv);

  const unitFlags: [boolean | undefined, CliFlags['unit']][] = [
    [values.kibi, 'KiB'],
    [values.kilo, 'KB'],
    [values.mebi, 'MiB'],
    [values.mega, 'MB'],
    [values.gibi, 'GiB'],
    [values.giga, 'GB'],
    [values.tebi, 'TiB'],
    [values.tera, 'TB'],
    [values.human, 'auto'],
  ];
  const selected = unitFlags.filter(([enabled]) => enabled === true).map(([, unit]) => unit);
  if (selected.length > 1) {
    throw new UsageError('cannot specify more than 1 unit', ErrorCode.CONFLICTING_UNITS, { units: selected });
  }

  return {
    unit: selected[0] ?? null,
    decimal: values.si === true || values.decimal === true,
    hideDiskSwap: values['no-disk-swap'] === true,
    hideZram: values['no-zram'] === true,
    hidePsi: values['no-psi'] === true,
    noUnit: values['no-unit'] === true,
    width: parseWidth(values.width),
    help: values.help === true,
    version: values.version === true,
  };
}

/**
 * Resolve the display unit: flags win over configuration, and --si turns
 * autoranging decimal
 */
function resolveUnit(flags: CliFlags, configured: Unit): Unit {
  if (flags.unit === 'auto') {
    return flags.decimal ? 'autodecimal' : 'autobinary';
  }
  if (flags.unit !== null) {
    if (flags.decimal) throw siWithoutAutorange();
    return flags.unit;
  }
  if (flags.decimal) {
    if (!isAutoUnit(configured)) throw siWithoutAutorange();
    return 'autodecimal';
  }
  return configured;
}

function siWithoutAutorange(): UsageError {
  return new UsageError('--si/--decimal only has effect in combination with -h.', ErrorCode.INVALID_OPTION);
}

/**
 * Combine flags with the display configuration into report options
 */
export function resolveOptions(flags: CliFlags, display: Config['display']): ReportOptions {
  return {
    unit: resolveUnit(flags, display.unit),
    width: flags.width ?? display.width,
    showDiskSwap: display.showDiskSwap && !flags.hideDiskSwap,
    showZram: display.showZram && !flags.hideZram,
    showPsi: display.showPsi && !flags.hidePsi,
    showUnit: display.showUnit && !flags.noUnit,
  };
}
