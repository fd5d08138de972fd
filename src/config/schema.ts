import { z } from 'zod';

/**
 * Configuration Schema using Zod for runtime validation
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);
export const UnitSchema = z.enum([
  'B',
  'KiB',
  'MiB',
  'GiB',
  'TiB',
  'KB',
  'MB',
  'GB',
  'TB',
  'autobinary',
  'autodecimal',
]);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('warn'),
  format: LogFormatSchema.default('simple'),
});

export const DisplayConfigSchema = z.object({
  unit: UnitSchema.default('MiB'),
  width: z.number().int().min(1).default(11),
  showDiskSwap: z.boolean().default(true),
  showZram: z.boolean().default(true),
  showPsi: z.boolean().default(true),
  showUnit: z.boolean().default(true),
});

export const SourcesConfigSchema = z.object({
  meminfo: z.string().min(1).default('/proc/meminfo'),
  swaps: z.string().min(1).default('/proc/swaps'),
  pressure: z.string().min(1).default('/proc/pressure/memory'),
  sysBlockDir: z.string().min(1).default('/sys/class/block'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema,
  display: DisplayConfigSchema,
  sources: SourcesConfigSchema,
});

/**
 * TypeScript type derived from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
