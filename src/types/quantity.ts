/**
 * Quantity and record type definitions
 */

export const BINARY_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'] as const;
export const DECIMAL_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;
export const AUTO_UNITS = ['autobinary', 'autodecimal'] as const;

export type BinaryUnit = (typeof BINARY_UNITS)[number];
export type DecimalUnit = (typeof DECIMAL_UNITS)[number];
export type ConcreteUnit = BinaryUnit | DecimalUnit;
export type AutoUnit = (typeof AUTO_UNITS)[number];

/**
 * Anything a caller may ask to convert into
 */
export type Unit = ConcreteUnit | AutoUnit;

/**
 * Suffixes of quantities that are not byte counts: '' for ratios, '%' for percentages
 */
export type DimensionlessUnit = '' | '%';

export type QuantityUnit = Unit | DimensionlessUnit;

export interface PresentQuantity {
  readonly value: number;
  readonly unit: QuantityUnit;
}

/**
 * "Could not be determined"; carries no unit
 */
export interface AbsentQuantity {
  readonly value: null;
  readonly unit: null;
}

export type Quantity = PresentQuantity | AbsentQuantity;

export const ABSENT: AbsentQuantity = Object.freeze({ value: null, unit: null });

export interface Field<K extends string = string> {
  readonly name: K;
  readonly quantity: Quantity;
}

/**
 * Ordered fields; order is display order
 */
export type NamedRecord<K extends string = string> = readonly Field<K>[];

export type MemoryField = 'total' | 'used' | 'avail' | 'cache' | 'free';
export type DiskSwapField = 'total' | 'used' | 'free';
export type ZramField = 'data' | 'total' | 'ratio';

export type MemoryRecord = NamedRecord<MemoryField>;
export type DiskSwapRecord = NamedRecord<DiskSwapField>;
export type ZramRecord = NamedRecord<ZramField>;

export function quantity(value: number, unit: QuantityUnit): PresentQuantity {
  return { value, unit };
}

export function isAbsent(q: Quantity): q is AbsentQuantity {
  return q.value === null;
}

export function isDimensionless(unit: QuantityUnit): unit is DimensionlessUnit {
  return unit === '' || unit === '%';
}

export function isAutoUnit(unit: string): unit is AutoUnit {
  return unit === 'autobinary' || unit === 'autodecimal';
}

const UNIT_NAMES: ReadonlySet<string> = new Set<string>([...BINARY_UNITS, ...DECIMAL_UNITS, ...AUTO_UNITS]);

export function isUnit(value: string): value is Unit {
  return UNIT_NAMES.has(value);
}

/**
 * Look up a field by name
 */
export function getField<K extends string>(record: NamedRecord<K>, name: K): Quantity | undefined {
  return record.find((field) => field.name === name)?.quantity;
}

/**
 * Field names in record order
 */
export function fieldNames<K extends string>(record: NamedRecord<K>): K[] {
  return record.map((field) => field.name);
}
