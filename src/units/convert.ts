/**
 * Byte unit conversion and autoranging
 *
 * Every concrete unit is an exact multiple of a byte, so any conversion is
 * value * (from / to) through the byte multipliers below.
 */

import { InternalError } from '../errors/index.js';
import {
  ABSENT,
  BINARY_UNITS,
  DECIMAL_UNITS,
  isAbsent,
  isAutoUnit,
  isDimensionless,
  type ConcreteUnit,
  type Field,
  type NamedRecord,
  type Quantity,
  type Unit,
} from '../types/quantity.js';

export const MULTIPLIERS: Readonly<Record<ConcreteUnit, number>> = {
  B: 1,
  KB: 1000,
  KiB: 2 ** 10,
  MB: 1000 ** 2,
  MiB: 2 ** 20,
  GB: 1000 ** 3,
  GiB: 2 ** 30,
  TB: 1000 ** 4,
  TiB: 2 ** 40,
};

export const MAX_TIER = BINARY_UNITS.length - 1;

/**
 * Convert a quantity into the target unit.
 * Absent stays absent, ratios and percentages pass through untouched.
 */
export function convert(q: Quantity, target: Unit): Quantity {
  if (isAbsent(q)) return ABSENT;

  const unit = q.unit;
  if (isDimensionless(unit)) return q;

  if (isAutoUnit(unit)) {
    throw new InternalError('cannot infer input unit (misplaced "auto"?)', { unit });
  }

  switch (target) {
    case 'autodecimal':
      return autorange(q, true);
    case 'autobinary':
      return autorange(q, false);
    default:
      return { value: q.value * (MULTIPLIERS[unit] / MULTIPLIERS[target]), unit: target };
  }
}

/**
 * Byte count of a quantity, or null when it cannot be determined
 */
export function toBytes(q: Quantity): number | null {
  return convert(q, 'B').value;
}

/**
 * floor(log1000(bytes)), clamped to the unit ladder. Zero, negative and
 * sub-byte counts are tier 0.
 */
export function magnitudeTier(bytes: number): number {
  const tier = Math.floor(Math.log10(bytes) / 3);
  if (Number.isNaN(tier) || tier < 0) return 0;
  return Math.min(tier, MAX_TIER);
}

/**
 * Rewrite a quantity in the ladder unit of its byte magnitude.
 * The tier comes from the byte count, never from the unit the quantity
 * arrived in, so 1000 bytes become 0.9765625KiB in binary mode.
 */
export function autorange(q: Quantity, wantDecimal: boolean): Quantity {
  if (isAbsent(q)) return ABSENT;
  if (isDimensionless(q.unit)) return q;

  const bytes = toBytes(q);
  if (bytes === null) return ABSENT;

  const ladder = wantDecimal ? DECIMAL_UNITS : BINARY_UNITS;
  const unit: ConcreteUnit = ladder[magnitudeTier(bytes)] ?? ladder[0];
  return convert(q, unit);
}

/**
 * Convert every field of a record, keeping names and order
 */
export function convertAll<K extends string>(record: NamedRecord<K>, target: Unit): NamedRecord<K> {
  return record.map(
    (field): Field<K> => ({ name: field.name, quantity: convert(field.quantity, target) })
  );
}
