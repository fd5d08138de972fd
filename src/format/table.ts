/**
 * Fixed-width text tables
 */

import { isDimensionless, type NamedRecord, type Quantity } from '../types/quantity.js';

/**
 * Rendering of a quantity that could not be determined
 */
export const ABSENT_TEXT = 'null';

export type Row = readonly string[];

/**
 * Formatted record: [name, text] pairs in record order
 */
export type FormattedRecord<K extends string = string> = readonly (readonly [K, string])[];

/**
 * Render a quantity as value and unit with no space between, e.g. "512.0MiB".
 * With showUnit off, byte units are dropped; '%' and ratios keep their suffix.
 */
export function formatValueUnit(q: Quantity, decimalPlaces: number = 1, showUnit: boolean = true): string {
  if (q.value === null) return ABSENT_TEXT;

  const suffix = showUnit || isDimensionless(q.unit) ? q.unit : '';
  return `${q.value.toFixed(decimalPlaces)}${suffix}`;
}

/**
 * Format every field of a record, keeping order
 */
export function formatValueUnitAll<K extends string>(
  record: NamedRecord<K>,
  showUnit: boolean = true
): FormattedRecord<K> {
  return record.map((field): readonly [K, string] => [field.name, formatValueUnit(field.quantity, 1, showUnit)]);
}

/**
 * Render rows of [label, value, value, ...] as
 *
 *      label      label      label
 *      value      value      value
 *      value      value      value
 *
 * i.e. each input row becomes a column, every field right-justified to
 * width. Rows longer than the shortest one are truncated.
 */
export function formatTable(rows: readonly Row[], width: number): string {
  if (rows.length === 0) return '';

  const depth = Math.min(...rows.map((row) => row.length));
  const lines: string[] = [];

  for (let i = 0; i < depth; i++) {
    lines.push(rows.map((row) => (row[i] ?? '').padStart(width)).join(''));
  }

  return lines.join('\n');
}
