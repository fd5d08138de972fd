/**
 * Shared helpers for fixed-format kernel text
 */

import { SourceFormatError } from '../errors/index.js';

/**
 * Parse a non-negative integer column, rejecting anything else
 */
export function parseInteger(token: string | undefined, field: string, source: string): number {
  if (token === undefined || !/^\d+$/.test(token)) {
    throw new SourceFormatError(`${source} not in expected format: bad ${field} value "${token ?? ''}"`, {
      source,
      field,
    });
  }
  return parseInt(token, 10);
}

/**
 * Split text into whitespace-separated columns, one array per non-blank line
 */
export function splitColumns(text: string): string[][] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '')
    .map((line) => line.split(/\s+/));
}
