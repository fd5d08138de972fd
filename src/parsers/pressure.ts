/**
 * Pressure stall information (/proc/pressure/*) parsing
 */

import { SourceFormatError } from '../errors/index.js';
import type { PressureStats, PressureTriple } from '../types/report.js';

function parseWindow(token: string, source: string): number {
  const [, value] = token.split('=');
  const parsed = value === undefined || value === '' ? NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new SourceFormatError(`${source} not in expected format: bad token "${token}"`, { source });
  }
  return parsed;
}

function parseLine(line: string | undefined, kind: 'some' | 'full', source: string): PressureTriple {
  const tokens = (line ?? '').trim().split(/\s+/);
  if (tokens[0] !== kind) {
    throw new SourceFormatError(`${source} not in expected format: missing "${kind}" line`, { source });
  }

  const [avg10, avg60, avg300] = tokens.slice(1, 4).map((token) => parseWindow(token, source));
  if (avg10 === undefined || avg60 === undefined || avg300 === undefined) {
    throw new SourceFormatError(`${source} not in expected format: short "${kind}" line`, { source });
  }
  return [avg10, avg60, avg300];
}

/**
 * avg10/avg60/avg300 percentages of the "some" and "full" lines
 */
export function parsePressure(psi: string, source: string = '/proc/pressure/memory'): PressureStats {
  const lines = psi.trim().split('\n');
  return {
    some: parseLine(lines[0], 'some', source),
    full: parseLine(lines[1], 'full', source),
  };
}
