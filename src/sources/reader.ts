/**
 * Readers for /proc and /sys pseudo-files
 *
 * Kernel interface files change under our feet, so each one is read exactly
 * once, whole, into a string before anything is parsed.
 */

import { readFileSync } from 'fs';
import { SourceReadError, isErrnoException, isError } from '../errors/index.js';
import { getLogger } from '../logger/index.js';
import type { Snapshot, SourcePaths } from '../types/report.js';

/**
 * Read a whole file, trimmed. Returns null when the file cannot be opened
 * or read, which callers treat as an optional source being absent.
 */
export function checkOpenRead(path: string): string | null {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (!isErrnoException(error)) throw error;
    getLogger().debug('Source absent', { path, code: error.code });
    return null;
  }
  getLogger().debug('Read source', { path, bytes: content.length });
  return content.trim();
}

/**
 * Read a file whose existence is already implied by another source.
 * Failing here means the system is not in the state we just observed.
 */
export function readRequired(path: string, what: string): string {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new SourceReadError(
      `tried to read ${what}, but ${path} could not be read`,
      { path },
      isError(error) ? error : undefined
    );
  }
  getLogger().debug('Read source', { path, bytes: content.length });
  return content.trim();
}

/**
 * Capture every read-once source up front
 */
export function gatherSnapshot(paths: SourcePaths): Snapshot {
  return {
    meminfo: checkOpenRead(paths.meminfo),
    swaps: checkOpenRead(paths.swaps),
    pressure: checkOpenRead(paths.pressure),
  };
}
