/**
 * Fake /proc and /sys trees for tests
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { SourcePaths } from '../../src/types/report.js';

export const MEMINFO = `MemTotal:        8388608 kB
MemFree:         2097152 kB
MemAvailable:    4194304 kB
Buffers:          102400 kB
Cached:           921600 kB
SwapCached:            0 kB
SwapTotal:       6291448 kB
SwapFree:        5765136 kB
HugePages_Total:       0
Hugepagesize:       2048 kB
`;

export const SWAPS_HEADER = 'Filename\t\t\t\tType\t\tSize\t\tUsed\t\tPriority';

export const SWAPS = `${SWAPS_HEADER}
/dev/sda2                               partition\t2097148\t\t1024\t\t-2
/dev/zram0                              partition\t4194300\t\t524288\t\t100
`;

export const MM_STAT = '1048576 0 2097152 0 0 0 0 0 0\n';

export const PRESSURE = `some avg10=0.12 avg60=0.34 avg300=0.56 total=12345
full avg10=0.01 avg60=0.02 avg300=0.03 total=678
`;

export interface FakeProcFs {
  root: string;
  paths: SourcePaths;
  /** Environment pointing the config loader at this tree */
  env: NodeJS.ProcessEnv;
  write(relativePath: string, content: string): void;
  cleanup(): void;
}

/**
 * Lay out files under a temporary root. Keys are paths relative to the root,
 * e.g. 'proc/meminfo' or 'sys/class/block/zram0/mm_stat'.
 */
export function createProcFs(files: Record<string, string>): FakeProcFs {
  const root = mkdtempSync(join(tmpdir(), 'zramfree-'));

  const write = (relativePath: string, content: string): void => {
    const target = join(root, relativePath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  };

  for (const [relativePath, content] of Object.entries(files)) {
    write(relativePath, content);
  }

  const paths: SourcePaths = {
    meminfo: join(root, 'proc', 'meminfo'),
    swaps: join(root, 'proc', 'swaps'),
    pressure: join(root, 'proc', 'pressure', 'memory'),
    sysBlockDir: join(root, 'sys', 'class', 'block'),
  };

  return {
    root,
    paths,
    env: {
      ZRAMFREE_CONFIG: join(root, 'no-config.json'),
      ZRAMFREE_MEMINFO_PATH: paths.meminfo,
      ZRAMFREE_SWAPS_PATH: paths.swaps,
      ZRAMFREE_PRESSURE_PATH: paths.pressure,
      ZRAMFREE_SYS_BLOCK_DIR: paths.sysBlockDir,
    },
    write,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

/**
 * A machine with disk swap, one zram swap device and PSI
 */
export function createFullProcFs(): FakeProcFs {
  return createProcFs({
    'proc/meminfo': MEMINFO,
    'proc/swaps': SWAPS,
    'proc/pressure/memory': PRESSURE,
    'sys/class/block/zram0/mm_stat': MM_STAT,
  });
}

/**
 * Right-justify fields to a column width and join them into one line
 */
export function line(fields: readonly string[], width: number = 11): string {
  return fields.map((field) => field.padStart(width)).join('');
}
