/**
 * End-to-end tests of the CLI against a fake procfs tree
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { run } from '../../src/cli/index.js';
import { Logger, setLogger } from '../../src/logger/index.js';
import {
  createFullProcFs,
  createProcFs,
  line,
  MEMINFO,
  PRESSURE,
  SWAPS_HEADER,
  type FakeProcFs,
} from '../helpers/procfs.js';

interface Invocation {
  code: number;
  stdout: string;
  stderr: string;
}

function invoke(argv: string[], procfs: FakeProcFs, platform: NodeJS.Platform = 'linux'): Invocation {
  let stdout = '';
  let stderr = '';
  const code = run(argv, {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
    platform,
    env: procfs.env,
  });
  return { code, stdout, stderr };
}

const MEMORY_LABELS = line(['total', 'used', 'avail', 'cache', 'free']);

describe('zramfree CLI', () => {
  let procfs: FakeProcFs | null = null;

  afterEach(() => {
    procfs?.cleanup();
    procfs = null;
    setLogger(new Logger({ level: 'error', format: 'simple' }));
  });

  it('should print the full report in MiB by default', () => {
    procfs = createFullProcFs();

    const result = invoke([], procfs);

    expect(result.code).toBe(0);
    expect(result.stderr).toBe('');
    expect(result.stdout).toBe(
      [
        'Memory/swap',
        MEMORY_LABELS,
        line(['8192.0MiB', '4096.0MiB', '4096.0MiB', '1000.0MiB', '2048.0MiB']),
        line(['2048.0MiB', '1.0MiB', '', '', '2047.0MiB']),
        'zram',
        line(['data', 'total', 'ratio', 'comp%']),
        line(['1.0MiB', '2.0MiB', '0.50', '0.02%']),
        'psi some/full: 0.12, 0.34, 0.56 / 0.01, 0.02, 0.03',
        '',
      ].join('\n')
    );
  });

  it('should hide sections on request', () => {
    procfs = createFullProcFs();

    const result = invoke(['-S', '-Z', '-P', '-g'], procfs);

    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      ['Memory', MEMORY_LABELS, line(['8.0GiB', '4.0GiB', '4.0GiB', '1.0GiB', '2.0GiB']), ''].join('\n')
    );
  });

  it('should honour width and unit suppression', () => {
    procfs = createFullProcFs();

    const result = invoke(['-SZP', '-n', '-w', '8'], procfs);

    expect(result.stdout).toBe(
      [
        'Memory',
        line(['total', 'used', 'avail', 'cache', 'free'], 8),
        line(['8192.0', '4096.0', '4096.0', '1000.0', '2048.0'], 8),
        '',
      ].join('\n')
    );
  });

  it('should autorange in powers of 1000 with -h --si', () => {
    procfs = createFullProcFs();

    const result = invoke(['-h', '--si', '-S', '-P'], procfs);

    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      [
        'Memory',
        MEMORY_LABELS,
        line(['8.6GB', '4.3GB', '4.3GB', '1.0GB', '2.1GB']),
        'zram',
        line(['data', 'total', 'ratio', 'comp%']),
        line(['1.0MB', '2.1MB', '0.50', '0.02%']),
        '',
      ].join('\n')
    );
  });

  it('should take defaults from the environment', () => {
    procfs = createFullProcFs();

    const result = invoke([], { ...procfs, env: { ...procfs.env, ZRAMFREE_UNIT: 'KiB', ZRAMFREE_SHOW_PSI: 'false' } });

    const lines = result.stdout.split('\n');
    expect(lines[2]).toBe(line(['8388608.0KiB', '4194304.0KiB', '4194304.0KiB', '1024000.0KiB', '2097152.0KiB']));
    expect(result.stdout).not.toContain('psi');
  });

  it('should report a zram-only system without disk swap', () => {
    procfs = createProcFs({
      'proc/meminfo': MEMINFO,
      'proc/swaps': `${SWAPS_HEADER}\n/dev/zram0 partition 4194300 0 100\n`,
      'sys/class/block/zram0/mm_stat': '0 0 0 0 0 0 0 0 0\n',
    });

    const result = invoke([], procfs);

    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      [
        'Memory',
        MEMORY_LABELS,
        line(['8192.0MiB', '4096.0MiB', '4096.0MiB', '1000.0MiB', '2048.0MiB']),
        'zram',
        line(['data', 'total', 'ratio', 'comp%']),
        line(['0.0MiB', '0.0MiB', 'null', '0.00%']),
        '',
      ].join('\n')
    );
  });

  it('should run with only meminfo available', () => {
    procfs = createProcFs({ 'proc/meminfo': MEMINFO });

    const result = invoke([], procfs);

    expect(result.code).toBe(0);
    expect(result.stdout.split('\n')[0]).toBe('Memory');
    expect(result.stdout.split('\n')).toHaveLength(4);
  });

  it('should refuse multiple disk swap devices without printing a report', () => {
    procfs = createProcFs({
      'proc/meminfo': MEMINFO,
      'proc/swaps': `${SWAPS_HEADER}\n/dev/sda2 partition 100 0 -2\n/dev/sdb2 partition 100 0 -3\n`,
      'proc/pressure/memory': PRESSURE,
    });

    const result = invoke([], procfs);

    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe('zramfree: having multiple disk swap devices is unsupported\n');
  });

  it('should fail when meminfo cannot be read', () => {
    procfs = createProcFs({});

    const result = invoke([], procfs);

    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe(`zramfree: cannot read ${procfs.paths.meminfo}\n`);
  });

  it('should fail on a kernel without MemAvailable', () => {
    procfs = createProcFs({ 'proc/meminfo': 'MemTotal: 1024 kB\nMemFree: 512 kB\nBuffers: 0 kB\nCached: 0 kB\n' });

    const result = invoke([], procfs);

    expect(result.code).toBe(1);
    expect(result.stderr).toBe(`zramfree: MemAvailable in ${procfs.paths.meminfo} absent. How old is this kernel?\n`);
  });

  it('should reject conflicting units as a usage error', () => {
    procfs = createFullProcFs();

    const result = invoke(['-k', '-M'], procfs);

    expect(result.code).toBe(2);
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe('zramfree: cannot specify more than 1 unit\n');
  });

  it('should reject --si without -h', () => {
    procfs = createFullProcFs();

    const result = invoke(['--si'], procfs);

    expect(result.code).toBe(2);
    expect(result.stderr).toBe('zramfree: --si/--decimal only has effect in combination with -h.\n');
  });

  it('should refuse to run outside Linux', () => {
    procfs = createFullProcFs();

    const result = invoke([], procfs, 'darwin');

    expect(result.code).toBe(2);
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe('zramfree: zramfree can only run on Linux.\n');
  });

  it('should report an invalid configuration', () => {
    procfs = createFullProcFs();

    const result = invoke([], { ...procfs, env: { ...procfs.env, ZRAMFREE_UNIT: 'parsecs' } });

    expect(result.code).toBe(1);
    expect(result.stderr).toMatch(/^zramfree: Configuration validation failed: display\.unit: /);
  });

  it('should print help and version', () => {
    procfs = createFullProcFs();

    const help = invoke(['--help'], procfs);
    expect(help.code).toBe(0);
    expect(help.stdout).toContain('Usage: zramfree [options]');

    const version = invoke(['--version'], procfs);
    expect(version.stdout).toBe('zramfree 0.1.0\n');
  });
});
