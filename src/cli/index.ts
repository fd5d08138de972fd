/**
 * zramfree command-line entry
 */

import { ConfigLoader } from '../config/index.js';
import { ErrorCode, UsageError, errorMessage, exitCodeFor, isError } from '../errors/index.js';
import { Logger, setLogger } from '../logger/index.js';
import { buildReport } from '../report/index.js';
import { HELP_TEXT, VERSION, parseCliArgs, resolveOptions } from './args.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  platform: process.platform,
  env: process.env,
};

/**
 * Run one invocation and return its exit status. Output is all or nothing:
 * on error only the diagnostic line is written.
 */
export function run(argv: readonly string[], io: Partial<CliIO> = {}): number {
  const { stdout, stderr, platform, env } = { ...defaultIO, ...io };
  let logger: Logger | null = null;

  try {
    const flags = parseCliArgs(argv);
    if (flags.help) {
      stdout(`${HELP_TEXT}\n`);
      return 0;
    }
    if (flags.version) {
      stdout(`zramfree ${VERSION}\n`);
      return 0;
    }

    const config = new ConfigLoader(env).getConfig();
    logger = new Logger(config.logging);
    setLogger(logger);

    const options = resolveOptions(flags, config.display);
    if (platform !== 'linux') {
      throw new UsageError('zramfree can only run on Linux.', ErrorCode.UNSUPPORTED_PLATFORM, { platform });
    }

    logger.debug('Building report', { options, sources: config.sources });
    stdout(`${buildReport(options, config.sources)}\n`);
    return 0;
  } catch (error) {
    const message = errorMessage(error);
    logger?.debug('Aborting', { error: isError(error) ? error.stack : message });
    stderr(`zramfree: ${message}\n`);
    return exitCodeFor(error);
  }
}
