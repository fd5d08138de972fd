import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import { getLogger } from '../logger/index.js';

type Section = keyof Config;
type RawConfig = Record<Section, Record<string, unknown>>;

interface EnvBinding {
  variable: string;
  section: Section;
  key: string;
  kind: 'string' | 'number' | 'boolean';
}

const SECTIONS: readonly Section[] = ['logging', 'display', 'sources'];

/**
 * Environment variables and the config entries they override
 */
const ENV_BINDINGS: readonly EnvBinding[] = [
  { variable: 'ZRAMFREE_LOG_LEVEL', section: 'logging', key: 'level', kind: 'string' },
  { variable: 'ZRAMFREE_LOG_FORMAT', section: 'logging', key: 'format', kind: 'string' },
  { variable: 'ZRAMFREE_UNIT', section: 'display', key: 'unit', kind: 'string' },
  { variable: 'ZRAMFREE_WIDTH', section: 'display', key: 'width', kind: 'number' },
  { variable: 'ZRAMFREE_SHOW_DISK_SWAP', section: 'display', key: 'showDiskSwap', kind: 'boolean' },
  { variable: 'ZRAMFREE_SHOW_ZRAM', section: 'display', key: 'showZram', kind: 'boolean' },
  { variable: 'ZRAMFREE_SHOW_PSI', section: 'display', key: 'showPsi', kind: 'boolean' },
  { variable: 'ZRAMFREE_SHOW_UNIT', section: 'display', key: 'showUnit', kind: 'boolean' },
  { variable: 'ZRAMFREE_MEMINFO_PATH', section: 'sources', key: 'meminfo', kind: 'string' },
  { variable: 'ZRAMFREE_SWAPS_PATH', section: 'sources', key: 'swaps', kind: 'string' },
  { variable: 'ZRAMFREE_PRESSURE_PATH', section: 'sources', key: 'pressure', kind: 'string' },
  { variable: 'ZRAMFREE_SYS_BLOCK_DIR', section: 'sources', key: 'sysBlockDir', kind: 'string' },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 * (command-line flags are applied on top by the CLI)
 */
export class ConfigLoader {
  private raw: RawConfig;
  private config: Config;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    // Load .env file if it exists
    loadEnv();

    // Start with defaults
    this.raw = this.cloneDefaults();

    // Load from config file if exists
    this.loadFromFile();

    // Override with environment variables
    this.loadFromEnv();

    // Validate final configuration
    this.config = this.validate();
  }

  private cloneDefaults(): RawConfig {
    return {
      logging: { ...defaultConfig.logging },
      display: { ...defaultConfig.display },
      sources: { ...defaultConfig.sources },
    };
  }

  /**
   * Path of the JSON config file
   */
  private configPath(): string {
    return this.env['ZRAMFREE_CONFIG'] ?? join(homedir(), '.config', 'zramfree', 'config.json');
  }

  /**
   * Load configuration from JSON file
   */
  private loadFromFile(): void {
    const configPath = this.configPath();
    if (!existsSync(configPath)) return;

    let fileConfig: unknown;
    try {
      fileConfig = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      getLogger().warn(`Failed to load config file ${configPath}`, { reason: errorMessage(error) });
      return;
    }

    if (!isRecord(fileConfig)) {
      getLogger().warn(`Ignoring config file ${configPath}: expected a JSON object`);
      return;
    }

    for (const section of SECTIONS) {
      const values = fileConfig[section];
      if (isRecord(values)) {
        Object.assign(this.raw[section], values);
      }
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(): void {
    for (const binding of ENV_BINDINGS) {
      const value = this.env[binding.variable];
      if (value === undefined || value === '') continue;

      switch (binding.kind) {
        case 'number':
          this.raw[binding.section][binding.key] = parseInt(value, 10);
          break;
        case 'boolean':
          this.raw[binding.section][binding.key] = value === 'true';
          break;
        case 'string':
          this.raw[binding.section][binding.key] = value;
          break;
      }
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(): Config {
    const result = ConfigSchema.safeParse(this.raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Configuration validation failed: ${issues}`, {
        issues: result.error.issues,
      });
    }
    return result.data;
  }

  /**
   * Get the current configuration
   */
  public getConfig(): Config {
    return this.config;
  }
}

// Export types
export type { Config } from './schema.js';
