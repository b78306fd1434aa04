import { config as loadEnv } from 'dotenv';
import { ConfigSchema, type Config, type Tool } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

type Overrides = { [key: string]: unknown };

const TOOL_ENV: Record<Tool, string> = {
  lsblk: 'LVMSCOPE_LSBLK_PATH',
  pvs: 'LVMSCOPE_PVS_PATH',
  vgs: 'LVMSCOPE_VGS_PATH',
  lvs: 'LVMSCOPE_LVS_PATH',
  df: 'LVMSCOPE_DF_PATH',
  parted: 'LVMSCOPE_PARTED_PATH',
};

/**
 * Load configuration from environment variables.
 * Priority: Environment Variables (including .env) > Defaults
 */
export class ConfigLoader {
  private config: Config;

  constructor() {
    // Load .env file if it exists
    loadEnv();
    const env = process.env;

    const logging: Overrides = { ...defaultConfig.logging };
    const commands: Overrides = { ...defaultConfig.commands };
    const paths: Overrides = { ...defaultConfig.commands.paths };
    const ui: Overrides = { ...defaultConfig.ui };

    this.loadFromEnv(env, { logging, commands, paths, ui });
    commands['paths'] = paths;

    this.config = this.validate({ logging, commands, ui });
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(
    env: NodeJS.ProcessEnv,
    target: { logging: Overrides; commands: Overrides; paths: Overrides; ui: Overrides }
  ): void {
    // Logging configuration
    if (env['LVMSCOPE_LOG_LEVEL']) {
      target.logging['level'] = env['LVMSCOPE_LOG_LEVEL'];
    }
    if (env['LVMSCOPE_LOG_FORMAT']) {
      target.logging['format'] = env['LVMSCOPE_LOG_FORMAT'];
    }
    if (env['LVMSCOPE_LOG_DIR']) {
      target.logging['dir'] = env['LVMSCOPE_LOG_DIR'];
    }
    if (env['LVMSCOPE_LOG_MAX_FILES']) {
      target.logging['maxFiles'] = parseInt(env['LVMSCOPE_LOG_MAX_FILES'], 10);
    }
    if (env['LVMSCOPE_LOG_MAX_SIZE']) {
      target.logging['maxSize'] = env['LVMSCOPE_LOG_MAX_SIZE'];
    }
    if (env['LVMSCOPE_LOG_CONSOLE']) {
      target.logging['console'] = env['LVMSCOPE_LOG_CONSOLE'] === 'true';
    }
    if (env['LVMSCOPE_LOG_FILE']) {
      target.logging['file'] = env['LVMSCOPE_LOG_FILE'] === 'true';
    }

    // Command gateway configuration
    if (env['LVMSCOPE_COMMAND_TIMEOUT']) {
      target.commands['timeoutMs'] = parseInt(env['LVMSCOPE_COMMAND_TIMEOUT'], 10);
    }
    if (env['LVMSCOPE_PROBE_PARTITIONS']) {
      target.commands['probePartitions'] = env['LVMSCOPE_PROBE_PARTITIONS'] === 'true';
    }
    for (const [tool, variable] of Object.entries(TOOL_ENV)) {
      const value = env[variable];
      if (value) {
        target.paths[tool] = value;
      }
    }

    // UI configuration
    if (env['LVMSCOPE_REFRESH_INTERVAL']) {
      target.ui['refreshIntervalMs'] = parseInt(env['LVMSCOPE_REFRESH_INTERVAL'], 10);
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(candidate: unknown): Config {
    const result = ConfigSchema.safeParse(candidate);
    if (!result.success) {
      const details = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Configuration validation failed: ${details}`, {
        issues: result.error.issues.length,
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

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export type { Config, Tool } from './schema.js';
