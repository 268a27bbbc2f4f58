import { join } from 'path';
import type { AappConfig, EntryPointRules, ProviderConfig } from '../types/index.js';
import { DEFAULT_ENTRY_POINT_RULES, DEFAULT_PROVIDER, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError, describeError } from '../utils/errors.js';

/**
 * Configuration management for the aapp CLI
 * Supports both JSON and JSONC formats
 */

export function getDefaultConfig(): AappConfig {
  return {
    provider: { command: DEFAULT_PROVIDER.command, args: [...DEFAULT_PROVIDER.args] },
    entryPoint: {
      extensions: [...DEFAULT_ENTRY_POINT_RULES.extensions],
      marker: DEFAULT_ENTRY_POINT_RULES.marker
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function parseProvider(raw: unknown, fallback: ProviderConfig, source: string): ProviderConfig {
  if (raw === undefined) {
    return fallback;
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid config ${source}: 'provider' must be an object`);
  }

  const provider = { ...fallback };
  const { command, args } = raw;

  if (command !== undefined) {
    if (typeof command !== 'string' || command.length === 0) {
      throw new ConfigError(`Invalid config ${source}: 'provider.command' must be a non-empty string`);
    }
    provider.command = command;
  }

  if (args !== undefined) {
    if (!isStringArray(args)) {
      throw new ConfigError(`Invalid config ${source}: 'provider.args' must be an array of strings`);
    }
    provider.args = args;
  }

  return provider;
}

function parseEntryPoint(raw: unknown, fallback: EntryPointRules, source: string): EntryPointRules {
  if (raw === undefined) {
    return fallback;
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid config ${source}: 'entryPoint' must be an object`);
  }

  const rules = { ...fallback };
  const { extensions, marker } = raw;

  if (extensions !== undefined) {
    if (!isStringArray(extensions)) {
      throw new ConfigError(`Invalid config ${source}: 'entryPoint.extensions' must be an array of strings`);
    }
    rules.extensions = extensions;
  }

  if (marker !== undefined) {
    if (typeof marker !== 'string' || marker.length === 0) {
      throw new ConfigError(`Invalid config ${source}: 'entryPoint.marker' must be a non-empty string`);
    }
    rules.marker = marker;
  }

  return rules;
}

/**
 * Merge a parsed config document over the defaults.
 */
export function parseConfig(raw: unknown, source: string = 'file'): AappConfig {
  const defaults = getDefaultConfig();
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid config ${source}: expected an object`);
  }

  return {
    provider: parseProvider(raw.provider, defaults.provider, source),
    entryPoint: parseEntryPoint(raw.entryPoint, defaults.entryPoint, source)
  };
}

export class ConfigManager {
  private config: AappConfig | null = null;

  constructor(
    private readonly configDir: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Find the existing config file (config.jsonc first, then config.json)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, falling back to defaults when none exists.
   * Environment overrides are applied last.
   */
  async load(): Promise<AappConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    let config: AappConfig;

    if (configPath) {
      logger.debug(`Loading config from: ${configPath}`);
      let raw: unknown;
      try {
        raw = await readJsonOrJsoncFile(configPath);
      } catch (error) {
        throw new ConfigError(`Failed to load config ${configPath}: ${describeError(error)}`, { error });
      }
      config = parseConfig(raw, configPath);
    } else {
      logger.debug('No config file found, using defaults', { configDir: this.configDir });
      config = getDefaultConfig();
    }

    const providerOverride = this.env[ENV_VARS.PROVIDER];
    if (providerOverride) {
      logger.debug(`Provider command overridden by ${ENV_VARS.PROVIDER}: ${providerOverride}`);
      config = { ...config, provider: { ...config.provider, command: providerOverride } };
    }

    this.config = config;
    return config;
  }
}
