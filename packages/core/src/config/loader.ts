import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import {
  ConfigError,
  ConfigSchema,
  findConfigWarnings,
  type Config,
  type ConfigInput,
  type Logger,
} from '@unilist/shared';

export const REPO_CONFIG_FILENAME = '.unilist.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Partial<Record<keyof ConfigInput, unknown>>; // CLI flags, validated with the rest
  cwd?: string; // Directory holding the repo config
  logger?: Logger; // Receives unknown-field warnings
}

type RawConfig = Record<string, unknown>;

export class ConfigLoader {
  static loadYaml(filePath: string): RawConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigError(`Config file ${filePath} must contain a YAML mapping`);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  static mergeConfigs(target: RawConfig, source: RawConfig): RawConfig {
    const output = { ...target };
    if (!source || Object.keys(source).length === 0) {
      return output;
    }

    for (const key in source) {
      if (Object.prototype.hasOwnProperty.call(source, key)) {
        const sourceValue = source[key];
        if (sourceValue === undefined) {
          continue;
        }
        // Arrays and primitives replace; the config has no nested objects.
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static async load(options: ConfigOptions = {}): Promise<Config> {
    const cwd = options.cwd || process.cwd();
    const fileLayers: Array<[string, RawConfig]> = [];

    // 1. Repo config: <cwd>/.unilist.yaml
    const repoConfigPath = path.join(cwd, REPO_CONFIG_FILENAME);
    fileLayers.push([repoConfigPath, this.loadYaml(repoConfigPath)]);

    // 2. Explicit --config file (if provided)
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      fileLayers.push([options.configPath, this.loadYaml(options.configPath)]);
    }

    // Merge in order of precedence: flags > explicit > repo
    let merged: RawConfig = {};
    for (const [source, layer] of fileLayers) {
      for (const warning of findConfigWarnings(layer, source)) {
        await options.logger?.warn(warning.message);
      }
      merged = this.mergeConfigs(merged, layer);
    }

    // 3. CLI flags
    merged = this.mergeConfigs(merged, Object.fromEntries(Object.entries(options.flags ?? {})));

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
