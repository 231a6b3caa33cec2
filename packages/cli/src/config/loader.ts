import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import {
  ConfigError,
  TagscanConfigSchema,
  type TagscanConfig,
  type TagscanConfigInput,
} from '@tagscan/shared';

export const CONFIG_FILE = '.tagscan.yaml';

type ConfigRecord = Record<string, unknown>;

export interface ConfigOptions {
  /** Explicit `--config` path; disables the upward search */
  configPath?: string;
  /** Where the upward search for `.tagscan.yaml` starts */
  cwd?: string;
  /** CLI flags, applied last */
  flags?: TagscanConfigInput;
}

export interface LoadedConfig {
  config: TagscanConfig;
  /** The file the values came from, if any */
  configPath?: string;
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static findConfigFile(startDir: string): string | undefined {
    let dir = path.resolve(startDir);
    for (;;) {
      const candidate = path.join(dir, CONFIG_FILE);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
      const parent = path.dirname(dir);
      if (parent === dir) {
        return undefined;
      }
      dir = parent;
    }
  }

  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      // Arrays and primitives replace
      output[key] =
        isRecord(sourceValue) && isRecord(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static load(options: ConfigOptions = {}): LoadedConfig {
    const cwd = options.cwd ?? process.cwd();

    let configPath: string | undefined;
    if (options.configPath) {
      configPath = path.resolve(options.configPath);
      if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
    } else {
      configPath = this.findConfigFile(cwd);
    }

    const fileConfig = configPath ? this.loadYaml(configPath) : {};
    const merged = this.mergeConfigs(fileConfig, options.flags ?? {});

    const result = TagscanConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: configPath ? { configPath } : undefined,
      });
    }

    return { config: result.data, configPath };
  }
}
