import * as fs from 'fs';
import * as path from 'path';
import * as toml from 'toml';
import { CliOptions, LogLevel, SyncConfig, TargetConfig } from '../types/config';
import { isLogLevel, LOG_LEVELS } from '../utils/logger';
import { DEFAULT_SCAN_LIMIT } from '../services/versionLocator';

export const DEFAULT_VERSION = '0.2.5';

export const DEFAULT_TARGET_PATHS: readonly string[] = [
  './vec-utils/Cargo.toml',
  './vec-utils-py/Cargo.toml',
  './vec-utils-py/pyproject.toml',
];

export const CONFIG_FILE_NAME = 'version-sync.toml';
export const CONFIG_ENV_VAR = 'VERSION_SYNC_CONFIG';

export class ConfigLoader {
  /**
   * Loads configuration from the first source that exists:
   * 1. CLI --config parameter
   * 2. VERSION_SYNC_CONFIG environment variable
   * 3. ./version-sync.toml
   * 4. Built-in defaults
   *
   * --set-version and --log-level are applied on top.
   */
  public static loadConfig(cliOptions: CliOptions, cwd: string = process.cwd()): SyncConfig {
    const configPath = this.findConfigPath(cliOptions, cwd);
    const config = configPath ? this.parseConfigFile(configPath) : this.getDefaultConfig(cwd);

    return this.applyOverrides(config, cliOptions);
  }

  public static getDefaultConfig(cwd: string = process.cwd()): SyncConfig {
    return {
      version: DEFAULT_VERSION,
      targets: DEFAULT_TARGET_PATHS.map(targetPath => ({
        path: targetPath,
        resolvedPath: path.resolve(cwd, targetPath),
      })),
      scanLimit: DEFAULT_SCAN_LIMIT,
      logging: { level: 'info' },
    };
  }

  private static findConfigPath(cliOptions: CliOptions, cwd: string): string | null {
    if (cliOptions.config) {
      const cliPath = path.resolve(cwd, cliOptions.config);
      if (fs.existsSync(cliPath)) {
        return cliPath;
      }
      throw new Error(`Config file specified via CLI not found: ${cliOptions.config}`);
    }

    const envConfigPath = process.env[CONFIG_ENV_VAR];
    if (envConfigPath) {
      const envPath = path.resolve(cwd, envConfigPath);
      if (fs.existsSync(envPath)) {
        return envPath;
      }
      throw new Error(`Config file specified via ${CONFIG_ENV_VAR} env var not found: ${envConfigPath}`);
    }

    const defaultPath = path.join(cwd, CONFIG_FILE_NAME);
    if (fs.existsSync(defaultPath)) {
      return defaultPath;
    }

    return null;
  }

  private static parseConfigFile(configPath: string): SyncConfig {
    try {
      const configContent = fs.readFileSync(configPath, 'utf-8');
      const parsed: unknown = toml.parse(configContent);

      return this.validateConfig(parsed, path.dirname(configPath));
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to parse config file ${configPath}: ${error.message}`);
      }
      throw error;
    }
  }

  private static validateConfig(parsed: unknown, baseDir: string): SyncConfig {
    if (!isRecord(parsed)) {
      throw new Error('Config root must be a table');
    }

    const version = parsed.version;
    if (typeof version !== 'string' || version.trim() === '') {
      throw new Error('Missing or invalid version. It must be a non-empty string.');
    }

    const rawTargets = parsed.targets;
    if (!Array.isArray(rawTargets) || rawTargets.length === 0) {
      throw new Error('Missing or empty targets array in config. At least one target must be configured.');
    }

    const seen = new Set<string>();
    const targets: TargetConfig[] = rawTargets.map((entry: unknown, i: number) => {
      if (!isRecord(entry)) {
        throw new Error(`Target ${i + 1}: must be a table`);
      }

      const targetPath = entry.path;
      if (typeof targetPath !== 'string' || targetPath.trim() === '') {
        throw new Error(`Target ${i + 1}: Missing or invalid path`);
      }

      const resolvedPath = path.resolve(baseDir, targetPath);
      if (seen.has(resolvedPath)) {
        throw new Error(`Duplicate target path: "${targetPath}"`);
      }
      seen.add(resolvedPath);

      const line = entry.line;
      if (line !== undefined && !isNonNegativeInteger(line)) {
        throw new Error(`Target "${targetPath}": line must be a non-negative integer`);
      }

      const target: TargetConfig = { path: targetPath, resolvedPath };
      if (line !== undefined) {
        target.line = line;
      }
      return target;
    });

    const scanLimit = parsed.scanLimit ?? DEFAULT_SCAN_LIMIT;
    if (!isNonNegativeInteger(scanLimit) || scanLimit === 0) {
      throw new Error('Invalid scanLimit. It must be a positive integer.');
    }

    return {
      version,
      targets,
      scanLimit,
      logging: { level: this.parseLoggingLevel(parsed.logging) },
    };
  }

  private static parseLoggingLevel(logging: unknown): LogLevel {
    if (logging === undefined) {
      return 'info';
    }
    if (!isRecord(logging)) {
      throw new Error('[logging] must be a table');
    }
    const level = logging.level ?? 'info';
    if (!isLogLevel(level)) {
      throw new Error(`Invalid logging.level "${String(level)}". Expected one of: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
  }

  private static applyOverrides(config: SyncConfig, cliOptions: CliOptions): SyncConfig {
    const result: SyncConfig = { ...config, logging: { ...config.logging } };

    if (cliOptions.setVersion !== undefined) {
      if (cliOptions.setVersion.trim() === '') {
        throw new Error('--set-version must not be empty');
      }
      result.version = cliOptions.setVersion;
    }

    if (cliOptions.logLevel !== undefined) {
      if (!isLogLevel(cliOptions.logLevel)) {
        throw new Error(`Invalid --log-level "${cliOptions.logLevel}". Expected one of: ${LOG_LEVELS.join(', ')}`);
      }
      result.logging.level = cliOptions.logLevel;
    }

    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}
