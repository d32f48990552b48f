export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface TargetConfig {
  path: string; // As configured; used in confirmation output
  resolvedPath: string; // Absolute path the file is read from and written to
  line?: number; // Zero-based index pinning the version line; key match when unset
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface SyncConfig {
  version: string;
  targets: TargetConfig[];
  scanLimit: number; // Lines searched for the version key
  logging: LoggingConfig;
}

export interface CliOptions {
  config?: string;
  setVersion?: string;
  logLevel?: string;
}
