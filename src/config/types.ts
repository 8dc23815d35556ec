import type { MediaJobType } from '../services/jobQueue/types.js';

export interface DatabaseConfig {
  type: 'sqlite3';
  database: string;
  filename: string;
}

export interface StorageConfig {
  /** Root directory under which each source's download directory lives */
  downloadRoot: string;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: number; // megabytes
    maxFiles: number; // days
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface JobConfig {
  workers: number;
  pollIntervalMs: number;
  maxRetries: number;
  retryDelays: number[]; // milliseconds, indexed by attempt
}

export interface ReconcilerConfig {
  /**
   * Media job kinds whose permanent failure marks the item as skipped.
   * Failures of other media job kinds are only logged.
   */
  escalateMediaFailures: MediaJobType[];
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  database: DatabaseConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
  jobs: JobConfig;
  reconciler: ReconcilerConfig;
}
