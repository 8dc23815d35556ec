import dotenv from 'dotenv';
import { AppConfig, DatabaseConfig, JobConfig, ReconcilerConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';
import { MEDIA_JOB_TYPES, MediaJobType } from '../services/jobQueue/types.js';

type Env = Record<string, string | undefined>;

export class ConfigManager {
  private static instance: ConfigManager | null = null;
  private config: AppConfig;

  private constructor(private readonly env: Env = process.env) {
    if (env === process.env) {
      dotenv.config();
    }
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Build a standalone manager from an explicit environment (no .env file, no singleton)
   */
  static fromEnv(env: Env): ConfigManager {
    return new ConfigManager(env);
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = JSON.parse(JSON.stringify(defaultConfig));

    config.env = this.getEnum('NODE_ENV', config.env, ['development', 'production', 'test']);

    // Database configuration
    config.database.filename = this.getString('DB_FILE', config.database.filename);

    // Storage
    config.storage.downloadRoot = this.getString('DOWNLOAD_ROOT', config.storage.downloadRoot);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    // Job queue
    config.jobs.workers = this.getNumber('JOB_WORKERS', config.jobs.workers);
    config.jobs.pollIntervalMs = this.getNumber('JOB_POLL_INTERVAL_MS', config.jobs.pollIntervalMs);
    config.jobs.maxRetries = this.getNumber('JOB_MAX_RETRIES', config.jobs.maxRetries);
    config.jobs.retryDelays = this.getNumberArray('JOB_RETRY_DELAYS_MS', config.jobs.retryDelays);

    // Reconciler
    config.reconciler.escalateMediaFailures = this.getStringArray(
      'ESCALATE_MEDIA_FAILURES',
      config.reconciler.escalateMediaFailures
    ).map(kind => this.toMediaJobType(kind));

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = this.env[key];
    return value || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed) || parsed < 0) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a non-negative number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray<T extends string>(key: string, defaultValue: T[]): string[] {
    const value = this.env[key];
    if (value === undefined) {
      return [...defaultValue];
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getNumberArray(key: string, defaultValue: number[]): number[] {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
      .map(item => {
        const parsed = parseInt(item, 10);
        if (isNaN(parsed) || parsed < 0) {
          throw new ConfigurationError(key, `Environment variable ${key} must be a list of non-negative numbers`);
        }
        return parsed;
      });
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (!match) {
      throw new ConfigurationError(key, `Environment variable ${key} must be one of: ${validValues.join(', ')}`);
    }
    return match;
  }

  private toMediaJobType(value: string): MediaJobType {
    const match = MEDIA_JOB_TYPES.find(kind => kind === value);
    if (!match) {
      throw new ConfigurationError(
        'ESCALATE_MEDIA_FAILURES',
        `Unknown media job kind '${value}' (expected one of: ${MEDIA_JOB_TYPES.join(', ')})`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  getJobConfig(): JobConfig {
    return this.config.jobs;
  }

  getReconcilerConfig(): ReconcilerConfig {
    return this.config.reconciler;
  }

  reload(): void {
    if (this.env === process.env) {
      dotenv.config();
    }
    this.config = this.loadConfig();
  }

  validate(): void {
    const errors: string[] = [];

    if (this.config.jobs.workers < 1) {
      errors.push('JOB_WORKERS must be at least 1');
    }

    if (this.config.jobs.maxRetries < 1) {
      errors.push('JOB_MAX_RETRIES must be at least 1');
    }

    if (this.config.jobs.retryDelays.length === 0) {
      errors.push('JOB_RETRY_DELAYS_MS must list at least one delay');
    }

    if (errors.length > 0) {
      throw new ConfigurationError('config', `Configuration validation failed:\n${errors.join('\n')}`);
    }
  }
}
