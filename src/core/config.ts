/**
 * Centralized Configuration Module
 *
 * Type-safe environment variable management for the row cache.
 * All environment variables should be accessed through this module.
 */

import * as dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

/**
 * Log levels supported by the application
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Node environments
 */
export type NodeEnv = 'development' | 'production' | 'test';

/**
 * Defaults for every VirtualCache created without explicit options
 */
export interface CacheConfig {
  /** Largest pending request an adjacent request may be merged into */
  readonly mergeLimit: number;
  /** Rows fetched around a single referenced position */
  readonly batchSize: number;
  /** Batches requested up front once the total count is known */
  readonly prefetchBatches: number;
  /** How long requests accumulate before they are dispatched (ms); 0 dispatches inside ensureVisible */
  readonly dispatchDelayMs: number;
  /** Minimum age of an error row before visibility re-requests it (ms); 0 treats error rows like stubs */
  readonly errorRetryCooldownMs: number;
}

/**
 * Defaults for every WorkerChannel created without explicit options
 */
export interface WorkerConfig {
  /** Upper bound on how long the idle worker waits before re-checking its state (ms) */
  readonly pollIntervalMs: number;
  /** How long stop() waits for the current operation before abandoning it (ms) */
  readonly shutdownTimeoutMs: number;
  /** Completed operations kept in the statistics history */
  readonly statsHistory: number;
}

/**
 * Application configuration
 */
export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly logLevel: LogLevel;
  readonly cache: CacheConfig;
  readonly worker: WorkerConfig;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Parse and validate environment variables
 */
export class Config {
  private readonly config: AppConfig;

  constructor(private readonly env: Env = process.env) {
    this.config = this.parseEnvironment();
    this.validateConfig();
  }

  /**
   * Parse environment variables with defaults
   */
  private parseEnvironment(): AppConfig {
    return {
      nodeEnv: this.getNodeEnv(),
      logLevel: this.getLogLevel(),
      cache: {
        mergeLimit: this.getNumberEnv('ROWCACHE_MERGE_LIMIT', 96),
        batchSize: this.getNumberEnv('ROWCACHE_BATCH_SIZE', 24),
        prefetchBatches: this.getNumberEnv('ROWCACHE_PREFETCH_BATCHES', 8),
        dispatchDelayMs: this.getNumberEnv('ROWCACHE_DISPATCH_DELAY_MS', 0),
        errorRetryCooldownMs: this.getNumberEnv('ROWCACHE_ERROR_RETRY_COOLDOWN_MS', 0),
      },
      worker: {
        pollIntervalMs: this.getNumberEnv('ROWCACHE_POLL_INTERVAL_MS', 500),
        shutdownTimeoutMs: this.getNumberEnv('ROWCACHE_SHUTDOWN_TIMEOUT_MS', 2000),
        statsHistory: this.getNumberEnv('ROWCACHE_STATS_HISTORY', 10),
      },
    };
  }

  /**
   * Get Node environment with validation
   */
  private getNodeEnv(): NodeEnv {
    const env = this.env.NODE_ENV?.toLowerCase();
    if (env === 'production' || env === 'test') {
      return env;
    }
    return 'development';
  }

  /**
   * Get log level with validation
   */
  private getLogLevel(): LogLevel {
    const level = this.env.LOG_LEVEL?.toLowerCase();
    if (
      level === 'trace' ||
      level === 'debug' ||
      level === 'info' ||
      level === 'warn' ||
      level === 'error'
    ) {
      return level;
    }
    return 'info';
  }

  /**
   * Get numeric environment variable with default
   */
  private getNumberEnv(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      console.error(`Invalid number for ${key}="${value}", using default: ${defaultValue}`);
      return defaultValue;
    }
    return parsed;
  }

  /**
   * Validate configuration
   */
  private validateConfig(): void {
    const { cache, worker } = this.config;

    if (cache.mergeLimit < 0) {
      throw new Error('ROWCACHE_MERGE_LIMIT must be >= 0');
    }
    if (cache.batchSize < 1) {
      throw new Error('ROWCACHE_BATCH_SIZE must be >= 1');
    }
    if (cache.prefetchBatches < 0) {
      throw new Error('ROWCACHE_PREFETCH_BATCHES must be >= 0');
    }
    if (cache.dispatchDelayMs < 0 || cache.errorRetryCooldownMs < 0) {
      throw new Error('Cache delays must be >= 0');
    }
    if (worker.pollIntervalMs < 1) {
      throw new Error('ROWCACHE_POLL_INTERVAL_MS must be >= 1');
    }
    if (worker.shutdownTimeoutMs < 0) {
      throw new Error('ROWCACHE_SHUTDOWN_TIMEOUT_MS must be >= 0');
    }
    if (worker.statsHistory < 1) {
      throw new Error('ROWCACHE_STATS_HISTORY must be >= 1');
    }
  }

  /**
   * Get the full configuration
   */
  public getConfig(): Readonly<AppConfig> {
    return this.config;
  }

  public get nodeEnv(): NodeEnv {
    return this.config.nodeEnv;
  }

  public get logLevel(): LogLevel {
    return this.config.logLevel;
  }

  public get cache(): Readonly<CacheConfig> {
    return this.config.cache;
  }

  public get worker(): Readonly<WorkerConfig> {
    return this.config.worker;
  }

  public get isDevelopment(): boolean {
    return this.config.nodeEnv === 'development';
  }

  public get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }
}

// Create singleton instance
const configInstance = new Config();

// Export the singleton
export const config = configInstance;

// Export convenience accessors
export const cacheConfig = configInstance.cache;
export const workerConfig = configInstance.worker;
export const isDevelopment = configInstance.isDevelopment;
export const isTest = configInstance.isTest;
export const nodeEnv = configInstance.nodeEnv;
export const logLevel = configInstance.logLevel;
