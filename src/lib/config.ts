/**
 * Default configuration for the reposting workflow
 * These values can be overridden via environment variables
 */

import type { RetryPolicy } from './retry';
import { ConfigurationError } from './errors';

export interface ScheduleConfig {
  /** IANA zone the strategic times are expressed in */
  timezone: string;
  /** Times of day as HH:MM, ascending */
  strategicTimes: string[];
}

export interface UploadConfig {
  downloadTimeoutMs: number;
  transferTimeoutMs: number;
  pollIntervalMs: number;
  maxProcessingWaitMs: number;
}

export interface AppConfig {
  schedule: ScheduleConfig;
  upload: UploadConfig;
  retry: {
    upload: RetryPolicy;
    publish: RetryPolicy;
  };
  results: {
    retention: number;
  };
}

/**
 * Default configuration values
 * Can be overridden via environment variables in .env
 */
export const DEFAULT_CONFIG: AppConfig = {
  schedule: {
    timezone: 'America/Panama',

    // 10am, 2pm, 6pm local
    strategicTimes: ['10:00', '14:00', '18:00'],
  },

  upload: {
    downloadTimeoutMs: 30_000,

    // Large videos need longer than a regular API call
    transferTimeoutMs: 120_000,

    pollIntervalMs: 2_000,
    maxProcessingWaitMs: 300_000,
  },

  retry: {
    upload: { maxAttempts: 3, baseDelayMs: 2_000, maxDelayMs: 30_000, jitter: 0.2 },
    publish: { maxAttempts: 3, baseDelayMs: 5_000, maxDelayMs: 60_000, jitter: 0.2 },
  },

  results: {
    // Keep the last 100 page results
    retention: 100,
  },
};

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Parse a comma-separated HH:MM list into a sorted, de-duplicated list
 */
export function parseStrategicTimes(value: string): string[] {
  const times = value
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0);

  if (times.length === 0) {
    throw new ConfigurationError('STRATEGIC_TIMES must list at least one HH:MM time');
  }

  for (const time of times) {
    if (!TIME_OF_DAY.test(time)) {
      throw new ConfigurationError(`Invalid strategic time "${time}", expected HH:MM`);
    }
  }

  return Array.from(new Set(times)).sort();
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Load configuration with environment variable overrides
 */
export function getConfig(): AppConfig {
  return {
    schedule: {
      timezone: process.env.SCHEDULE_TIMEZONE || DEFAULT_CONFIG.schedule.timezone,
      strategicTimes: process.env.STRATEGIC_TIMES
        ? parseStrategicTimes(process.env.STRATEGIC_TIMES)
        : DEFAULT_CONFIG.schedule.strategicTimes,
    },
    upload: {
      downloadTimeoutMs: intFromEnv('DOWNLOAD_TIMEOUT_MS', DEFAULT_CONFIG.upload.downloadTimeoutMs),
      transferTimeoutMs: intFromEnv('UPLOAD_TRANSFER_TIMEOUT_MS', DEFAULT_CONFIG.upload.transferTimeoutMs),
      pollIntervalMs: intFromEnv('UPLOAD_POLL_INTERVAL_MS', DEFAULT_CONFIG.upload.pollIntervalMs),
      maxProcessingWaitMs: intFromEnv('UPLOAD_MAX_WAIT_MS', DEFAULT_CONFIG.upload.maxProcessingWaitMs),
    },
    retry: {
      upload: {
        ...DEFAULT_CONFIG.retry.upload,
        maxAttempts: intFromEnv('UPLOAD_MAX_ATTEMPTS', DEFAULT_CONFIG.retry.upload.maxAttempts),
      },
      publish: {
        ...DEFAULT_CONFIG.retry.publish,
        maxAttempts: intFromEnv('PUBLISH_MAX_ATTEMPTS', DEFAULT_CONFIG.retry.publish.maxAttempts),
      },
    },
    results: {
      retention: intFromEnv('RESULTS_RETENTION', DEFAULT_CONFIG.results.retention),
    },
  };
}

// Singleton instance
let configInstance: AppConfig | null = null;

/**
 * Get the application configuration (loads once)
 */
export function getAppConfig(): AppConfig {
  if (!configInstance) {
    configInstance = getConfig();
  }
  return configInstance;
}
