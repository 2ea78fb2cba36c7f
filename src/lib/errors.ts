import type { UploadFailureState } from './types';

/**
 * Missing or invalid page configuration or credentials. Aborts before any network call.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Scraping provider failed or returned an unusable response
 */
export class FetchError extends Error {
  status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'FetchError';
    this.status = status;
  }
}

/**
 * Upload ended in a terminal failure state
 */
export class UploadError extends Error {
  state: UploadFailureState;
  status?: number;
  /** Transient failure worth another attempt */
  retryable: boolean;

  constructor(
    state: UploadFailureState,
    message: string,
    options: { status?: number; retryable?: boolean } = {}
  ) {
    super(message);
    this.name = 'UploadError';
    this.state = state;
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

export class PublishError extends Error {
  status?: number;
  retryable: boolean;

  constructor(message: string, options: { status?: number; retryable?: boolean } = {}) {
    super(message);
    this.name = 'PublishError';
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

export class PersistenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
