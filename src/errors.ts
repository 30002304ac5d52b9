/**
 * Error types raised by the harvester.
 *
 * Forbidden responses and malformed payloads are not errors here: the former
 * come back as a regular 403 response, the latter degrade to defaults.
 */

export class HarvestError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HarvestError';
  }
}

/**
 * The network kept failing after every allowed retry.
 */
export class TransientNetworkError extends HarvestError {
  constructor(path: string, attempts: number, public cause?: unknown) {
    super(
      `Network failure for ${path} after ${attempts} attempts`,
      'TRANSIENT_NETWORK',
      { path, attempts }
    );
    this.name = 'TransientNetworkError';
  }
}

/**
 * The upstream still reported an exhausted quota after the allowed number of
 * waits for the same request.
 */
export class QuotaExhaustedError extends HarvestError {
  constructor(path: string, waits: number) {
    super(
      `Rate limit still exhausted for ${path} after ${waits} waits`,
      'QUOTA_EXHAUSTED',
      { path, waits }
    );
    this.name = 'QuotaExhaustedError';
  }
}

export class ConfigError extends HarvestError {
  constructor(public problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 'CONFIG_INVALID', { problems });
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
