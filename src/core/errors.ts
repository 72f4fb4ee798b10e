export class MonitorError extends Error {
  suggestions: string[];
  retriable: boolean;

  constructor(message: string, suggestions: string[] = [], retriable = false) {
    super(message);
    this.name = 'MonitorError';
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

/**
 * Error thrown when configuration is missing or malformed.
 * Always fatal: raised at construction time, never corrected silently.
 */
export class ConfigurationError extends MonitorError {
  configKey?: string;

  constructor(message: string, options?: { configKey?: string }) {
    super(
      message,
      [
        'Check the configuration file, environment variables and CLI flags.',
        'Ensure all required configuration keys are set.',
        'Verify the configuration values are in the correct format.'
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}

/**
 * Error raised inside the data source when a fetch attempt fails.
 * Never crosses into the metric core: the source turns it into a failed outcome.
 */
export class FetchError extends MonitorError {
  status?: number;
  code?: string;
  /** Server-requested delay before the next attempt, in ms */
  retryAfter?: number;

  constructor(
    message: string,
    options?: { status?: number; code?: string; retriable?: boolean; retryAfter?: number }
  ) {
    const status = options?.status;
    super(
      message,
      [
        'Verify network connectivity to the weather API.',
        'Check that the API key is valid and has not expired.',
        'Confirm the station ID exists and is reporting.'
      ],
      options?.retriable ?? (status === undefined || isRetryableStatus(status))
    );
    this.name = 'FetchError';
    this.status = status;
    this.code = options?.code;
    this.retryAfter = options?.retryAfter;
  }
}

/**
 * Error thrown when a payload or file cannot be parsed
 */
export class ParseError extends MonitorError {
  format?: string;

  constructor(message: string, options?: { format?: string }) {
    super(
      message,
      [
        'Verify the input is in the expected format.',
        'Check the API key and station ID; the API answers invalid keys with non-JSON bodies.'
      ],
      false
    );
    this.name = 'ParseError';
    this.format = options?.format;
  }
}

export function isRetryableStatus(status: number): boolean {
  return [408, 425, 429, 500, 502, 503, 504].includes(status);
}
