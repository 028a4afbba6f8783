/**
 * Raised when search options fail validation at setup.
 * `field` names the offending option.
 */
export class ConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}

/**
 * The TLD list could not be fetched or was empty. Ends a run with zero
 * results; never fatal to the host process.
 */
export class TldListUnavailableError extends Error {
  readonly url: string;

  constructor(url: string, reason?: string) {
    super(`Unable to obtain TLD list from ${url}${reason ? ` (${reason})` : ''}`);
    this.name = 'TldListUnavailableError';
    this.url = url;
  }
}
