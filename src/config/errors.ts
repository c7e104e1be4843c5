/**
 * Setup errors. Both are fatal: they stop the run before any question is sent.
 */

/**
 * Missing credential, malformed config, unknown provider or advisor, bad CLI argument
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Unreadable question file, missing column or duplicate question id
 */
export class DatasetError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(message);
    this.name = 'DatasetError';
  }
}
