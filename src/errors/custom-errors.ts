/**
 * Base error class for coursegrab
 */
export class CoursegrabError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CoursegrabError';
  }
}

/**
 * Configuration file could not be read or is invalid
 */
export class ConfigError extends CoursegrabError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Download request rejected before the session started
 */
export class ValidationError extends CoursegrabError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * A session is already running
 */
export class AlreadyRunningError extends CoursegrabError {
  constructor() {
    super('A download session is already running');
    this.name = 'AlreadyRunningError';
  }
}

/**
 * The external tool is missing or cannot be executed
 */
export class ProcessLaunchError extends CoursegrabError {
  constructor(
    message: string,
    public readonly command: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ProcessLaunchError';
  }
}

/**
 * The tool could not list the entries of a playlist or course
 */
export class EnumerationError extends CoursegrabError {
  constructor(
    message: string,
    public readonly url: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'EnumerationError';
  }
}

/**
 * Describe any thrown value in one line
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
