/**
 * Application Errors
 *
 * Every failure raised by the host carries an HTTP status and a stable code,
 * so the error handler can answer with a consistent JSON body.
 */

// ============================================
// Error Types
// ============================================

/**
 * Base application error with status code
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(message: string, statusCode: number = 500, code: string = 'INTERNAL_ERROR') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type UrlValue = string | number;

export type UrlValues = Record<string, UrlValue | undefined>;

/**
 * Raised when no rule of a route table can build the requested endpoint.
 */
export class BuildError extends AppError {
  public readonly endpoint: string;
  public readonly values: UrlValues;
  public readonly method?: string;

  constructor(endpoint: string, values: UrlValues, method?: string, reason?: string) {
    const base = `Could not build url for endpoint '${endpoint}'`;
    super(reason ? `${base}. ${reason}` : `${base}.`, 500, 'BUILD_ERROR');
    this.endpoint = endpoint;
    this.values = values;
    this.method = method;
  }
}

/**
 * A configuration key was read but never set.
 */
export class MissingConfigError extends AppError {
  public readonly key: string;

  constructor(key: string, message: string = `Missing configuration value '${key}'`) {
    super(message, 500, 'CONFIG_MISSING');
    this.key = key;
  }
}

/**
 * An entry point could not be discovered or loaded.
 */
export class EntryPointError extends AppError {
  constructor(message: string) {
    super(message, 500, 'ENTRY_POINT_ERROR');
  }
}

export class BlueprintError extends AppError {
  constructor(message: string) {
    super(message, 500, 'BLUEPRINT_ERROR');
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}
