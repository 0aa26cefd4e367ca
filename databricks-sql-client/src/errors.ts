/**
 * Error classes raised by the client itself.
 *
 * Failures coming from the Databricks driver (unreachable host, rejected
 * token, malformed SQL) are never wrapped; they reach the caller as thrown.
 */

export class DatabricksClientError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DatabricksClientError';
  }
}

/**
 * Connection parameters missing or empty
 */
export class ConnectionError extends DatabricksClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', details);
    this.name = 'ConnectionError';
  }
}

/**
 * Statement submitted without an open session
 */
export class QueryError extends DatabricksClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'QUERY_ERROR', details);
    this.name = 'QueryError';
  }
}

/**
 * Row shape does not match the result's columns
 */
export class ConversionError extends DatabricksClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONVERSION_ERROR', details);
    this.name = 'ConversionError';
  }
}

export class ConfigurationError extends DatabricksClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
