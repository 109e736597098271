/**
 * Custom error classes for the inventory engines
 * Every error carries a stable code and a message safe to show to an operator
 */

/**
 * Base application error
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Rejected user input, e.g. non-integer text typed into an integer cell
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * An optional table or column is absent from the store
 */
export class SchemaUnavailableError extends AppError {
  public readonly table: string;
  public readonly missingColumns: readonly string[];

  constructor(table: string, missingColumns: readonly string[]) {
    super(
      missingColumns.length > 0
        ? `Table ${table} is missing columns: ${missingColumns.join(', ')}`
        : `Table ${table} is not available`,
      'SCHEMA_UNAVAILABLE',
      503
    );
    this.name = 'SchemaUnavailableError';
    this.table = table;
    this.missingColumns = missingColumns;
  }
}

/**
 * Database connection error
 */
export class DatabaseConnectionError extends AppError {
  constructor(message = 'Database connection failed') {
    super(message, 'DATABASE_CONNECTION_ERROR', 503);
    this.name = 'DatabaseConnectionError';
  }
}

/**
 * Database operation error (query failed, constraint violation, etc.)
 */
export class DatabaseOperationError extends AppError {
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(operation: string, message: string, originalError?: Error) {
    super(`Database ${operation} failed: ${message}`, 'DATABASE_OPERATION_ERROR', 500);
    this.name = 'DatabaseOperationError';
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Database configuration error
 * Thrown when database is not properly configured
 */
export class DatabaseConfigError extends AppError {
  public readonly repository: string;

  constructor(repository: string, message?: string) {
    super(message ?? 'Database connection not configured', 'DATABASE_CONFIG_ERROR', 503);
    this.name = 'DatabaseConfigError';
    this.repository = repository;
  }
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
