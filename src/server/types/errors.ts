/**
 * Centralized error type definitions for the verdict parser
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Document parsing invariants
  DUPLICATE_SECTION = 'DUPLICATE_SECTION',
  DUPLICATE_KEY = 'DUPLICATE_KEY',
  FIELD_COUNT_MISMATCH = 'FIELD_COUNT_MISMATCH',

  // I/O and setup
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a document breaks one of the structural invariants of the
 * record format. Fatal for that document only.
 */
export class DocumentParseError extends AppError {
  public readonly sourcePath: string;

  constructor(message: string, code: ErrorCode, sourcePath: string, context?: Record<string, unknown>) {
    super(message, code, true, { sourcePath, ...context });
    this.sourcePath = sourcePath;
  }
}

export class DuplicateSectionError extends DocumentParseError {
  public readonly section: string;

  constructor(section: string, sourcePath: string) {
    super(
      `Multiple ${section} divisions found in ${sourcePath}.`,
      ErrorCode.DUPLICATE_SECTION,
      sourcePath,
      { section }
    );
    this.section = section;
  }
}

export class DuplicateKeyError extends DocumentParseError {
  public readonly section: string;
  public readonly keys: string[];

  constructor(section: string, keys: string[], sourcePath: string) {
    const sortedKeys = [...keys].sort();
    super(
      `Duplicate keys found while merging ${section} in ${sourcePath}: ${sortedKeys.join(', ')}`,
      ErrorCode.DUPLICATE_KEY,
      sourcePath,
      { section, keys: sortedKeys }
    );
    this.section = section;
    this.keys = sortedKeys;
  }
}

export class FieldCountMismatchError extends DocumentParseError {
  public readonly labelCount: number;
  public readonly contentCount: number;

  constructor(labelCount: number, contentCount: number, sourcePath: string) {
    super(
      `Field label/content count mismatch in ${sourcePath}: ${labelCount} labels, ${contentCount} contents`,
      ErrorCode.FIELD_COUNT_MISMATCH,
      sourcePath,
      { labelCount, contentCount }
    );
    this.labelCount = labelCount;
    this.contentCount = contentCount;
  }
}

export class DownloadError extends AppError {
  public readonly url: string;
  public readonly statusCode?: number;

  constructor(url: string, message: string, statusCode?: number) {
    super(
      `Download failed for ${url}${statusCode ? ` (HTTP ${statusCode})` : ''}: ${message}`,
      ErrorCode.DOWNLOAD_FAILED,
      true,
      { url, statusCode }
    );
    this.url = url;
    this.statusCode = statusCode;
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, false, context);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Type guard for per-document parsing failures
 */
export function isDocumentParseError(error: unknown): error is DocumentParseError {
  return error instanceof DocumentParseError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, false);
}
