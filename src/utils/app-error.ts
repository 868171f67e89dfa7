export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code?: string): AppError {
    return new AppError(message, 400, code || 'BAD_REQUEST');
  }

  static notFound(message: string = 'Resource not found', code?: string): AppError {
    return new AppError(message, 404, code || 'NOT_FOUND');
  }

  static internal(message: string = 'Internal server error', code?: string): AppError {
    return new AppError(message, 500, code || 'INTERNAL_ERROR');
  }
}

/**
 * Raised at the boundary when a file's extension or content type is not one
 * the extractors can read. Nothing has been processed when this is thrown.
 */
export class InputFormatError extends AppError {
  public readonly extension: string;

  constructor(extension: string, supported: readonly string[]) {
    super(
      `Unsupported file type "${extension || '(none)'}". Supported: ${supported.join(', ')}`,
      400,
      'UNSUPPORTED_FORMAT'
    );
    this.extension = extension;
  }
}

/**
 * Raised when a document correction is requested before any style guide
 * has been ingested into the session.
 */
export class StyleGuideMissingError extends AppError {
  constructor(message: string = 'No style guide has been processed yet. Ingest a style guide first.') {
    super(message, 409, 'STYLE_GUIDE_NOT_PROCESSED');
  }
}
