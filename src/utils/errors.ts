export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    error: {
      code: string;
      message: string;
      details?: unknown;
    };
  } {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with identifier ${identifier} not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', 500);
  }
}

/**
 * A stored document that is not valid JSON or lacks the expected shape.
 */
export class CorruptDocumentError extends AppError {
  constructor(filePath: string, reason: string) {
    super(`Corrupt document at ${filePath}: ${reason}`, 'CORRUPT_DOCUMENT', 500, { filePath });
  }
}

export class ExternalApiError extends AppError {
  constructor(
    service: string,
    message: string,
    public readonly upstreamStatus?: number,
    details?: unknown,
  ) {
    super(`${service} API error: ${message}`, 'EXTERNAL_API_ERROR', 502, details);
  }
}
