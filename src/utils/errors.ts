export class AppError extends Error {
  constructor(
    public message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, code?: string) {
    super(message, code);
    this.name = 'BadRequestError';
  }
}

export class InvalidRecordError extends BadRequestError {
  constructor(
    message: string,
    public issues: string[] = []
  ) {
    super(message, 'INVALID_RECORD');
    this.name = 'InvalidRecordError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found', code?: string) {
    super(message, code);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(
    message: string,
    code?: string,
    public details?: Record<string, unknown>
  ) {
    super(message, code);
    this.name = 'ConflictError';
  }
}
