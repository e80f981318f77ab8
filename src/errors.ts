// Errors raised by the store, the translator and request validation.
// Each carries the HTTP status the error middleware answers with.

export abstract class ApiError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends ApiError {
  readonly status: number = 400;
  readonly code: string = 'INVALID_INPUT';
}

export class InvalidQueryError extends InvalidInputError {
  readonly code: string = 'INVALID_QUERY';
}

export class InvalidValueError extends ApiError {
  readonly status: number = 422;
  readonly code: string = 'INVALID_VALUE';
}

export class UnrecognizedQueryError extends ApiError {
  readonly status: number = 422;
  readonly code: string = 'UNRECOGNIZED_QUERY';
}

export class DuplicateValueError extends ApiError {
  readonly status: number = 409;
  readonly code: string = 'DUPLICATE_VALUE';

  constructor(readonly hash: string) {
    super('Conflict: String already exists in the system');
  }
}

export class NotFoundError extends ApiError {
  readonly status: number = 404;
  readonly code: string = 'NOT_FOUND';

  constructor(message = 'Not Found: String does not exist in the system') {
    super(message);
  }
}
