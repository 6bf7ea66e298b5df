/**
 * Service-level errors mapped to HTTP statuses by the API layer
 */

export class ServiceError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends ServiceError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(400, message);
    this.details = details;
  }
}

export class NotFoundError extends ServiceError {
  constructor(what: string, id: string) {
    super(404, `${what} not found: ${id}`);
  }
}

export class ConflictError extends ServiceError {
  constructor(message: string) {
    super(409, message);
  }
}
