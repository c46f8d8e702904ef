export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export type ErrorKind =
  | 'malformed_batch'
  | 'validation_failed'
  | 'constraint_violation'
  | 'not_found'
  | 'unrecognized_resource'
  | 'infrastructure_fault';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  malformed_batch: 400,
  validation_failed: 422,
  constraint_violation: 409,
  not_found: 404,
  unrecognized_resource: 400,
  infrastructure_fault: 500,
};

export type ErrorDetails = Record<string, unknown>;

/**
 * Failure raised by the ingestion engine. The kind is decided where the
 * failure happens; the HTTP layer only maps it to a status code.
 */
export class IngestionError extends HttpError {
  readonly kind: ErrorKind;
  declare readonly details: ErrorDetails;

  constructor(kind: ErrorKind, message: string, details: ErrorDetails = {}) {
    super(STATUS_BY_KIND[kind], message, details);
    this.kind = kind;
  }

  withDetails(extra: ErrorDetails): IngestionError {
    return new IngestionError(this.kind, this.message, { ...this.details, ...extra });
  }
}

export function malformedBatch(message: string, details?: ErrorDetails): IngestionError {
  return new IngestionError('malformed_batch', message, details);
}

export function validationFailed(errors: string[]): IngestionError {
  return new IngestionError('validation_failed', 'validation_failed', { errors });
}

export function constraintViolation(message: string, details?: ErrorDetails): IngestionError {
  return new IngestionError('constraint_violation', message, details);
}

export function notFound(message = 'not found', details?: ErrorDetails): IngestionError {
  return new IngestionError('not_found', message, details);
}

export function unrecognizedResource(message: string, details?: ErrorDetails): IngestionError {
  return new IngestionError('unrecognized_resource', message, details);
}

export function infrastructureFault(message: string, details?: ErrorDetails): IngestionError {
  return new IngestionError('infrastructure_fault', message, details);
}

export function unauthorized(message = 'unauthorized'): HttpError {
  return new HttpError(401, message);
}

export function forbidden(message = 'forbidden'): HttpError {
  return new HttpError(403, message);
}
