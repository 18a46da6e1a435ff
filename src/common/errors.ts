export type RegistryErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'STORE_ERROR'
  | 'DELIVERY_ERROR'
  | 'PAYLOAD_TOO_LARGE'
  | 'CONFIGURATION_ERROR';

/**
 * Base class for every error the registry raises on purpose.
 * `statusCode` is what the HTTP adapter answers with.
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: RegistryErrorCode,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

export class ValidationError extends RegistryError {
  constructor(public readonly issues: FieldIssue[]) {
    super(ValidationError.summarize(issues), 'VALIDATION_ERROR', 400);
  }

  private static summarize(issues: FieldIssue[]): string {
    if (issues.length === 0) return 'Invalid request';
    return issues.map(issue => `${issue.field}: ${issue.message}`).join('; ');
  }
}

export class NotFoundError extends RegistryError {
  constructor(
    public readonly serviceName: string,
    public readonly instanceId: string
  ) {
    super(`Instance ${serviceName}/${instanceId} is not registered`, 'NOT_FOUND', 404);
  }
}

export class PayloadTooLargeError extends RegistryError {
  constructor(public readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`, 'PAYLOAD_TOO_LARGE', 413);
  }
}

export class StoreError extends RegistryError {
  constructor(operation: string, cause: unknown) {
    super(`Store ${operation} failed: ${errorMessage(cause)}`, 'STORE_ERROR', 500, { cause });
  }
}

/**
 * Raised when a subscriber cannot be reached. Never leaves the hub.
 */
export class DeliveryError extends RegistryError {
  constructor(public readonly subscriberId: string, cause: unknown) {
    super(`Delivery to subscriber ${subscriberId} failed: ${errorMessage(cause)}`, 'DELIVERY_ERROR', 500, { cause });
  }
}

export class ConfigurationError extends RegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', 500, options);
  }
}

export interface ErrorResponse {
  statusCode: number;
  body: { error: string; details?: FieldIssue[] };
}

/**
 * Map anything thrown inside a request handler to a status and JSON body.
 * Unexpected errors are reported without their message.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ValidationError) {
    return { statusCode: error.statusCode, body: { error: error.message, details: error.issues } };
  }
  if (error instanceof RegistryError) {
    return { statusCode: error.statusCode, body: { error: error.message } };
  }
  return { statusCode: 500, body: { error: 'Internal server error' } };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
