/**
 * grpc-record-store - Service Errors
 *
 * Errors carry their gRPC status in `code`, the shape the default error
 * transformer reads.
 */

import { status as GrpcStatus, Metadata, StatusObject } from '@grpc/grpc-js';

export class RecordServiceError extends Error {
  constructor(
    message: string,
    readonly code: GrpcStatus
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class RecordNotFoundError extends RecordServiceError {
  constructor(readonly recordId: number) {
    super(`Record with ID ${recordId} not found`, GrpcStatus.NOT_FOUND);
  }
}

export interface FieldViolation {
  field: string;
  message: string;
}

export class InvalidArgumentError extends RecordServiceError {
  constructor(
    readonly violations: FieldViolation[],
    subject = 'request'
  ) {
    super(
      `Invalid ${subject}: ${violations.map((v) => `${v.field}: ${v.message}`).join('; ')}`,
      GrpcStatus.INVALID_ARGUMENT
    );
  }
}

export class CallCancelledError extends RecordServiceError {
  constructor(method: string) {
    super(`${method} was cancelled before completion`, GrpcStatus.CANCELLED);
  }
}

/**
 * Map HTTP status to gRPC status
 */
export function httpStatusToGrpcStatus(httpStatus: number): GrpcStatus {
  const mapping: Record<number, GrpcStatus> = {
    200: GrpcStatus.OK,
    400: GrpcStatus.INVALID_ARGUMENT,
    401: GrpcStatus.UNAUTHENTICATED,
    403: GrpcStatus.PERMISSION_DENIED,
    404: GrpcStatus.NOT_FOUND,
    409: GrpcStatus.ALREADY_EXISTS,
    429: GrpcStatus.RESOURCE_EXHAUSTED,
    499: GrpcStatus.CANCELLED,
    500: GrpcStatus.INTERNAL,
    501: GrpcStatus.UNIMPLEMENTED,
    503: GrpcStatus.UNAVAILABLE,
    504: GrpcStatus.DEADLINE_EXCEEDED,
  };

  return mapping[httpStatus] ?? GrpcStatus.INTERNAL;
}

function numericField(error: object, key: string): number | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * Convert any thrown value into the status delivered to the client.
 * An explicit numeric `code` wins over an HTTP-style `statusCode`/`status`.
 */
export function toStatusObject(error: unknown): StatusObject {
  if (!(error instanceof Error)) {
    return {
      code: GrpcStatus.INTERNAL,
      details: String(error),
      metadata: new Metadata(),
    };
  }

  let code: GrpcStatus = GrpcStatus.INTERNAL;

  const httpStatus = numericField(error, 'statusCode') ?? numericField(error, 'status');
  if (httpStatus !== undefined) {
    code = httpStatusToGrpcStatus(httpStatus);
  }

  const grpcCode = numericField(error, 'code');
  if (grpcCode !== undefined && grpcCode in GrpcStatus) {
    code = grpcCode;
  }

  return {
    code,
    details: error.message,
    metadata: new Metadata(),
  };
}
