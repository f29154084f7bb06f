/**
 * grpc-record-store - ID Generator Utilities
 *
 * Trace and request identifiers for calls that arrive without them.
 */

function randomPart(length: number): string {
  return Math.random()
    .toString(36)
    .substring(2, 2 + length)
    .padEnd(length, '0');
}

/**
 * Generate a trace ID: grpc-<base36 time>-<8 chars>
 */
export function generateTraceId(): string {
  return `grpc-${Date.now().toString(36)}-${randomPart(8)}`;
}

/**
 * Generate a request ID: req-<base36 time>-<4 chars>
 */
export function generateRequestId(): string {
  return `req-${Date.now().toString(36)}-${randomPart(4)}`;
}

