/**
 * grpc-record-store - Utilities Module
 */

export { generateTraceId, generateRequestId } from './id-generator';
export { DEFAULT_PROTO_OPTIONS, loadServiceDefinition } from './proto';
