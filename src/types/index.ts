/**
 * grpc-record-store - Type Definitions
 *
 * Shared types of the gRPC host, the request context and the interceptors.
 */

import type {
  ServerCredentials,
  ServiceDefinition,
  Metadata,
  ServerUnaryCall,
  ServerReadableStream,
  ServerWritableStream,
  ServerDuplexStream,
  sendUnaryData,
} from '@grpc/grpc-js';
import type { EventEmitter } from 'events';
import type { StruktosContextData } from '@struktos/core';
import type { Logger } from '../logging/logger';

// ==================== gRPC Call Types ====================

/**
 * gRPC call types
 */
export type GrpcCallType = 'unary' | 'server-streaming' | 'client-streaming' | 'bidirectional';

/**
 * Any of the four server call objects
 */
export type GrpcCall<TRequest = unknown, TResponse = unknown> =
  | ServerUnaryCall<TRequest, TResponse>
  | ServerReadableStream<TRequest, TResponse>
  | ServerWritableStream<TRequest, TResponse>
  | ServerDuplexStream<TRequest, TResponse>;

/**
 * gRPC callback for sending responses
 */
export type GrpcCallback<TResponse = unknown> = sendUnaryData<TResponse>;

/**
 * The part of a server call the request context reads. Every GrpcCall has it.
 */
export interface InboundCall extends EventEmitter {
  readonly metadata: Metadata;
  readonly cancelled: boolean;
  getPeer(): string;
  getDeadline(): Date | number;
}

/**
 * Service method handler. The returned promise settles once the call has
 * been answered.
 */
export type MethodHandler = (
  call: GrpcCall,
  callback?: GrpcCallback
) => void | Promise<void>;

/**
 * Service implementation: method name → handler
 */
export type ServiceHandlers = Record<string, MethodHandler>;

// ==================== Context Types ====================

/**
 * Per-call context data
 */
export interface GrpcContextData extends StruktosContextData {
  /** gRPC service name */
  serviceName?: string;
  /** gRPC method name */
  methodName?: string;
  /** Full gRPC method path (e.g., /recordstore.RecordService/GetRecord) */
  methodPath?: string;
  /** gRPC call type */
  callType?: GrpcCallType;
  /** gRPC deadline (if set) */
  deadline?: Date;
  /** Client peer address */
  peer?: string;
  /** gRPC metadata from request */
  metadata?: Record<string, string | string[]>;
  /** Is streaming call */
  isStreaming?: boolean;
}

/**
 * Metadata key constants
 */
export const METADATA_KEYS = {
  TRACE_ID: 'x-trace-id',
  REQUEST_ID: 'x-request-id',
} as const;

// ==================== Host Options ====================

/**
 * gRPC channel options passed to the server
 */
export interface GrpcServerOptions {
  /** Maximum receive message size in bytes */
  'grpc.max_receive_message_length'?: number;
  /** Maximum send message size in bytes */
  'grpc.max_send_message_length'?: number;
  /** Keepalive time in milliseconds */
  'grpc.keepalive_time_ms'?: number;
  /** Keepalive timeout in milliseconds */
  'grpc.keepalive_timeout_ms'?: number;
  /** Allow keepalive without calls */
  'grpc.keepalive_permit_without_calls'?: number;
  /** Additional options */
  [key: string]: string | number | undefined;
}

/**
 * gRPC host configuration options
 */
export interface GrpcHostOptions {
  /** Host name used in logs */
  name?: string;

  /** Server options */
  serverOptions?: GrpcServerOptions;

  /** Server credentials (default: insecure) */
  credentials?: ServerCredentials;

  /** Logger for host lifecycle and pipeline errors */
  logger?: Logger;

  /** Custom trace ID generator */
  generateTraceId?: () => string;

  /** Custom request ID generator */
  generateRequestId?: () => string;

  /** Link client cancellation and deadlines to the request context (default: true) */
  enableCancellation?: boolean;

  /** Called when context is created */
  onContextCreated?: (context: GrpcContextData, call: InboundCall) => void;

  /** Called once the handler has answered the call */
  onRequestComplete?: (context: GrpcContextData, duration: number) => void;
}

// ==================== Service Registration ====================

/**
 * Service definition with implementation
 */
export interface GrpcServiceDefinition {
  /** Service definition from proto */
  definition: ServiceDefinition;
  /** Service implementation */
  implementation: ServiceHandlers;
}

/**
 * Proto loader options
 */
export interface ProtoLoaderOptions {
  /** Keep case for field names */
  keepCase?: boolean;
  /** Use long.js for int64 values */
  longs?: typeof String | typeof Number;
  /** Use enum names instead of numbers */
  enums?: typeof String | typeof Number;
  /** Set default values on output objects */
  defaults?: boolean;
  /** Include virtual oneof fields */
  oneofs?: boolean;
  /** Include directories for imports */
  includeDirs?: string[];
}

/**
 * Method definition used by the interceptor
 */
export interface MethodDefinition {
  /** Service name */
  service: string;
  /** Method name */
  method: string;
  /** Full path */
  path: string;
  /** Request streaming */
  requestStream: boolean;
  /** Response streaming */
  responseStream: boolean;
}

/**
 * Address the host is listening on
 */
export interface ServerInfo {
  protocol: 'grpc';
  host: string;
  port: number;
  url: string;
  metadata: {
    services: string[];
  };
}

// ==================== Re-exports from @grpc/grpc-js ====================

export type {
  ServerCredentials,
  ServiceDefinition,
  Metadata,
  ServerUnaryCall,
  ServerReadableStream,
  ServerWritableStream,
  ServerDuplexStream,
  sendUnaryData,
};

export { status as GrpcStatus } from '@grpc/grpc-js';
