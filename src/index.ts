/**
 * grpc-record-store v0.1.0
 *
 * In-memory record store served over gRPC: unary lookups and inserts, a
 * server-streaming listing with cooperative cancellation and a
 * client-streaming batch insert, behind a @struktos/core middleware pipeline.
 *
 * @example
 * ```typescript
 * import { createRecordServer, RecordStore, RecordClient } from 'grpc-record-store';
 *
 * const store = new RecordStore();
 * const { host } = await createRecordServer({ store });
 * const { port } = await host.start(0, '127.0.0.1');
 *
 * const client = await RecordClient.connect(`127.0.0.1:${port}`);
 * await client.createRecord({ name: 'Ada', contact: 'ada@example.com', numericAttribute: 36 });
 * ```
 *
 * @module grpc-record-store
 */

// ==================== Store ====================
export { RecordStore } from './store';
export type { NewRecord, StoredRecord, RecordStoreOptions } from './store';

// ==================== Service ====================
export * from './service';

// ==================== Streaming ====================
export * from './streaming';

// ==================== Server ====================
export { GrpcHost, createGrpcHost, createRecordServer } from './server';
export type { RecordServer, RecordServerOptions } from './server';

// ==================== Client ====================
export { RecordClient } from './client';
export type { RecordClientOptions, RequestOptions, ListRecordsOptions } from './client';

// ==================== Context ====================
export {
  CallContextFactory,
  isUnaryCall,
  isReadableStream,
  isWritableStream,
  createResponseMetadata,
  metadataToRecord,
} from './context';

// ==================== Interceptors ====================
export {
  PipelineInterceptor,
  GRPC_STATUS_ITEM,
  createLoggingInterceptor,
  createTimeoutInterceptor,
} from './interceptors';

// ==================== Configuration & Logging ====================
export { loadConfig, ConfigError, DEFAULT_SEED_RECORDS } from './config';
export type { RecordServerConfig } from './config';
export { Logger, createLogger, createSilentLogger } from './logging';
export type { LogLevel, LoggerOptions, LogData } from './logging';

// ==================== Utilities ====================
export { generateTraceId, generateRequestId, DEFAULT_PROTO_OPTIONS, loadServiceDefinition } from './utils';

// ==================== Types ====================
export type {
  GrpcCallType,
  GrpcCall,
  GrpcCallback,
  InboundCall,
  MethodHandler,
  ServiceHandlers,
  GrpcContextData,
  GrpcServerOptions,
  GrpcHostOptions,
  GrpcServiceDefinition,
  ProtoLoaderOptions,
  MethodDefinition,
  ServerInfo,
} from './types';
export { METADATA_KEYS, GrpcStatus } from './types';
