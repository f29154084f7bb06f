/**
 * grpc-record-store - Record Server
 *
 * Wires a RecordStore, the RecordService dispatcher and a GrpcHost serving
 * recordstore.RecordService.
 */

import { IStruktosMiddleware } from '@struktos/core';
import { GrpcContextData, GrpcHostOptions } from '../types';
import { RecordStore } from '../store/record-store';
import { RecordService } from '../service/record-service';
import { createRecordServiceHandlers } from '../service/grpc-bindings';
import { RECORD_SERVICE_NAME, RECORD_STORE_PROTO_PATH } from '../service/codec';
import { createLoggingInterceptor, createTimeoutInterceptor } from '../interceptors/pipeline-interceptor';
import { createLogger, Logger } from '../logging/logger';
import { GrpcHost } from './grpc-host';

export interface RecordServerOptions {
  /** Store to serve (default: a new empty store) */
  store?: RecordStore;
  logger?: Logger;
  streamDelayMs?: number;
  /** Installs the timeout interceptor when set */
  callTimeoutMs?: number;
  /** Middlewares run after the built-in logging and timeout middlewares */
  middlewares?: IStruktosMiddleware<GrpcContextData>[];
  hostOptions?: Omit<GrpcHostOptions, 'logger'>;
}

export interface RecordServer {
  host: GrpcHost;
  store: RecordStore;
  service: RecordService;
}

export async function createRecordServer(options: RecordServerOptions = {}): Promise<RecordServer> {
  const logger = options.logger ?? createLogger();
  const store = options.store ?? new RecordStore();
  const service = new RecordService(store, {
    logger: logger.child({ component: 'record-service' }),
    streamDelayMs: options.streamDelayMs,
  });

  const host = new GrpcHost({ name: 'record-store', ...options.hostOptions, logger });

  const middlewares: IStruktosMiddleware<GrpcContextData>[] = [createLoggingInterceptor({ logger })];
  if (options.callTimeoutMs !== undefined) {
    middlewares.push(createTimeoutInterceptor(options.callTimeoutMs));
  }
  middlewares.push(...(options.middlewares ?? []));

  await host.init(middlewares);
  await host.addProtoService(RECORD_STORE_PROTO_PATH, RECORD_SERVICE_NAME, createRecordServiceHandlers(service));

  return { host, store, service };
}
