/**
 * grpc-record-store - Server Module
 */

export { GrpcHost, createGrpcHost } from './grpc-host';
export { createRecordServer } from './record-server';
export type { RecordServer, RecordServerOptions } from './record-server';
