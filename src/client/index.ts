/**
 * grpc-record-store - Client Module
 */

export { RecordClient } from './record-client';
export type { RecordClientOptions, RequestOptions, ListRecordsOptions } from './record-client';
