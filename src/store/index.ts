/**
 * grpc-record-store - Store Module
 */

export { RecordStore } from './record-store';
export type { NewRecord, StoredRecord, RecordStoreOptions } from './types';
