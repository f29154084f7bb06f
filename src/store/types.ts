/**
 * grpc-record-store - Record Types
 */

/**
 * Caller-supplied fields of a record
 */
export interface NewRecord {
  name: string;
  contact: string;
  numericAttribute: number;
}

/**
 * A record as held by the store. Ids are assigned by the store and never reused.
 */
export interface StoredRecord extends NewRecord {
  readonly id: number;
  /** ISO-8601 creation time */
  readonly createdAt: string;
}

/**
 * Record store construction options
 */
export interface RecordStoreOptions {
  /** First id handed out (default: 1) */
  firstId?: number;
  /** Clock used to stamp createdAt */
  now?: () => Date;
}
