/**
 * grpc-record-store - Service Module
 */

export { RecordService, DEFAULT_STREAM_DELAY_MS } from './record-service';
export type { RecordServiceOptions, BatchCreateResult } from './record-service';
export { createRecordServiceHandlers } from './grpc-bindings';
export {
  RecordServiceError,
  RecordNotFoundError,
  InvalidArgumentError,
  CallCancelledError,
  httpStatusToGrpcStatus,
  toStatusObject,
} from './errors';
export type { FieldViolation } from './errors';
export {
  RECORD_STORE_PROTO_PATH,
  RECORD_SERVICE_NAME,
  decodeGetRecordRequest,
  decodeCreateRecordRequest,
  decodeRecord,
  decodeBatchCreateResponse,
  encodeRecord,
  encodeCreateRecordRequest,
  encodeGetRecordRequest,
  INT32_MAX,
  INT32_MIN,
  encodeBatchCreateResponse,
} from './codec';
export type {
  RecordMessage,
  CreateRecordRequestMessage,
  GetRecordRequestMessage,
  BatchCreateResponseMessage,
} from './codec';
