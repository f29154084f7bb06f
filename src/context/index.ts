/**
 * grpc-record-store - Context Module
 */

export {
  CallContextFactory,
  isUnaryCall,
  isReadableStream,
  isWritableStream,
  createResponseMetadata,
  metadataToRecord,
} from './factory';
