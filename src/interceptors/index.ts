/**
 * grpc-record-store - Interceptors Module
 */

export {
  PipelineInterceptor,
  GRPC_STATUS_ITEM,
  createLoggingInterceptor,
  createTimeoutInterceptor,
} from './pipeline-interceptor';
