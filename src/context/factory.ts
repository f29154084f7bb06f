/**
 * grpc-record-store - Call Context
 *
 * Builds the per-call RequestContext from gRPC metadata and call information.
 * Handles trace ID propagation and links client cancellation and deadlines
 * to the context's cancellation token.
 */

import { Metadata, status as GrpcStatus } from '@grpc/grpc-js';
import { RequestContext } from '@struktos/core';
import {
  GrpcContextData,
  GrpcCall,
  GrpcCallType,
  GrpcHostOptions,
  InboundCall,
  MethodDefinition,
  METADATA_KEYS,
  ServerUnaryCall,
  ServerReadableStream,
  ServerWritableStream,
  ServerDuplexStream,
} from '../types';
import { generateTraceId, generateRequestId } from '../utils/id-generator';

/**
 * CallContextFactory - Creates and manages the RequestContext of gRPC calls
 */
export class CallContextFactory {
  constructor(private readonly options: GrpcHostOptions = {}) {}

  /**
   * Create context data from a gRPC call
   */
  createContext(call: InboundCall, methodDef: MethodDefinition): GrpcContextData {
    const metadata = call.metadata;

    const traceId =
      firstValue(metadata, METADATA_KEYS.TRACE_ID) ??
      (this.options.generateTraceId?.() ?? generateTraceId());
    const requestId =
      firstValue(metadata, METADATA_KEYS.REQUEST_ID) ??
      (this.options.generateRequestId?.() ?? generateRequestId());

    const contextData: GrpcContextData = {
      traceId,
      requestId,
      timestamp: Date.now(),
      serviceName: methodDef.service,
      methodName: methodDef.method,
      methodPath: methodDef.path,
      callType: determineCallType(methodDef),
      peer: call.getPeer(),
      metadata: metadataToRecord(metadata),
      isStreaming: methodDef.requestStream || methodDef.responseStream,
    };

    const deadline = extractDeadline(call);
    if (deadline) {
      contextData.deadline = deadline;
    }

    return contextData;
  }

  /**
   * Run `fn` within a new RequestContext for `call`. Cancellation links are
   * removed once `fn` settles.
   */
  async runWithContext<T>(
    call: InboundCall,
    methodDef: MethodDefinition,
    fn: (context: RequestContext<GrpcContextData>, data: GrpcContextData) => Promise<T>
  ): Promise<T> {
    const contextData = this.createContext(call, methodDef);

    return RequestContext.run(contextData, async () => {
      const context = RequestContext.current<GrpcContextData>();
      if (!context) {
        throw new Error('Failed to create RequestContext');
      }

      const unlink =
        this.options.enableCancellation !== false
          ? this.setupCancellation(call, context, contextData.deadline)
          : () => {};

      this.options.onContextCreated?.(contextData, call);

      try {
        return await fn(context, contextData);
      } finally {
        unlink();
      }
    });
  }

  /**
   * Cancel the context when the client cancels, the transport reports a
   * cancellation error, or the deadline passes
   */
  private setupCancellation(
    call: InboundCall,
    context: RequestContext<GrpcContextData>,
    deadline: Date | undefined
  ): () => void {
    const cancel = (): void => {
      if (!context.isCancelled()) {
        context.cancel();
      }
    };
    const onError = (error: unknown): void => {
      if (isCancellationError(error)) {
        cancel();
      }
    };

    if (call.cancelled) {
      cancel();
    }
    call.on('cancelled', cancel);
    call.on('error', onError);

    let timeoutId: NodeJS.Timeout | undefined;
    if (deadline) {
      const timeoutMs = deadline.getTime() - Date.now();
      if (timeoutMs > 0) {
        timeoutId = setTimeout(cancel, timeoutMs);
        timeoutId.unref();
      } else {
        // Already past deadline
        cancel();
      }
    }

    return () => {
      call.off('cancelled', cancel);
      call.off('error', onError);
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    };
  }
}

function firstValue(metadata: Metadata, key: string): string | undefined {
  const values = metadata.get(key);
  return values.length > 0 ? String(values[0]) : undefined;
}

function extractDeadline(call: InboundCall): Date | undefined {
  const deadline = call.getDeadline();
  if (deadline instanceof Date) {
    return deadline;
  }
  if (Number.isFinite(deadline)) {
    return new Date(deadline);
  }
  return undefined;
}

/**
 * Determine the gRPC call type from method definition
 */
function determineCallType(methodDef: MethodDefinition): GrpcCallType {
  if (methodDef.requestStream && methodDef.responseStream) {
    return 'bidirectional';
  }
  if (methodDef.requestStream) {
    return 'client-streaming';
  }
  if (methodDef.responseStream) {
    return 'server-streaming';
  }
  return 'unary';
}

/**
 * Convert Metadata to a plain record; binary values are decoded as UTF-8
 */
export function metadataToRecord(metadata: Metadata): Record<string, string> {
  const record: Record<string, string> = {};

  for (const [key, value] of Object.entries(metadata.getMap())) {
    record[key] = Buffer.isBuffer(value) ? value.toString('utf-8') : value;
  }

  return record;
}

/**
 * Errors on a call are either Errors or status objects carrying `details`
 */
function isCancellationError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }
  if (Reflect.get(error, 'code') === GrpcStatus.CANCELLED) {
    return true;
  }

  const text: unknown = Reflect.get(error, 'message') ?? Reflect.get(error, 'details');
  if (typeof text !== 'string') {
    return false;
  }
  const message = text.toLowerCase();
  return message.includes('cancelled') || message.includes('canceled') || message.includes('deadline');
}

// ==================== Call Type Guards ====================

export function isReadableStream<TReq, TRes>(
  call: GrpcCall<TReq, TRes>
): call is ServerReadableStream<TReq, TRes> | ServerDuplexStream<TReq, TRes> {
  return 'read' in call && typeof call.read === 'function';
}

export function isWritableStream<TReq, TRes>(
  call: GrpcCall<TReq, TRes>
): call is ServerWritableStream<TReq, TRes> | ServerDuplexStream<TReq, TRes> {
  return 'write' in call && typeof call.write === 'function' && typeof call.end === 'function';
}

export function isUnaryCall<TReq, TRes>(
  call: GrpcCall<TReq, TRes>
): call is ServerUnaryCall<TReq, TRes> {
  return !isReadableStream(call) && !isWritableStream(call);
}

/**
 * Create response metadata echoing the trace and request IDs
 */
export function createResponseMetadata(context: RequestContext<GrpcContextData>): Metadata {
  const metadata = new Metadata();

  const traceId = context.get('traceId');
  if (traceId) {
    metadata.set(METADATA_KEYS.TRACE_ID, traceId);
  }

  const requestId = context.get('requestId');
  if (requestId) {
    metadata.set(METADATA_KEYS.REQUEST_ID, requestId);
  }

  return metadata;
}
