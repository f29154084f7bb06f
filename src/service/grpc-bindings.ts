/**
 * grpc-record-store - gRPC Bindings
 *
 * Maps the recordstore.RecordService RPCs onto RecordService. Every handler
 * answers through the callback or the stream and never throws into grpc-js;
 * the returned promise settles once the call has been answered.
 */

import { Metadata, StatusObject } from '@grpc/grpc-js';
import { GrpcCallback, GrpcStatus, InboundCall, MethodHandler, ServiceHandlers } from '../types';
import { isReadableStream, isWritableStream } from '../context/factory';
import { CancellationSignal, signalForCall } from '../streaming/cancellation';
import { MessageSink, WritableCall, writableSink } from '../streaming/producer';
import { RecordService } from './record-service';
import { toStatusObject } from './errors';
import {
  decodeCreateRecordRequest,
  decodeGetRecordRequest,
  encodeBatchCreateResponse,
  encodeRecord,
  RecordMessage,
} from './codec';

type OutboundCall<TMessage> = InboundCall &
  WritableCall<TMessage> & {
    end(): unknown;
  };

interface InboundStream extends InboundCall, AsyncIterable<unknown> {}

/**
 * Build the handlers of recordstore.RecordService, keyed by RPC name
 */
export function createRecordServiceHandlers(service: RecordService): ServiceHandlers {
  return {
    GetRecord: unary((request) => {
      const { id } = decodeGetRecordRequest(request);
      return encodeRecord(service.getRecord(id));
    }),

    CreateRecord: unary((request) => encodeRecord(service.createRecord(decodeCreateRecordRequest(request)))),

    ListRecordsStream: serverStreaming<RecordMessage>((sink, signal) =>
      service.listRecords(sink, encodeRecord, signal)
    ),

    BatchCreateRecords: clientStreaming(async (source, signal) => {
      const result = await service.batchCreateRecords(
        source,
        (message, index) => decodeCreateRecordRequest(message, `CreateRecordRequest #${index + 1}`),
        signal
      );
      return encodeBatchCreateResponse(result.records);
    }),
  };
}

function unary<TResponse>(produce: (request: unknown) => TResponse | Promise<TResponse>): MethodHandler {
  return (call, callback) => {
    const request: unknown = 'request' in call ? call.request : undefined;

    return Promise.resolve()
      .then(() => produce(request))
      .then(
        (response) => reply(call, callback, response),
        (error: unknown) => fail(call, callback, toStatusObject(error))
      );
  };
}

function serverStreaming<TMessage>(
  run: (sink: MessageSink<TMessage>, signal: CancellationSignal) => Promise<unknown>
): MethodHandler {
  return async (call, callback) => {
    if (!isWritableStream(call)) {
      fail(call, callback, unsupportedCall('server-streaming'));
      return;
    }

    const stream: OutboundCall<TMessage> = call;
    const signal = signalForCall(stream);

    try {
      await run(writableSink(stream, signal), signal);
      if (!stream.cancelled) {
        stream.end();
      }
    } catch (error) {
      if (!stream.cancelled) {
        stream.emit('error', toStatusObject(error));
      }
    }
  };
}

function clientStreaming<TResponse>(
  run: (source: AsyncIterable<unknown>, signal: CancellationSignal) => Promise<TResponse>
): MethodHandler {
  return (call, callback) => {
    if (!isReadableStream(call)) {
      fail(call, callback, unsupportedCall('client-streaming'));
      return Promise.resolve();
    }

    const stream: InboundStream = call;
    const signal = signalForCall(stream);

    return run(stream, signal).then(
      (response) => reply(call, callback, response),
      (error: unknown) => fail(call, callback, toStatusObject(error))
    );
  };
}

function reply(call: InboundCall, callback: GrpcCallback | undefined, response: unknown): void {
  if (!callback) {
    fail(call, callback, unsupportedCall('unary'));
    return;
  }
  callback(null, response);
}

function fail(call: InboundCall, callback: GrpcCallback | undefined, status: StatusObject): void {
  if (callback) {
    callback(status, null);
    return;
  }
  call.emit('error', status);
}

function unsupportedCall(expected: string): StatusObject {
  return {
    code: GrpcStatus.UNIMPLEMENTED,
    details: `Handler expects a ${expected} call`,
    metadata: new Metadata(),
  };
}
