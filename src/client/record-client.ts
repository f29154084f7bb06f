/**
 * grpc-record-store - Record Client
 *
 * Promise-based client of recordstore.RecordService. The service definition
 * is loaded from the proto file at run time; messages are encoded and
 * validated with the wire codec.
 */

import {
  CallOptions,
  Client,
  ChannelCredentials,
  credentials as grpcCredentials,
  Metadata,
  ServiceError,
  status as GrpcStatus,
} from '@grpc/grpc-js';
import type { MethodDefinition, ServiceDefinition } from '@grpc/proto-loader';
import type { NewRecord, StoredRecord } from '../store/types';
import type { BatchCreateResult } from '../service/record-service';
import {
  decodeBatchCreateResponse,
  decodeRecord,
  encodeCreateRecordRequest,
  encodeGetRecordRequest,
  RECORD_SERVICE_NAME,
  RECORD_STORE_PROTO_PATH,
} from '../service/codec';
import { loadServiceDefinition } from '../utils/proto';

export interface RecordClientOptions {
  /** Channel credentials (default: insecure) */
  credentials?: ChannelCredentials;
  /** Proto file declaring recordstore.RecordService */
  protoPath?: string;
}

export interface RequestOptions {
  /** Request metadata, e.g. x-trace-id */
  metadata?: Record<string, string>;
  deadline?: Date | number;
  /** Aborting cancels the call */
  signal?: AbortSignal;
}

export interface ListRecordsOptions extends RequestOptions {
  /** Called for each record as it arrives (1-based position) */
  onRecord?: (record: StoredRecord, position: number) => void;
}

type RpcName = 'GetRecord' | 'CreateRecord' | 'ListRecordsStream' | 'BatchCreateRecords';

/**
 * RecordClient - typed client of recordstore.RecordService
 *
 * @example
 * ```typescript
 * const client = await RecordClient.connect('127.0.0.1:50051');
 * const record = await client.createRecord({ name: 'Ada', contact: 'ada@example.com', numericAttribute: 36 });
 * const all = await client.listRecords();
 * client.close();
 * ```
 */
export class RecordClient {
  private constructor(
    private readonly client: Client,
    private readonly definition: ServiceDefinition
  ) {}

  static async connect(address: string, options: RecordClientOptions = {}): Promise<RecordClient> {
    const definition = await loadServiceDefinition(
      options.protoPath ?? RECORD_STORE_PROTO_PATH,
      RECORD_SERVICE_NAME
    );
    const client = new Client(address, options.credentials ?? grpcCredentials.createInsecure());
    return new RecordClient(client, definition);
  }

  async getRecord(id: number, options: RequestOptions = {}): Promise<StoredRecord> {
    return decodeRecord(await this.unary('GetRecord', encodeGetRecordRequest(id), options));
  }

  async createRecord(input: NewRecord, options: RequestOptions = {}): Promise<StoredRecord> {
    return decodeRecord(await this.unary('CreateRecord', encodeCreateRecordRequest(input), options));
  }

  /**
   * Read ListRecordsStream to its end. When `signal` aborts, the call is
   * cancelled and the records received so far are returned.
   */
  listRecords(options: ListRecordsOptions = {}): Promise<StoredRecord[]> {
    const method = this.method('ListRecordsStream');
    const call = this.client.makeServerStreamRequest(
      method.path,
      method.requestSerialize,
      method.responseDeserialize,
      {},
      toMetadata(options.metadata),
      toCallOptions(options)
    );

    const records: StoredRecord[] = [];
    let cancelledByCaller = false;

    return new Promise<StoredRecord[]>((resolve, reject) => {
      const unbind = onAbort(options.signal, () => {
        cancelledByCaller = true;
        call.cancel();
      });

      call.on('data', (message: unknown) => {
        if (cancelledByCaller) return;
        try {
          const record = decodeRecord(message);
          records.push(record);
          options.onRecord?.(record, records.length);
        } catch (error) {
          unbind();
          call.cancel();
          reject(error);
        }
      });

      call.on('end', () => {
        unbind();
        resolve(records);
      });

      call.on('error', (error: Error) => {
        unbind();
        if (cancelledByCaller && statusCode(error) === GrpcStatus.CANCELLED) {
          resolve(records);
        } else {
          reject(error);
        }
      });
    });
  }

  /**
   * Stream `inputs` to BatchCreateRecords and wait for the single response.
   * Aborting `signal` cancels the call before it half-closes.
   */
  batchCreateRecords(
    inputs: Iterable<NewRecord> | AsyncIterable<NewRecord>,
    options: RequestOptions = {}
  ): Promise<BatchCreateResult> {
    const method = this.method('BatchCreateRecords');

    return new Promise<BatchCreateResult>((resolve, reject) => {
      let cancelled = false;

      const call = this.client.makeClientStreamRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        toMetadata(options.metadata),
        toCallOptions(options),
        (error: ServiceError | null, response?: object) => {
          unbind();
          if (error) {
            reject(error);
            return;
          }
          try {
            resolve(decodeBatchCreateResponse(response));
          } catch (decodeError) {
            reject(decodeError);
          }
        }
      );

      const unbind = onAbort(options.signal, () => {
        cancelled = true;
        call.cancel();
      });

      const pump = async (): Promise<void> => {
        for await (const input of inputs) {
          if (cancelled) return;
          if (!call.write(encodeCreateRecordRequest(input))) {
            await new Promise<void>((drained) => call.once('drain', () => drained()));
          }
        }
        if (!cancelled) {
          call.end();
        }
      };

      pump().catch((error: unknown) => {
        unbind();
        reject(error);
        cancelled = true;
        call.cancel();
      });
    });
  }

  close(): void {
    this.client.close();
  }

  private unary(rpc: RpcName, request: object, options: RequestOptions): Promise<unknown> {
    const method = this.method(rpc);

    return new Promise<unknown>((resolve, reject) => {
      const call = this.client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        toMetadata(options.metadata),
        toCallOptions(options),
        (error: ServiceError | null, response?: object) => {
          unbind();
          if (error) {
            reject(error);
          } else {
            resolve(response);
          }
        }
      );

      const unbind = onAbort(options.signal, () => call.cancel());
    });
  }

  private method(rpc: RpcName): MethodDefinition<object, object> {
    const method = this.definition[rpc];
    if (!method) {
      throw new Error(`${RECORD_SERVICE_NAME} has no method ${rpc}`);
    }
    return method;
  }
}

function toMetadata(values: Record<string, string> = {}): Metadata {
  const metadata = new Metadata();
  for (const [key, value] of Object.entries(values)) {
    metadata.set(key, value);
  }
  return metadata;
}

function toCallOptions(options: RequestOptions): CallOptions {
  return options.deadline !== undefined ? { deadline: options.deadline } : {};
}

/**
 * Run `cancel` when `signal` aborts (immediately if it already has).
 * Returns a function that removes the listener.
 */
function onAbort(signal: AbortSignal | undefined, cancel: () => void): () => void {
  if (!signal) {
    return () => {};
  }
  if (signal.aborted) {
    queueMicrotask(cancel);
    return () => {};
  }
  signal.addEventListener('abort', cancel, { once: true });
  return () => signal.removeEventListener('abort', cancel);
}

function statusCode(error: Error): number | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'number' ? code : undefined;
}
