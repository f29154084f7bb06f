/**
 * grpc-record-store - Record Service
 *
 * RPC dispatcher over a shared RecordStore. Operations are transport-neutral:
 * streaming calls take a MessageSink / AsyncIterable and a CancellationSignal,
 * so the same code serves grpc-js calls and in-process callers.
 */

import type { RecordStore } from '../store/record-store';
import type { NewRecord, StoredRecord } from '../store/types';
import { CancellationSignal, NEVER_CANCELLED } from '../streaming/cancellation';
import { collectStream } from '../streaming/consumer';
import { MessageSink, streamSnapshot } from '../streaming/producer';
import { createSilentLogger, Logger } from '../logging/logger';

export interface RecordServiceOptions {
  logger?: Logger;
  /** Pause between ListRecordsStream emissions in milliseconds (default: 100) */
  streamDelayMs?: number;
}

export interface BatchCreateResult {
  createdCount: number;
  records: StoredRecord[];
}

export const DEFAULT_STREAM_DELAY_MS = 100;

export class RecordService {
  private readonly logger: Logger;
  private readonly streamDelayMs: number;

  constructor(
    private readonly store: RecordStore,
    options: RecordServiceOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.streamDelayMs = options.streamDelayMs ?? DEFAULT_STREAM_DELAY_MS;
  }

  /**
   * GetRecord - throws RecordNotFoundError for an unknown id
   */
  getRecord(id: number): StoredRecord {
    this.logger.info(`GetRecord called with ID: ${id}`, { rpc: 'GetRecord', id });
    return this.store.get(id);
  }

  /**
   * CreateRecord - always succeeds
   */
  createRecord(input: NewRecord): StoredRecord {
    this.logger.info(`CreateRecord called with name: ${input.name}`, { rpc: 'CreateRecord' });
    return this.store.create(input);
  }

  /**
   * ListRecordsStream - snapshot the store, then emit one message per record
   * with a pause between emissions. Stops without error once cancelled.
   * Resolves with the number of records emitted.
   */
  async listRecords<TMessage>(
    sink: MessageSink<TMessage>,
    encode: (record: StoredRecord) => TMessage,
    signal: CancellationSignal = NEVER_CANCELLED
  ): Promise<number> {
    const snapshot = this.store.list();
    this.logger.info('ListRecordsStream called - streaming all records', {
      rpc: 'ListRecordsStream',
      snapshotSize: snapshot.length,
    });

    const emitted = await streamSnapshot(snapshot, sink, signal, {
      delayMs: this.streamDelayMs,
      encode,
    });

    if (signal.cancelled) {
      this.logger.info('ListRecordsStream cancelled by caller', {
        rpc: 'ListRecordsStream',
        emitted,
        snapshotSize: snapshot.length,
      });
    }
    return emitted;
  }

  /**
   * BatchCreateRecords - read create-requests in arrival order until the end
   * of input, then commit them all at once. A cancelled, failed or invalid
   * stream commits nothing.
   */
  async batchCreateRecords<TMessage>(
    source: AsyncIterable<TMessage>,
    decode: (message: TMessage, index: number) => NewRecord,
    signal: CancellationSignal = NEVER_CANCELLED
  ): Promise<BatchCreateResult> {
    this.logger.info('BatchCreateRecords called - receiving record stream', {
      rpc: 'BatchCreateRecords',
    });

    const inputs = await collectStream(source, signal, decode, 'BatchCreateRecords');
    const records = this.store.createMany(inputs);

    for (const record of records) {
      this.logger.info(`Batch created record: ${record.name}`, {
        rpc: 'BatchCreateRecords',
        id: record.id,
      });
    }

    return { createdCount: records.length, records };
  }
}
