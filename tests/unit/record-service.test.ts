/**
 * Unit Tests - Record Service
 */

import { RecordStore } from '../../src/store/record-store';
import { RecordService } from '../../src/service/record-service';
import { CallCancelledError, InvalidArgumentError, RecordNotFoundError } from '../../src/service/errors';
import { decodeCreateRecordRequest } from '../../src/service/codec';
import { CancellationSource } from '../../src/streaming/cancellation';
import type { MessageSink } from '../../src/streaming/producer';
import type { NewRecord, StoredRecord } from '../../src/store/types';

const SEED: NewRecord[] = [
  { name: 'John Doe', contact: 'john@example.com', numericAttribute: 30 },
  { name: 'Jane Smith', contact: 'jane@example.com', numericAttribute: 25 },
];

function identity(record: StoredRecord): StoredRecord {
  return record;
}

function collectingSink(onWrite?: (count: number) => void): MessageSink<StoredRecord> & { ids: number[] } {
  const ids: number[] = [];
  return {
    ids,
    async write(record) {
      ids.push(record.id);
      onWrite?.(ids.length);
    },
  };
}

async function* stream<T>(...items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

describe('RecordService', () => {
  let store: RecordStore;
  let service: RecordService;

  beforeEach(() => {
    store = new RecordStore();
    store.seed(SEED);
    service = new RecordService(store, { streamDelayMs: 0 });
  });

  describe('getRecord', () => {
    it('should return the seeded record', () => {
      expect(service.getRecord(1)).toMatchObject({
        id: 1,
        name: 'John Doe',
        contact: 'john@example.com',
        numericAttribute: 30,
      });
    });

    it('should throw RecordNotFoundError for an unknown id', () => {
      expect(() => service.getRecord(999)).toThrow(RecordNotFoundError);
      expect(() => service.getRecord(999)).toThrow('Record with ID 999 not found');
    });
  });

  describe('createRecord', () => {
    it('should return the created record with the next id', () => {
      const record = service.createRecord({ name: 'X', contact: 'x@e', numericAttribute: 30 });

      expect(record.id).toBe(3);
      expect(service.getRecord(3)).toEqual(record);
    });
  });

  describe('listRecords', () => {
    it('should emit every record in insertion order', async () => {
      service.createRecord({ name: 'X', contact: 'x@e', numericAttribute: 30 });
      const sink = collectingSink();

      const emitted = await service.listRecords(sink, identity);

      expect(emitted).toBe(3);
      expect(sink.ids).toEqual([1, 2, 3]);
    });

    it('should emit the records present at call start only', async () => {
      const sink = collectingSink((count) => {
        if (count === 1) {
          service.createRecord({ name: 'Late', contact: 'late@e', numericAttribute: 1 });
        }
      });

      await service.listRecords(sink, identity);

      expect(sink.ids).toEqual([1, 2]);
      expect(store.size).toBe(3);
    });

    it('should stop after cancellation', async () => {
      store.createMany([
        { name: 'C', contact: 'c', numericAttribute: 3 },
        { name: 'D', contact: 'd', numericAttribute: 4 },
      ]);
      const source = new CancellationSource();
      const sink = collectingSink((count) => {
        if (count === 2) source.cancel();
      });

      const emitted = await service.listRecords(sink, identity, source.signal);

      expect(emitted).toBe(2);
      expect(sink.ids).toEqual([1, 2]);
    });
  });

  describe('batchCreateRecords', () => {
    it('should create every record in arrival order', async () => {
      const result = await service.batchCreateRecords(
        stream<unknown>(
          { name: 'A', contact: 'a@e', numeric_attribute: 1 },
          { name: 'B', contact: 'b@e', numeric_attribute: '2' }
        ),
        (message) => decodeCreateRecordRequest(message)
      );

      expect(result.createdCount).toBe(2);
      expect(result.records.map((record) => record.id)).toEqual([3, 4]);
      expect(result.records.map((record) => record.numericAttribute)).toEqual([1, 2]);
      expect(service.getRecord(4).name).toBe('B');
    });

    it('should return an empty result for an empty stream', async () => {
      const result = await service.batchCreateRecords(stream<unknown>(), (message) =>
        decodeCreateRecordRequest(message)
      );

      expect(result).toEqual({ createdCount: 0, records: [] });
      expect(store.size).toBe(2);
    });

    it('should commit nothing when a message is invalid', async () => {
      const batch = service.batchCreateRecords(
        stream<unknown>(
          { name: 'A', contact: 'a@e', numeric_attribute: 1 },
          { name: 'B', contact: 'b@e', numeric_attribute: 'many' }
        ),
        (message, index) => decodeCreateRecordRequest(message, `CreateRecordRequest #${index + 1}`)
      );

      await expect(batch).rejects.toThrow(InvalidArgumentError);
      expect(store.size).toBe(2);
    });

    it('should commit nothing when cancelled', async () => {
      const source = new CancellationSource();

      async function* cancelledMidway(): AsyncGenerator<NewRecord> {
        yield { name: 'A', contact: 'a@e', numericAttribute: 1 };
        source.cancel();
        yield { name: 'B', contact: 'b@e', numericAttribute: 2 };
      }

      const batch = service.batchCreateRecords(cancelledMidway(), (input) => input, source.signal);

      await expect(batch).rejects.toThrow(CallCancelledError);
      expect(store.size).toBe(2);
    });

    it('should commit nothing when the stream fails', async () => {
      async function* failing(): AsyncGenerator<NewRecord> {
        yield { name: 'A', contact: 'a@e', numericAttribute: 1 };
        throw new Error('stream reset');
      }

      await expect(service.batchCreateRecords(failing(), (input) => input)).rejects.toThrow('stream reset');
      expect(store.size).toBe(2);
    });
  });
});
