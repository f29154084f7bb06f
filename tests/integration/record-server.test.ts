/**
 * Integration Tests - Record Server over gRPC
 */

import { CallCancelledError, InvalidArgumentError } from '../../src/service/errors';
import { GrpcStatus } from '../../src/types';
import type { NewRecord } from '../../src/store/types';
import { startTestServer, TestServer, waitFor } from '../helpers/test-server';

describe('Record Server Integration', () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startTestServer();
  });

  afterEach(async () => {
    await server.close();
  });

  describe('end-to-end scenario', () => {
    it('should serve the seeded store through every RPC', async () => {
      const first = await server.client.getRecord(1);
      expect(first).toMatchObject({ id: 1, name: 'John Doe', contact: 'john@example.com', numericAttribute: 30 });

      const created = await server.client.createRecord({ name: 'X', contact: 'x@e', numericAttribute: 30 });
      expect(created.id).toBe(3);

      const listed = await server.client.listRecords();
      expect(listed.map((record) => record.id)).toEqual([1, 2, 3]);

      const batch = await server.client.batchCreateRecords([
        { name: 'Y', contact: 'y@e', numericAttribute: 1 },
        { name: 'Z', contact: 'z@e', numericAttribute: 2 },
      ]);
      expect(batch.createdCount).toBe(2);
      expect(batch.records.map((record) => record.id)).toEqual([4, 5]);
    });
  });

  describe('Unary RPC', () => {
    it('should return a created record unchanged', async () => {
      const created = await server.client.createRecord({
        name: 'Margaret',
        contact: 'margaret@test.local',
        numericAttribute: 61,
      });

      const fetched = await server.client.getRecord(created.id);

      expect(fetched).toEqual(created);
      expect(fetched).toMatchObject({ name: 'Margaret', contact: 'margaret@test.local', numericAttribute: 61 });
    });

    it('should fail with NOT_FOUND naming the id', async () => {
      await expect(server.client.getRecord(999)).rejects.toMatchObject({
        code: GrpcStatus.NOT_FOUND,
        details: 'Record with ID 999 not found',
      });
    });

    it('should treat id 0 as a lookup miss', async () => {
      await expect(server.client.getRecord(0)).rejects.toMatchObject({ code: GrpcStatus.NOT_FOUND });
    });

    it('should reject an id outside int32 before sending it', async () => {
      await expect(server.client.getRecord(2 ** 32 + 1)).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(server.client.getRecord(2 ** 32 + 1)).rejects.toMatchObject({ code: GrpcStatus.INVALID_ARGUMENT });
    });

    it('should reject a numeric attribute outside int32 without storing it', async () => {
      await expect(
        server.client.createRecord({ name: 'Wide', contact: 'wide@e', numericAttribute: 2 ** 31 })
      ).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(server.store.size).toBe(2);
    });

    it('should keep numeric attributes at the int32 edges exact', async () => {
      const created = await server.client.createRecord({
        name: 'Edge',
        contact: 'edge@e',
        numericAttribute: 2147483647,
      });

      expect((await server.client.getRecord(created.id)).numericAttribute).toBe(2147483647);
    });

    it('should assign distinct increasing ids to concurrent creates', async () => {
      const inputs: NewRecord[] = Array.from({ length: 20 }, (_, i) => ({
        name: `Concurrent ${i}`,
        contact: `c${i}@test.local`,
        numericAttribute: i,
      }));

      const created = await Promise.all(inputs.map((input) => server.client.createRecord(input)));

      const ids = created.map((record) => record.id).sort((a, b) => a - b);
      expect(ids).toEqual(Array.from({ length: 20 }, (_, i) => i + 3));
      expect(server.store.size).toBe(22);
    });
  });

  describe('Server Streaming RPC', () => {
    it('should stream the records present at call start, in order', async () => {
      const seen: number[] = [];

      const listed = await server.client.listRecords({
        onRecord: (record, position) => {
          seen.push(position);
          if (position === 1) {
            server.store.create({ name: 'Late', contact: 'late@e', numericAttribute: 0 });
          }
        },
      });

      expect(listed.map((record) => record.id)).toEqual([1, 2]);
      expect(seen).toEqual([1, 2]);
    });

    it('should stop streaming soon after the client cancels', async () => {
      const slow = await startTestServer({ streamDelayMs: 50 });
      slow.store.createMany(
        Array.from({ length: 10 }, (_, i) => ({ name: `Bulk ${i}`, contact: 'bulk@e', numericAttribute: i }))
      );
      const listing = jest.spyOn(slow.service, 'listRecords');
      const controller = new AbortController();

      try {
        const received = await slow.client.listRecords({
          signal: controller.signal,
          onRecord: (_record, position) => {
            if (position === 2) controller.abort();
          },
        });

        expect(received.map((record) => record.id)).toEqual([1, 2]);

        const emitted = await listing.mock.results[0].value;
        expect(emitted).toBeGreaterThanOrEqual(2);
        expect(emitted).toBeLessThanOrEqual(4);
      } finally {
        await slow.close();
      }
    });
  });

  describe('Client Streaming RPC', () => {
    it('should create a batch in arrival order', async () => {
      async function* arriving(): AsyncGenerator<NewRecord> {
        yield { name: 'First', contact: 'first@e', numericAttribute: 1 };
        await new Promise((resolve) => setTimeout(resolve, 10));
        yield { name: 'Second', contact: 'second@e', numericAttribute: 2 };
        yield { name: 'Third', contact: 'third@e', numericAttribute: 3 };
      }

      const result = await server.client.batchCreateRecords(arriving());

      expect(result.createdCount).toBe(3);
      expect(result.records.map((record) => [record.id, record.name])).toEqual([
        [3, 'First'],
        [4, 'Second'],
        [5, 'Third'],
      ]);
      expect((await server.client.getRecord(5)).name).toBe('Third');
    });

    it('should accept an empty batch', async () => {
      const result = await server.client.batchCreateRecords([]);

      expect(result).toEqual({ createdCount: 0, records: [] });
      expect(server.store.size).toBe(2);
    });

    it('should reject a batch carrying an out-of-range attribute and commit nothing', async () => {
      await expect(
        server.client.batchCreateRecords([
          { name: 'Fine', contact: 'fine@e', numericAttribute: 1 },
          { name: 'Wide', contact: 'wide@e', numericAttribute: -(2 ** 31) - 1 },
        ])
      ).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(server.store.size).toBe(2);
    });

    it('should commit nothing when the client cancels mid-batch', async () => {
      const batching = jest.spyOn(server.service, 'batchCreateRecords');
      const controller = new AbortController();

      async function* abandoned(): AsyncGenerator<NewRecord> {
        yield { name: 'A', contact: 'a@e', numericAttribute: 1 };
        yield { name: 'B', contact: 'b@e', numericAttribute: 2 };
        await waitFor(() => batching.mock.calls.length > 0);
        controller.abort();
      }

      await expect(
        server.client.batchCreateRecords(abandoned(), { signal: controller.signal })
      ).rejects.toMatchObject({ code: GrpcStatus.CANCELLED });

      await expect(batching.mock.results[0].value).rejects.toThrow(CallCancelledError);
      expect(server.store.size).toBe(2);
    });
  });
});
