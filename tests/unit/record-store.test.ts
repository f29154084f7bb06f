/**
 * Unit Tests - Record Store
 */

import { RecordStore } from '../../src/store/record-store';
import { RecordNotFoundError } from '../../src/service/errors';
import { GrpcStatus } from '../../src/types';

const FIXED_TIME = new Date('2024-03-01T12:00:00.000Z');

function newStore(): RecordStore {
  return new RecordStore({ now: () => FIXED_TIME });
}

describe('RecordStore', () => {
  describe('create', () => {
    it('should assign ids starting at 1', () => {
      const store = newStore();

      const first = store.create({ name: 'Ann', contact: 'ann@test.local', numericAttribute: 1 });
      const second = store.create({ name: 'Ben', contact: 'ben@test.local', numericAttribute: 2 });

      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(store.size).toBe(2);
    });

    it('should honour a custom first id', () => {
      const store = new RecordStore({ firstId: 100 });

      expect(store.create({ name: 'Ann', contact: 'a', numericAttribute: 0 }).id).toBe(100);
    });

    it('should stamp createdAt from the clock', () => {
      const record = newStore().create({ name: 'Ann', contact: 'a', numericAttribute: 0 });

      expect(record.createdAt).toBe('2024-03-01T12:00:00.000Z');
    });

    it('should return frozen records', () => {
      const record = newStore().create({ name: 'Ann', contact: 'a', numericAttribute: 0 });

      expect(Object.isFrozen(record)).toBe(true);
    });

    it('should copy caller fields', () => {
      const input = { name: 'Ann', contact: 'a', numericAttribute: 7 };
      const store = newStore();
      store.create(input);

      input.name = 'Changed';

      expect(store.get(1).name).toBe('Ann');
    });
  });

  describe('get / find', () => {
    it('should return the record with the given id', () => {
      const store = newStore();
      store.create({ name: 'Ann', contact: 'ann@test.local', numericAttribute: 41 });

      expect(store.get(1)).toEqual({
        id: 1,
        name: 'Ann',
        contact: 'ann@test.local',
        numericAttribute: 41,
        createdAt: '2024-03-01T12:00:00.000Z',
      });
    });

    it('should throw RecordNotFoundError for an unknown id', () => {
      const store = newStore();

      expect(() => store.get(42)).toThrow(RecordNotFoundError);
      expect(() => store.get(42)).toThrow('Record with ID 42 not found');
    });

    it('should carry NOT_FOUND and the id on the error', () => {
      let caught: unknown;
      try {
        newStore().get(0);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RecordNotFoundError);
      if (caught instanceof RecordNotFoundError) {
        expect(caught.code).toBe(GrpcStatus.NOT_FOUND);
        expect(caught.recordId).toBe(0);
      }
    });

    it('should return undefined from find for an unknown id', () => {
      expect(newStore().find(3)).toBeUndefined();
    });
  });

  describe('createMany', () => {
    it('should assign consecutive ids in input order', () => {
      const store = newStore();
      store.create({ name: 'Seed', contact: 's', numericAttribute: 0 });

      const created = store.createMany([
        { name: 'A', contact: 'a', numericAttribute: 1 },
        { name: 'B', contact: 'b', numericAttribute: 2 },
        { name: 'C', contact: 'c', numericAttribute: 3 },
      ]);

      expect(created.map((record) => record.id)).toEqual([2, 3, 4]);
      expect(created.map((record) => record.name)).toEqual(['A', 'B', 'C']);
    });

    it('should accept an empty batch', () => {
      const store = newStore();

      expect(store.createMany([])).toEqual([]);
      expect(store.size).toBe(0);
    });
  });

  describe('list', () => {
    it('should return records in insertion order', () => {
      const store = newStore();
      store.seed([
        { name: 'John Doe', contact: 'john@example.com', numericAttribute: 30 },
        { name: 'Jane Smith', contact: 'jane@example.com', numericAttribute: 25 },
      ]);
      store.create({ name: 'X', contact: 'x@e', numericAttribute: 30 });

      expect(store.list().map((record) => record.id)).toEqual([1, 2, 3]);
    });

    it('should return a snapshot unaffected by later inserts', () => {
      const store = newStore();
      store.create({ name: 'A', contact: 'a', numericAttribute: 1 });

      const snapshot = store.list();
      store.create({ name: 'B', contact: 'b', numericAttribute: 2 });

      expect(snapshot).toHaveLength(1);
      expect(store.list()).toHaveLength(2);
    });
  });
});
