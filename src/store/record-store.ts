/**
 * grpc-record-store - Record Store
 *
 * Append-only, in-memory record collection shared by every RPC call.
 *
 * Each mutation (id allocation + append) and each snapshot runs to completion
 * without an await, so on the event loop they are serialized against every
 * other call exactly as under an exclusive lock.
 */

import { RecordNotFoundError } from '../service/errors';
import { NewRecord, RecordStoreOptions, StoredRecord } from './types';

export class RecordStore {
  private readonly records: StoredRecord[] = [];
  private readonly byId: Map<number, StoredRecord> = new Map();
  private nextId: number;
  private readonly now: () => Date;

  constructor(options: RecordStoreOptions = {}) {
    this.nextId = options.firstId ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Number of records held
   */
  get size(): number {
    return this.records.length;
  }

  /**
   * Look up a record, throwing RecordNotFoundError on a miss
   */
  get(id: number): StoredRecord {
    const record = this.byId.get(id);
    if (!record) {
      throw new RecordNotFoundError(id);
    }
    return record;
  }

  find(id: number): StoredRecord | undefined {
    return this.byId.get(id);
  }

  /**
   * Allocate the next id, stamp createdAt and append
   */
  create(input: NewRecord): StoredRecord {
    return this.append(input);
  }

  /**
   * Append a batch in one critical section. Ids are consecutive, in input order.
   */
  createMany(inputs: readonly NewRecord[]): StoredRecord[] {
    return inputs.map((input) => this.append(input));
  }

  /**
   * Point-in-time copy of all records in insertion order
   */
  list(): readonly StoredRecord[] {
    return this.records.slice();
  }

  /**
   * Create the initial records of a fresh store
   */
  seed(inputs: readonly NewRecord[]): StoredRecord[] {
    return this.createMany(inputs);
  }

  private append(input: NewRecord): StoredRecord {
    const record: StoredRecord = Object.freeze({
      id: this.nextId++,
      name: input.name,
      contact: input.contact,
      numericAttribute: input.numericAttribute,
      createdAt: this.now().toISOString(),
    });

    this.records.push(record);
    this.byId.set(record.id, record);
    return record;
  }
}
