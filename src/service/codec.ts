/**
 * grpc-record-store - Wire Codec
 *
 * Maps the snake_case messages of record_store.proto to the camelCase domain
 * types, validating inbound messages with zod.
 */

import * as path from 'path';
import { z, type ZodError } from 'zod';
import type { NewRecord, StoredRecord } from '../store/types';
import { FieldViolation, InvalidArgumentError } from './errors';

/** Proto file defining recordstore.RecordService */
export const RECORD_STORE_PROTO_PATH = path.join(__dirname, '../../protos/record_store.proto');

/** Fully qualified service name */
export const RECORD_SERVICE_NAME = 'recordstore.RecordService';

// ==================== Wire Messages ====================

export interface RecordMessage {
  id: number;
  name: string;
  contact: string;
  numeric_attribute: number;
  created_at: string;
}

export interface CreateRecordRequestMessage {
  name: string;
  contact: string;
  numeric_attribute: number | string;
}

export interface GetRecordRequestMessage {
  id: number | string;
}

export interface BatchCreateResponseMessage {
  created_count: number;
  records: RecordMessage[];
}

// ==================== Schemas ====================

/** proto int32 bounds; protobufjs wraps values outside them */
export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

const integer = z.coerce.number().int().min(INT32_MIN).max(INT32_MAX);

const getRecordRequestSchema = z.object({
  id: integer,
});

const createRecordRequestSchema = z.object({
  name: z.string(),
  contact: z.string(),
  numeric_attribute: integer,
});

const recordMessageSchema = z.object({
  id: integer,
  name: z.string(),
  contact: z.string(),
  numeric_attribute: integer,
  created_at: z.string(),
});

const batchCreateResponseSchema = z.object({
  created_count: integer,
  records: z.array(recordMessageSchema),
});

function toViolations(error: ZodError): FieldViolation[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || 'message',
    message: issue.message,
  }));
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, message: unknown, subject: string): T {
  const result = schema.safeParse(message);
  if (!result.success) {
    throw new InvalidArgumentError(toViolations(result.error), subject);
  }
  return result.data;
}

// ==================== Decoding ====================

export function decodeGetRecordRequest(message: unknown): { id: number } {
  return parse(getRecordRequestSchema, message, 'GetRecordRequest');
}

export function decodeCreateRecordRequest(message: unknown, subject = 'CreateRecordRequest'): NewRecord {
  const parsed = parse(createRecordRequestSchema, message, subject);
  return {
    name: parsed.name,
    contact: parsed.contact,
    numericAttribute: parsed.numeric_attribute,
  };
}

/**
 * Decode a Record message received by a client
 */
export function decodeRecord(message: unknown): StoredRecord {
  const parsed = parse(recordMessageSchema, message, 'Record');
  return {
    id: parsed.id,
    name: parsed.name,
    contact: parsed.contact,
    numericAttribute: parsed.numeric_attribute,
    createdAt: parsed.created_at,
  };
}

export function decodeBatchCreateResponse(message: unknown): {
  createdCount: number;
  records: StoredRecord[];
} {
  const parsed = parse(batchCreateResponseSchema, message, 'BatchCreateResponse');
  return {
    createdCount: parsed.created_count,
    records: parsed.records.map(decodeRecord),
  };
}

// ==================== Encoding ====================

export function encodeRecord(record: StoredRecord): RecordMessage {
  return {
    id: record.id,
    name: record.name,
    contact: record.contact,
    numeric_attribute: record.numericAttribute,
    created_at: record.createdAt,
  };
}

/**
 * Encode an outbound GetRecordRequest; an id outside int32 raises InvalidArgumentError
 */
export function encodeGetRecordRequest(id: number): GetRecordRequestMessage {
  return parse(getRecordRequestSchema, { id }, 'GetRecordRequest');
}

/**
 * Encode an outbound CreateRecordRequest, validated like an inbound one
 */
export function encodeCreateRecordRequest(input: NewRecord): CreateRecordRequestMessage {
  return parse(
    createRecordRequestSchema,
    {
      name: input.name,
      contact: input.contact,
      numeric_attribute: input.numericAttribute,
    },
    'CreateRecordRequest'
  );
}

export function encodeBatchCreateResponse(records: readonly StoredRecord[]): BatchCreateResponseMessage {
  return {
    created_count: records.length,
    records: records.map(encodeRecord),
  };
}
