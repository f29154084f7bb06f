/**
 * grpc-record-store - Example Client
 *
 * Walks through every RPC of recordstore.RecordService.
 *
 * Run server first: npm run build && npm start
 * Then run client: npm run example
 */

import { RecordClient, GrpcStatus } from '../src';

const SERVER_ADDRESS = process.env.RECORD_STORE_ADDRESS ?? 'localhost:50051';

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'number' ? `${GrpcStatus[code]}: ${error.message}` : error.message;
  }
  return String(error);
}

async function main(): Promise<void> {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  grpc-record-store - Example Client');
  console.log('═══════════════════════════════════════════════════════════\n');

  const client = await RecordClient.connect(SERVER_ADDRESS);
  const metadata = { 'x-trace-id': `client-${Date.now()}` };

  try {
    // 1. Unary call - GetRecord
    console.log('--- 1: GetRecord(1) ---');
    console.log('Record:', await client.getRecord(1, { metadata }));

    // 2. Unary call - CreateRecord
    console.log('\n--- 2: CreateRecord ---');
    const created = await client.createRecord(
      { name: 'Alice Johnson', contact: 'alice@example.com', numericAttribute: 28 },
      { metadata }
    );
    console.log('Created:', created);

    // 3. Server streaming - ListRecordsStream
    console.log('\n--- 3: ListRecordsStream ---');
    const listed = await client.listRecords({
      metadata,
      onRecord: (record) => console.log(`Streamed: ${record.id} ${record.name}`),
    });
    console.log(`Stream ended after ${listed.length} records`);

    // 4. Server streaming, cancelled after the first record
    console.log('\n--- 4: ListRecordsStream (cancel after 1) ---');
    const controller = new AbortController();
    const partial = await client.listRecords({
      metadata,
      signal: controller.signal,
      onRecord: () => controller.abort(),
    });
    console.log(`Cancelled after ${partial.length} record(s)`);

    // 5. Client streaming - BatchCreateRecords
    console.log('\n--- 5: BatchCreateRecords ---');
    const batch = await client.batchCreateRecords(
      [
        { name: 'Bob Wilson', contact: 'bob@example.com', numericAttribute: 35 },
        { name: 'Carol Davis', contact: 'carol@example.com', numericAttribute: 42 },
      ],
      { metadata }
    );
    console.log(`Created ${batch.createdCount}:`, batch.records.map((record) => record.id));

    // 6. Error handling - GetRecord with an unknown ID
    console.log('\n--- 6: GetRecord(999) ---');
    try {
      await client.getRecord(999, { metadata });
    } catch (error) {
      console.log('Expected error:', describeError(error));
    }
  } finally {
    client.close();
  }

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  All calls completed!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

main().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
