/**
 * Loopback record server for integration tests
 */

import { RecordClient } from '../../src/client/record-client';
import { DEFAULT_SEED_RECORDS } from '../../src/config';
import { createSilentLogger } from '../../src/logging/logger';
import { createRecordServer, RecordServer, RecordServerOptions } from '../../src/server/record-server';
import { RecordStore } from '../../src/store/record-store';

export interface TestServer extends RecordServer {
  client: RecordClient;
  address: string;
  close(): Promise<void>;
}

/**
 * Start a seeded server on 127.0.0.1 with a free port and connect a client
 */
export async function startTestServer(options: RecordServerOptions = {}): Promise<TestServer> {
  const store = options.store ?? new RecordStore();
  if (!options.store) {
    store.seed(DEFAULT_SEED_RECORDS);
  }

  const server = await createRecordServer({
    logger: createSilentLogger(),
    streamDelayMs: 5,
    ...options,
    store,
  });
  const info = await server.host.start(0, '127.0.0.1');
  const address = `127.0.0.1:${info.port}`;
  const client = await RecordClient.connect(address);

  return {
    ...server,
    client,
    address,
    async close() {
      client.close();
      await server.host.forceStop();
    },
  };
}

/**
 * Poll `predicate` until it holds
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
