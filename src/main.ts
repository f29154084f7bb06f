/**
 * grpc-record-store - Process Entry Point
 *
 * Run: node dist/main.js (configuration from the environment or a .env file)
 */

import 'dotenv/config';
import { loadConfig, DEFAULT_SEED_RECORDS } from './config';
import { createLogger } from './logging/logger';
import { RecordStore } from './store/record-store';
import { createRecordServer } from './server/record-server';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const store = new RecordStore();
  if (config.seedRecords) {
    store.seed(DEFAULT_SEED_RECORDS);
  }

  const { host } = await createRecordServer({
    store,
    logger,
    streamDelayMs: config.streamDelayMs,
    callTimeoutMs: config.callTimeoutMs,
  });

  const info = await host.start(config.port, config.host);
  logger.info(`Record store ready at ${info.url}`, { records: store.size });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down`);

    host.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', error instanceof Error ? error : { error: String(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  process.stderr.write(`Failed to start record store: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
