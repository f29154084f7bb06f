/**
 * grpc-record-store - Consumer Stream Adapter
 *
 * Folds an inbound message sequence, one message at a time, in arrival order.
 */

import { CallCancelledError } from '../service/errors';
import { CancellationSignal, takeUntilCancelled } from './cancellation';

/**
 * Read `source` to its end and return the decoded items in arrival order.
 * Throws CallCancelledError when the signal is raised before the end of input;
 * decoding and transport errors propagate unchanged.
 */
export async function collectStream<TMessage, T>(
  source: AsyncIterable<TMessage>,
  signal: CancellationSignal,
  decode: (message: TMessage, index: number) => T,
  method = 'stream'
): Promise<T[]> {
  const items: T[] = [];

  for await (const message of takeUntilCancelled(source, signal)) {
    items.push(decode(message, items.length));
  }

  if (signal.cancelled) {
    throw new CallCancelledError(method);
  }

  return items;
}
