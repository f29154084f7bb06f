/**
 * grpc-record-store - Producer Stream Adapter
 *
 * Turns a snapshot into an outbound message sequence.
 */

import { CancellationSignal, pause, takeUntilCancelled } from './cancellation';

/**
 * Outbound side of a streaming call. `write` resolves once the transport
 * can take the next message.
 */
export interface MessageSink<T> {
  write(message: T): Promise<void>;
}

export interface StreamSnapshotOptions<T, TMessage> {
  /** Pause between consecutive emissions in milliseconds (default: 0) */
  delayMs?: number;
  /** Map each item to its wire message */
  encode: (item: T) => TMessage;
}

/**
 * Emit every item of `items` in order, stopping early once `signal` is raised.
 * Resolves with the number of messages written.
 */
export async function streamSnapshot<T, TMessage>(
  items: Iterable<T>,
  sink: MessageSink<TMessage>,
  signal: CancellationSignal,
  options: StreamSnapshotOptions<T, TMessage>
): Promise<number> {
  const delayMs = options.delayMs ?? 0;
  let emitted = 0;

  for await (const item of takeUntilCancelled(items, signal)) {
    if (emitted > 0) {
      await pause(delayMs, signal);
      if (signal.cancelled) break;
    }

    await sink.write(options.encode(item));
    emitted++;
  }

  return emitted;
}

/**
 * The part of a grpc-js writable call (server-streaming or duplex) a sink uses
 */
export interface WritableCall<TMessage> {
  write(message: TMessage): boolean;
  once(event: 'drain', listener: () => void): unknown;
  off(event: 'drain', listener: () => void): unknown;
}

/**
 * Sink over a grpc-js writable call. A full write buffer holds the next
 * write back until `drain` or cancellation.
 */
export function writableSink<TMessage>(
  call: WritableCall<TMessage>,
  signal: CancellationSignal
): MessageSink<TMessage> {
  return {
    write(message) {
      // A cancelled call is already torn down by the transport
      if (signal.cancelled || call.write(message) || signal.cancelled) {
        return Promise.resolve();
      }

      return new Promise<void>((resolve) => {
        const done = (): void => {
          detach();
          call.off('drain', done);
          resolve();
        };
        const detach = signal.onCancel(done);
        call.once('drain', done);
      });
    },
  };
}
