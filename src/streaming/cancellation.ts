/**
 * grpc-record-store - Cancellation
 *
 * One cancellation-aware iteration primitive shared by the producer and the
 * consumer side of every streaming call.
 */

import { RequestContext } from '@struktos/core';
import type { GrpcContextData, InboundCall } from '../types';

/**
 * Call-scoped cancellation flag
 */
export interface CancellationSignal {
  readonly cancelled: boolean;
  /**
   * Register a listener; returns a function that detaches it.
   * Listeners added after cancellation run on the next microtask.
   */
  onCancel(listener: () => void): () => void;
}

export class CancellationSource {
  private listeners = new Set<() => void>();
  private isCancelled = false;

  readonly signal: CancellationSignal;

  constructor() {
    const isCancelled = (): boolean => this.isCancelled;
    this.signal = {
      get cancelled() {
        return isCancelled();
      },
      onCancel: (listener) => this.subscribe(listener),
    };
  }

  get cancelled(): boolean {
    return this.isCancelled;
  }

  cancel(): void {
    if (this.isCancelled) return;
    this.isCancelled = true;

    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }

  private subscribe(listener: () => void): () => void {
    if (this.isCancelled) {
      queueMicrotask(listener);
      return () => {};
    }

    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * A signal that is never raised
 */
export const NEVER_CANCELLED: CancellationSignal = {
  cancelled: false,
  onCancel: () => () => {},
};

/**
 * Build the cancellation signal of an inbound call. It is raised by the
 * transport (client cancel, deadline) and by the call's RequestContext
 * (e.g. the timeout interceptor).
 */
export function signalForCall(call: InboundCall): CancellationSignal {
  const source = new CancellationSource();

  if (call.cancelled) {
    source.cancel();
    return source.signal;
  }

  call.once('cancelled', () => source.cancel());

  const context = RequestContext.current<GrpcContextData>();
  if (context) {
    if (context.isCancelled()) {
      source.cancel();
    } else {
      context.onCancel(() => source.cancel());
    }
  }

  return source.signal;
}

const CANCELLED: unique symbol = Symbol('cancelled');

function isAsyncIterable<T>(source: AsyncIterable<T> | Iterable<T>): source is AsyncIterable<T> {
  return Symbol.asyncIterator in source;
}

function iteratorOf<T>(source: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> | Iterator<T> {
  return isAsyncIterable(source) ? source[Symbol.asyncIterator]() : source[Symbol.iterator]();
}

/**
 * Yield items from `source` until it is exhausted or `signal` is raised.
 * The signal is checked before every item, and a pending read is abandoned
 * as soon as the signal is raised.
 */
export async function* takeUntilCancelled<T>(
  source: AsyncIterable<T> | Iterable<T>,
  signal: CancellationSignal
): AsyncGenerator<T, void, undefined> {
  if (signal.cancelled) return;

  const iterator = iteratorOf(source);
  let detach: () => void = () => {};
  const cancelled = new Promise<typeof CANCELLED>((resolve) => {
    detach = signal.onCancel(() => resolve(CANCELLED));
  });

  // false only while the consumer may still stop early; the source is then closed
  let finished = false;
  try {
    while (!signal.cancelled) {
      const next = await Promise.race([iterator.next(), cancelled]);
      if (next === CANCELLED || next.done) {
        finished = true;
        return;
      }
      yield next.value;
    }
    finished = true;
  } finally {
    detach();
    if (!finished) {
      await iterator.return?.();
    }
  }
}

/**
 * Wait `ms` milliseconds, or less if the signal is raised
 */
export function pause(ms: number, signal: CancellationSignal = NEVER_CANCELLED): Promise<void> {
  if (ms <= 0 || signal.cancelled) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const detach = signal.onCancel(() => {
      clearTimeout(timeoutId);
      resolve();
    });
    const timeoutId = setTimeout(() => {
      detach();
      resolve();
    }, ms);
  });
}
