/**
 * grpc-record-store - Streaming Module
 */

export {
  CancellationSource,
  NEVER_CANCELLED,
  signalForCall,
  takeUntilCancelled,
  pause,
} from './cancellation';
export type { CancellationSignal } from './cancellation';
export { streamSnapshot, writableSink } from './producer';
export type { MessageSink, StreamSnapshotOptions, WritableCall } from './producer';
export { collectStream } from './consumer';
