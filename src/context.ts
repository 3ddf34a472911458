import { cancelledError } from './errors.js';
import type { CallContext } from './types.js';

export function throwIfCancelled(context: CallContext, collection: string, operation: string): void {
  if (context.signal?.aborted) {
    throw cancelledError(collection, operation, context.signal.reason);
  }
}
