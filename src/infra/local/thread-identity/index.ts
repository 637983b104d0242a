import { isMainThread, threadId } from 'worker_threads';
import type { ThreadIdentity, ThreadIdentityPort } from '../../../ports/thread-identity.port.js';

/**
 * Node adapter: the main thread is `main`, worker threads are `worker-<id>`.
 */
export class NodeThreadIdentity implements ThreadIdentityPort {
  private readonly identity: ThreadIdentity;

  constructor() {
    this.identity = {
      threadId,
      threadName: isMainThread ? 'main' : `worker-${threadId}`,
    };
  }

  current(): ThreadIdentity {
    return this.identity;
  }
}
