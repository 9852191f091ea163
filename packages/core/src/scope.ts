/**
 * Binds a session id to the current async execution context, so code deep
 * in a request chain can call `check` without threading the id through.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { MissingSessionError } from './errors.js';

export class SessionScope {
  private storage = new AsyncLocalStorage<string>();

  run<T>(sessionId: string, fn: () => T): T {
    return this.storage.run(sessionId, fn);
  }

  current(): string | undefined {
    return this.storage.getStore();
  }

  require(): string {
    const sessionId = this.storage.getStore();
    if (sessionId === undefined) {
      throw new MissingSessionError();
    }
    return sessionId;
  }
}
