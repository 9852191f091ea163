/**
 * Session State Store
 *
 * One ledger per session id. Sessions never share a ledger object.
 */

import { retainInWindow } from './evaluator.js';
import type { Limits, SessionLedger } from './types.js';

export class SessionStore {
  private ledgers: Map<string, SessionLedger> = new Map();

  /**
   * Ledger bound to the session, created empty on first sight
   */
  getOrCreate(sessionId: string): SessionLedger {
    let ledger = this.ledgers.get(sessionId);
    if (!ledger) {
      ledger = { records: [] };
      this.ledgers.set(sessionId, ledger);
    }
    return ledger;
  }

  get(sessionId: string): SessionLedger | undefined {
    return this.ledgers.get(sessionId);
  }

  put(sessionId: string, ledger: SessionLedger): void {
    this.ledgers.set(sessionId, ledger);
  }

  has(sessionId: string): boolean {
    return this.ledgers.has(sessionId);
  }

  /** End a session; its ledger is discarded */
  delete(sessionId: string): boolean {
    return this.ledgers.delete(sessionId);
  }

  /**
   * Delete ledgers whose records have all left the window. Such a ledger
   * behaves exactly like a missing one on the next check.
   */
  prune(now: number, limits: Limits): number {
    let pruned = 0;
    for (const [sessionId, ledger] of this.ledgers) {
      if (retainInWindow(ledger.records, now, limits).length === 0) {
        this.ledgers.delete(sessionId);
        pruned++;
      }
    }
    return pruned;
  }

  get size(): number {
    return this.ledgers.size;
  }

  entries(): IterableIterator<[string, SessionLedger]> {
    return this.ledgers.entries();
  }
}
