/**
 * Admission Controller
 *
 * Per-session gate in front of a downstream model call. Each check reads the
 * clock once, evaluates against the session's ledger and commits the result
 * before returning.
 */

import { AdmissionError, RateLimitedError } from './errors.js';
import { assertTokenCount, evaluate, measure } from './evaluator.js';
import { createLimits } from './limits.js';
import { SessionScope } from './scope.js';
import { SessionStore } from './store.js';
import {
  systemClock,
  type Clock,
  type ControllerStats,
  type Decision,
  type LedgerRecord,
  type Limits,
  type RejectReason,
  type SessionUsage,
} from './types.js';

export interface AdmissionControllerConfig {
  /** Defaults to DEFAULT_LIMITS */
  limits?: Limits;
  /** Time source, epoch ms (default: Date.now) */
  clock?: Clock;
  store?: SessionStore;
  scope?: SessionScope;
}

export function describeRejection(reason: RejectReason, limits: Limits): string {
  return reason === 'request_limit'
    ? `Request limit exceeded: ${limits.rpmLimit} requests per ${limits.windowSeconds}s`
    : `Token limit exceeded: ${limits.tpmLimit} tokens per ${limits.windowSeconds}s`;
}

export class AdmissionController {
  readonly limits: Limits;
  readonly scope: SessionScope;
  private readonly store: SessionStore;
  private readonly clock: Clock;

  constructor(config: AdmissionControllerConfig = {}) {
    this.limits = config.limits ?? createLimits();
    this.clock = config.clock ?? systemClock;
    this.store = config.store ?? new SessionStore();
    this.scope = config.scope ?? new SessionScope();
  }

  /**
   * Check a call for the session bound to the current scope
   * @throws MissingSessionError outside of `scope.run`
   */
  check(tokensRequested: number): Decision {
    return this.checkSession(this.scope.require(), tokensRequested);
  }

  /**
   * Evict, evaluate and commit for an explicit session.
   *
   * Must stay synchronous: nothing else may touch the ledger between the
   * read and the commit.
   */
  checkSession(sessionId: string, tokensRequested: number): Decision {
    if (sessionId === '') {
      throw new AdmissionError('invalid_request', 'sessionId must not be empty');
    }
    assertTokenCount(tokensRequested);

    const existing = this.store.get(sessionId);
    const { decision, next } = evaluate(existing ?? { records: [] }, tokensRequested, this.clock(), this.limits);
    // A rejected first call leaves no ledger behind
    if (existing || next.records.length > 0) {
      this.store.put(sessionId, next);
    }
    return decision;
  }

  /** Like `check`, but a rejection throws RateLimitedError */
  admit(tokensRequested: number): Decision {
    return this.admitSession(this.scope.require(), tokensRequested);
  }

  admitSession(sessionId: string, tokensRequested: number): Decision {
    const decision = this.checkSession(sessionId, tokensRequested);
    if (!decision.admitted) {
      throw new RateLimitedError(sessionId, decision, describeRejection(decision.reason, this.limits));
    }
    return decision;
  }

  usage(sessionId: string): SessionUsage {
    const ledger = this.store.get(sessionId) ?? { records: [] };
    const { requests, tokens } = measure(ledger, this.clock(), this.limits);
    return {
      requests,
      tokens,
      remainingRequests: Math.max(0, this.limits.rpmLimit - requests),
      remainingTokens: Math.max(0, this.limits.tpmLimit - tokens),
    };
  }

  /** Copy of the stored records, including any not yet evicted */
  snapshot(sessionId: string): readonly LedgerRecord[] {
    return this.store.get(sessionId)?.records.slice() ?? [];
  }

  hasSession(sessionId: string): boolean {
    return this.store.has(sessionId);
  }

  endSession(sessionId: string): boolean {
    return this.store.delete(sessionId);
  }

  /**
   * Remove sessions with nothing left in the window
   * @returns number of sessions removed
   */
  prune(): number {
    return this.store.prune(this.clock(), this.limits);
  }

  stats(): ControllerStats {
    const now = this.clock();
    let totalRequests = 0;
    let totalTokens = 0;
    for (const [, ledger] of this.store.entries()) {
      const usage = measure(ledger, now, this.limits);
      totalRequests += usage.requests;
      totalTokens += usage.tokens;
    }
    return {
      totalSessions: this.store.size,
      totalRequests,
      totalTokens,
    };
  }
}
