/**
 * Sliding-Window Evaluator
 *
 * Decides whether one more call fits a session's request-count and
 * token-volume limits over the trailing window. Pure: the caller commits
 * `next` to the store.
 */

import { InvalidTokenCountError } from './errors.js';
import type { Decision, LedgerRecord, Limits, RejectReason, SessionLedger } from './types.js';

export interface Evaluation {
  decision: Decision;
  /** Ledger to commit: retained records, plus the candidate when admitted */
  next: SessionLedger;
}

export function assertTokenCount(tokens: unknown): asserts tokens is number {
  if (typeof tokens !== 'number' || !Number.isSafeInteger(tokens) || tokens < 0) {
    throw new InvalidTokenCountError(tokens);
  }
}

function sumTokens(records: readonly LedgerRecord[]): number {
  let total = 0;
  for (const record of records) {
    total += record.tokens;
  }
  return total;
}

/** Records whose age is at most the window (inclusive boundary) */
export function retainInWindow(
  records: readonly LedgerRecord[],
  now: number,
  limits: Limits
): LedgerRecord[] {
  const windowMs = limits.windowSeconds * 1000;
  return records.filter((record) => now - record.timestamp <= windowMs);
}

function summarize(records: readonly LedgerRecord[], tokens: number, now: number, limits: Limits) {
  const windowMs = limits.windowSeconds * 1000;
  const oldest = records[0]?.timestamp ?? now;
  return {
    remainingRequests: Math.max(0, limits.rpmLimit - records.length),
    remainingTokens: Math.max(0, limits.tpmLimit - tokens),
    resetAt: Math.ceil((oldest + windowMs) / 1000),
  };
}

/**
 * Seconds until enough of the oldest records have left the window for the
 * candidate to fit both limits, assuming no other admissions meanwhile.
 */
function retryAfter(
  retained: readonly LedgerRecord[],
  retainedTokens: number,
  tokensRequested: number,
  now: number,
  limits: Limits
): number | undefined {
  if (tokensRequested > limits.tpmLimit) {
    return undefined;
  }
  const windowMs = limits.windowSeconds * 1000;
  let tokens = retainedTokens;
  let kept = retained.length;
  let latestExpiry = now;
  for (const record of retained) {
    tokens -= record.tokens;
    kept--;
    // A record is evicted once its age exceeds the window by at least 1ms
    latestExpiry = Math.max(latestExpiry, record.timestamp + windowMs + 1);
    if (kept + 1 <= limits.rpmLimit && tokens + tokensRequested <= limits.tpmLimit) {
      return Math.ceil((latestExpiry - now) / 1000);
    }
  }
  return undefined;
}

function reject(
  reason: RejectReason,
  retained: LedgerRecord[],
  retainedTokens: number,
  tokensRequested: number,
  now: number,
  limits: Limits
): Evaluation {
  const retryAfterSeconds = retryAfter(retained, retainedTokens, tokensRequested, now, limits);
  return {
    next: { records: retained },
    decision: {
      admitted: false,
      reason,
      ...summarize(retained, retainedTokens, now, limits),
      ...(retryAfterSeconds !== undefined ? { retryAfterSeconds } : {}),
    },
  };
}

/**
 * Evict, check the count limit, check the volume limit, append.
 *
 * Eviction always happens before the limits are read. A rejected call
 * returns the retained records unchanged: the candidate is never appended.
 */
export function evaluate(
  ledger: SessionLedger,
  tokensRequested: number,
  now: number,
  limits: Limits
): Evaluation {
  assertTokenCount(tokensRequested);

  const retained = retainInWindow(ledger.records, now, limits);
  const retainedTokens = sumTokens(retained);

  if (retained.length + 1 > limits.rpmLimit) {
    return reject('request_limit', retained, retainedTokens, tokensRequested, now, limits);
  }

  if (retainedTokens + tokensRequested > limits.tpmLimit) {
    return reject('token_limit', retained, retainedTokens, tokensRequested, now, limits);
  }

  const records = [...retained, { timestamp: now, tokens: tokensRequested }];
  return {
    next: { records },
    decision: {
      admitted: true,
      ...summarize(records, retainedTokens + tokensRequested, now, limits),
    },
  };
}

/** In-window request count and token sum, without evicting */
export function measure(ledger: SessionLedger, now: number, limits: Limits) {
  const retained = retainInWindow(ledger.records, now, limits);
  return { requests: retained.length, tokens: sumTokens(retained) };
}
