/**
 * Shared types for session admission control.
 */

/** One admitted call in a session's ledger */
export interface LedgerRecord {
  /** Admission instant, epoch milliseconds */
  readonly timestamp: number;
  /** Token cost the caller declared for the call */
  readonly tokens: number;
}

/** Admitted calls of one session, oldest first */
export interface SessionLedger {
  records: LedgerRecord[];
}

export interface Limits {
  /** Maximum admitted calls per window */
  readonly rpmLimit: number;
  /** Maximum sum of admitted tokens per window */
  readonly tpmLimit: number;
  /** Trailing window length in seconds */
  readonly windowSeconds: number;
}

export type RejectReason = 'request_limit' | 'token_limit';

interface DecisionBase {
  /** Calls still available in the window after this decision */
  remainingRequests: number;
  /** Tokens still available in the window after this decision */
  remainingTokens: number;
  /** Unix seconds at which the oldest counted call leaves the window */
  resetAt: number;
}

/** Discriminated union for admission outcomes */
export type Decision =
  | (DecisionBase & { admitted: true })
  | (DecisionBase & {
      admitted: false;
      reason: RejectReason;
      /** Absent when the call can never fit the token limit */
      retryAfterSeconds?: number;
    });

/** Injectable time source, epoch milliseconds */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** In-window view of a session, computed without evicting */
export interface SessionUsage {
  requests: number;
  tokens: number;
  remainingRequests: number;
  remainingTokens: number;
}

export interface ControllerStats {
  totalSessions: number;
  totalRequests: number;
  totalTokens: number;
}

/** Error codes */
export type AdmissionErrorCode =
  | 'rate_limited'       // 429
  | 'invalid_request'    // 400
  | 'not_found'          // 404
  | 'missing_session'    // 500
  | 'invalid_config'     // 500
  | 'server_error';      // 500

/** Error response body */
export interface AdmissionErrorBody {
  error: AdmissionErrorCode;
  message?: string;
}

/** Map error codes to HTTP status */
export const ERROR_CODE_TO_STATUS: Record<AdmissionErrorCode, number> = {
  rate_limited: 429,
  invalid_request: 400,
  not_found: 404,
  missing_session: 500,
  invalid_config: 500,
  server_error: 500,
};
