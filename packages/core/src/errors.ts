import type { AdmissionErrorCode, Decision, RejectReason } from './types.js';

export class AdmissionError extends Error {
  constructor(
    public readonly code: AdmissionErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AdmissionError';
  }
}

/**
 * Raised by `admit` when either window limit would be exceeded.
 * Terminal for the call; the caller decides whether to retry later.
 */
export class RateLimitedError extends AdmissionError {
  constructor(
    public readonly sessionId: string,
    public readonly decision: Extract<Decision, { admitted: false }>,
    message: string
  ) {
    super('rate_limited', message);
    this.name = 'RateLimitedError';
  }

  get reason(): RejectReason {
    return this.decision.reason;
  }
}

/** Token count that is not a non-negative safe integer */
export class InvalidTokenCountError extends AdmissionError {
  constructor(public readonly tokens: unknown) {
    super('invalid_request', `tokens must be a non-negative integer, got ${String(tokens)}`);
    this.name = 'InvalidTokenCountError';
  }
}

/** `check` called outside of any session scope */
export class MissingSessionError extends AdmissionError {
  constructor() {
    super('missing_session', 'No session is bound to the current execution context');
    this.name = 'MissingSessionError';
  }
}

export class ConfigError extends AdmissionError {
  constructor(message: string) {
    super('invalid_config', message);
    this.name = 'ConfigError';
  }
}
