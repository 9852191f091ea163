/**
 * Session Admission Middleware
 *
 * Binds each request chain to a session and gates model calls through the
 * admission controller. A rejected call is answered with 429 and never
 * reaches the route handler.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import {
  type AdmissionController,
  describeRejection,
  assertTokenCount,
  type AdmissionErrorBody,
  type AdmissionErrorCode,
  type Decision,
} from '@session-gate/core';

const SESSION_HEADER = 'X-Session-Id';
const SESSION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

// Extend Express Request to include admission info
declare global {
  namespace Express {
    interface Request {
      admission?: {
        sessionId: string;
        tokens: number;
      };
    }
  }
}

/** Discriminated union for chat body validation */
export type ChatBodyResult =
  | { valid: true; prompt: string; tokens: number }
  | { valid: false; message: string };

export function parseChatBody(body: unknown): ChatBodyResult {
  if (!body || typeof body !== 'object') {
    return { valid: false, message: 'Request body must be a JSON object' };
  }
  const prompt = 'prompt' in body ? body.prompt : undefined;
  const tokens = 'tokens' in body ? body.tokens : undefined;
  if (typeof prompt !== 'string' || prompt.length === 0) {
    return { valid: false, message: 'prompt must be a non-empty string' };
  }
  if (typeof tokens !== 'number' || !Number.isSafeInteger(tokens) || tokens < 0) {
    return { valid: false, message: 'tokens must be a non-negative integer' };
  }
  return { valid: true, prompt, tokens };
}

export function buildErrorResponse(code: AdmissionErrorCode, message?: string): AdmissionErrorBody {
  return { error: code, message };
}

export class SessionAdmissionMiddleware {
  private pruneIntervalId: NodeJS.Timeout | null = null;

  constructor(private readonly controller: AdmissionController) {
    // Drop idle sessions once per window
    this.pruneIntervalId = setInterval(() => {
      this.pruneIdleSessions();
    }, controller.limits.windowSeconds * 1000);

    // Prevent interval from keeping process alive
    this.pruneIntervalId.unref();
  }

  pruneIdleSessions(): number {
    const pruned = this.controller.prune();
    if (pruned > 0) {
      console.log(`[Admission] Pruned ${pruned} idle sessions`);
    }
    return pruned;
  }

  /**
   * Stop the prune timer
   */
  destroy(): void {
    if (this.pruneIntervalId) {
      clearInterval(this.pruneIntervalId);
      this.pruneIntervalId = null;
    }
  }

  /**
   * Resolve the session id and run the rest of the chain inside its scope.
   * A missing header gets a fresh UUID; the id in effect is echoed back.
   */
  sessionScope() {
    return (req: Request, res: Response, next: NextFunction) => {
      const header = req.get(SESSION_HEADER)?.trim();
      if (header !== undefined && header !== '' && !SESSION_ID_PATTERN.test(header)) {
        res.status(400).json(buildErrorResponse('invalid_request', `Invalid ${SESSION_HEADER} header`));
        return;
      }

      const sessionId = header || randomUUID();
      res.set(SESSION_HEADER, sessionId);
      this.controller.scope.run(sessionId, () => next());
    };
  }

  /**
   * Reject malformed chat bodies before anything is charged
   */
  validateChat() {
    return (req: Request, res: Response, next: NextFunction) => {
      const result = parseChatBody(req.body);
      if (!result.valid) {
        res.status(400).json(buildErrorResponse('invalid_request', result.message));
        return;
      }
      next();
    };
  }

  /**
   * Admission check for the scoped session, charging `tokens` from the body
   */
  admission() {
    return (req: Request, res: Response, next: NextFunction) => {
      // Throws here reach the app error handler
      const sessionId = this.controller.scope.require();
      const tokens: unknown = req.body?.tokens;
      assertTokenCount(tokens);
      const decision = this.controller.check(tokens);

      this.setRateLimitHeaders(res, decision);

      if (!decision.admitted) {
        console.warn(`[Admission] Rejected session ${sessionId.slice(0, 8)}...: ${decision.reason}`);
        if (decision.retryAfterSeconds !== undefined) {
          res.set('Retry-After', decision.retryAfterSeconds.toString());
        }
        res.status(429).json(
          buildErrorResponse('rate_limited', describeRejection(decision.reason, this.controller.limits))
        );
        return;
      }

      req.admission = { sessionId, tokens };
      next();
    };
  }

  private setRateLimitHeaders(res: Response, decision: Decision): void {
    const { limits } = this.controller;
    res.set('X-RateLimit-Limit-Requests', limits.rpmLimit.toString());
    res.set('X-RateLimit-Remaining-Requests', decision.remainingRequests.toString());
    res.set('X-RateLimit-Limit-Tokens', limits.tpmLimit.toString());
    res.set('X-RateLimit-Remaining-Tokens', decision.remainingTokens.toString());
    res.set('X-RateLimit-Reset', decision.resetAt.toString());
  }
}
