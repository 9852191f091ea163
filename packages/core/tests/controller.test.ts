import { describe, it, expect, beforeEach } from 'vitest';
import {
  AdmissionController,
  SessionStore,
  createLimits,
  InvalidTokenCountError,
  MissingSessionError,
  RateLimitedError,
  AdmissionError,
} from '../src/index.js';

describe('AdmissionController', () => {
  const limits = createLimits({ rpmLimit: 60, tpmLimit: 10_000, windowSeconds: 60 });
  let now: number;
  let store: SessionStore;
  let controller: AdmissionController;

  beforeEach(() => {
    now = 1_000_000;
    store = new SessionStore();
    controller = new AdmissionController({ limits, store, clock: () => now });
  });

  describe('checkSession', () => {
    it('should admit a single call and record it', () => {
      const decision = controller.checkSession('s1', 100);

      expect(decision.admitted).toBe(true);
      expect(controller.snapshot('s1')).toEqual([{ timestamp: now, tokens: 100 }]);
    });

    it('should admit several calls within both limits', () => {
      for (let i = 0; i < 5; i++) {
        expect(controller.checkSession('s1', 1000).admitted).toBe(true);
      }

      expect(controller.snapshot('s1').map((r) => r.tokens)).toEqual([1000, 1000, 1000, 1000, 1000]);
    });

    it('should enforce the volume limit against the remaining budget', () => {
      expect(controller.checkSession('s1', 9900).admitted).toBe(true);
      expect(controller.checkSession('s1', 101).admitted).toBe(false);
      expect(controller.checkSession('s1', 100).admitted).toBe(true);

      expect(controller.usage('s1')).toEqual({
        requests: 2,
        tokens: 10_000,
        remainingRequests: 58,
        remainingTokens: 0,
      });
    });

    it('should admit exactly rpmLimit calls and reject the next', () => {
      for (let i = 0; i < 60; i++) {
        expect(controller.checkSession('s1', 10).admitted).toBe(true);
      }

      const decision = controller.checkSession('s1', 10);

      expect(decision.admitted).toBe(false);
      expect(!decision.admitted && decision.reason).toBe('request_limit');
      expect(controller.snapshot('s1')).toHaveLength(60);
    });

    it('should leave the ledger unchanged after a rejection', () => {
      controller.checkSession('s1', 9900);
      const before = controller.snapshot('s1');

      now += 5000;
      expect(controller.checkSession('s1', 101).admitted).toBe(false);

      expect(controller.snapshot('s1')).toEqual(before);
    });

    it('should drop expired records even when the call is rejected', () => {
      store.put('s1', {
        records: [
          { timestamp: now - 65_000, tokens: 50 },
          { timestamp: now - 1000, tokens: 9900 },
        ],
      });

      expect(controller.checkSession('s1', 200).admitted).toBe(false);

      expect(controller.snapshot('s1')).toEqual([{ timestamp: now - 1000, tokens: 9900 }]);
    });

    it('should purge an aged record and keep only the new call', () => {
      store.put('s1', { records: [{ timestamp: now - 65_000, tokens: 10 }] });

      expect(controller.checkSession('s1', 20).admitted).toBe(true);

      expect(controller.snapshot('s1')).toEqual([{ timestamp: now, tokens: 20 }]);
    });

    it('should reset once the window has passed', () => {
      for (let i = 0; i < 60; i++) {
        controller.checkSession('s1', 10);
      }
      expect(controller.checkSession('s1', 10).admitted).toBe(false);

      now += 60_001;

      const decision = controller.checkSession('s1', 10);
      expect(decision.admitted).toBe(true);
      expect(decision.remainingRequests).toBe(59);
      expect(controller.snapshot('s1')).toHaveLength(1);
    });

    it('should keep sessions isolated', () => {
      expect(controller.checkSession('a', 9900).admitted).toBe(true);
      expect(controller.checkSession('b', 9950).admitted).toBe(true);

      expect(controller.checkSession('a', 150).admitted).toBe(false);
      expect(controller.checkSession('b', 50).admitted).toBe(true);

      expect(controller.usage('a').tokens).toBe(9900);
      expect(controller.usage('b').tokens).toBe(10_000);
    });

    it('should not create a session for an invalid token count', () => {
      expect(() => controller.checkSession('s1', -5)).toThrow(InvalidTokenCountError);
      expect(controller.hasSession('s1')).toBe(false);
    });

    it('should not store a ledger for a rejected first call', () => {
      const decision = controller.checkSession('fresh', 10_001);

      expect(decision.admitted).toBe(false);
      expect(controller.hasSession('fresh')).toBe(false);
      expect(controller.stats().totalSessions).toBe(0);
    });

    it('should keep an existing session after a rejection that evicts everything', () => {
      controller.checkSession('s1', 10);
      now += 61_000;

      expect(controller.checkSession('s1', 10_001).admitted).toBe(false);

      expect(controller.hasSession('s1')).toBe(true);
      expect(controller.snapshot('s1')).toEqual([]);
    });

    it('should reject an empty session id', () => {
      expect(() => controller.checkSession('', 1)).toThrow(AdmissionError);
    });
  });

  describe('check (scoped)', () => {
    it('should use the session bound to the current scope', () => {
      controller.scope.run('scoped', () => controller.check(100));

      expect(controller.snapshot('scoped')).toEqual([{ timestamp: now, tokens: 100 }]);
    });

    it('should throw outside of a session scope', () => {
      expect(() => controller.check(1)).toThrow(MissingSessionError);
    });

    it('should keep concurrent scopes apart across awaits', async () => {
      const drive = (sessionId: string, tokens: number) =>
        controller.scope.run(sessionId, async () => {
          const first = controller.check(tokens);
          await new Promise((resolve) => setTimeout(resolve, 5));
          const second = controller.check(tokens);
          return [first.admitted, second.admitted, controller.scope.current()];
        });

      const [a, b] = await Promise.all([drive('a', 6000), drive('b', 100)]);

      expect(a).toEqual([true, false, 'a']);
      expect(b).toEqual([true, true, 'b']);
      expect(controller.usage('a').tokens).toBe(6000);
      expect(controller.usage('b').tokens).toBe(200);
    });
  });

  describe('admit', () => {
    it('should return the decision when admitted', () => {
      const decision = controller.admitSession('s1', 10);

      expect(decision.admitted).toBe(true);
    });

    it('should throw RateLimitedError when rejected', () => {
      controller.admitSession('s1', 10_000);

      let caught: unknown;
      try {
        controller.admitSession('s1', 1);
      } catch (err) {
        caught = err;
      }

      if (!(caught instanceof RateLimitedError)) {
        throw new Error('expected RateLimitedError');
      }
      const error = caught;
      expect(error.code).toBe('rate_limited');
      expect(error.reason).toBe('token_limit');
      expect(error.sessionId).toBe('s1');
      expect(error.message).toBe('Token limit exceeded: 10000 tokens per 60s');
    });

    it('should use the scoped session', () => {
      expect(() =>
        controller.scope.run('s1', () => {
          for (let i = 0; i < 61; i++) {
            controller.admit(1);
          }
        })
      ).toThrow('Request limit exceeded: 60 requests per 60s');
    });
  });

  describe('endSession', () => {
    it('should discard the ledger', () => {
      controller.checkSession('s1', 10_000);

      expect(controller.endSession('s1')).toBe(true);
      expect(controller.hasSession('s1')).toBe(false);
      expect(controller.checkSession('s1', 10_000).admitted).toBe(true);
    });

    it('should return false for an unknown session', () => {
      expect(controller.endSession('unknown')).toBe(false);
    });
  });

  describe('usage', () => {
    it('should report zeros for an unknown session without creating it', () => {
      expect(controller.usage('unknown')).toEqual({
        requests: 0,
        tokens: 0,
        remainingRequests: 60,
        remainingTokens: 10_000,
      });
      expect(controller.hasSession('unknown')).toBe(false);
    });

    it('should ignore expired records without evicting them', () => {
      controller.checkSession('s1', 10);
      now += 61_000;

      expect(controller.usage('s1').requests).toBe(0);
      expect(controller.snapshot('s1')).toHaveLength(1);
    });
  });

  describe('prune', () => {
    it('should drop sessions aged past the window', () => {
      for (let i = 0; i < 200; i++) {
        controller.checkSession(`s${i}`, 1);
      }
      now += 600_000;
      controller.checkSession('latest', 1);

      expect(controller.prune()).toBe(200);
      expect(controller.stats()).toEqual({ totalSessions: 1, totalRequests: 1, totalTokens: 1 });
    });

    it('should not change later decisions', () => {
      controller.checkSession('s1', 10_000);
      now += 60_001;
      controller.prune();

      expect(controller.checkSession('s1', 10_000).admitted).toBe(true);
    });
  });

  describe('stats', () => {
    it('should aggregate in-window usage across sessions', () => {
      controller.checkSession('a', 100);
      controller.checkSession('a', 100);
      controller.checkSession('b', 50);

      expect(controller.stats()).toEqual({ totalSessions: 2, totalRequests: 3, totalTokens: 250 });
    });

    it('should return zeros for an empty controller', () => {
      expect(controller.stats()).toEqual({ totalSessions: 0, totalRequests: 0, totalTokens: 0 });
    });

    it('should not count expired records', () => {
      controller.checkSession('a', 100);
      now += 61_000;

      expect(controller.stats()).toEqual({ totalSessions: 1, totalRequests: 0, totalTokens: 0 });
    });
  });

  it('should default to the system clock and default limits', () => {
    const defaults = new AdmissionController();

    expect(defaults.limits).toEqual({ rpmLimit: 60, tpmLimit: 10_000, windowSeconds: 60 });
    expect(defaults.checkSession('s1', 1).admitted).toBe(true);
  });
});
