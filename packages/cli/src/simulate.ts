/**
 * In-process simulation of one session's call sequence on a virtual clock.
 */

import { AdmissionController, type Limits } from '@session-gate/core';

export interface SimulationOptions {
  calls: number;
  tokens: number;
  limits: Limits;
  /** Virtual time between calls */
  intervalMs: number;
  sessionId?: string;
}

export interface SimulationResult {
  lines: string[];
  admitted: number;
  rejected: number;
}

export function runSimulation(options: SimulationOptions): SimulationResult {
  let now = 0;
  const controller = new AdmissionController({ limits: options.limits, clock: () => now });
  const sessionId = options.sessionId ?? 'simulation';

  const lines: string[] = [];
  let admitted = 0;
  let rejected = 0;

  for (let i = 1; i <= options.calls; i++) {
    const decision = controller.checkSession(sessionId, options.tokens);
    const remaining = `remaining=${decision.remainingRequests}/${decision.remainingTokens}`;
    if (decision.admitted) {
      admitted++;
      lines.push(`#${i} admit ${remaining}`);
    } else {
      rejected++;
      lines.push(`#${i} reject (${decision.reason}) ${remaining}`);
    }
    now += options.intervalMs;
  }

  lines.push(`admitted=${admitted} rejected=${rejected}`);
  return { lines, admitted, rejected };
}
