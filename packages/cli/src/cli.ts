#!/usr/bin/env node
/**
 * Session Gate CLI
 *
 * Run the API server, simulate a session locally, or send chat calls to a
 * running server.
 */

import { Command, InvalidArgumentError } from 'commander';
import { createLimits, DEFAULT_LIMITS } from '@session-gate/core';
import { createApiServer, loadApiConfigFromEnv } from '@session-gate/api';
import { runSimulation } from './simulate.js';
import { SessionGateClient } from './client.js';

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parseInt(value, 10);
}

interface ServeOptions {
  port?: number;
}

interface SimulateOptions {
  calls: number;
  tokens: number;
  rpm: number;
  tpm: number;
  window: number;
  interval: number;
}

interface ChatOptions {
  url: string;
  tokens: number;
  session?: string;
  repeat: number;
}

const program = new Command();

program
  .name('session-gate')
  .description('Per-session request and token admission control')
  .version('0.1.0');

program
  .command('serve')
  .description('Start the API server (limits from RPM_LIMIT, TPM_LIMIT, WINDOW_SECONDS)')
  .option('--port <n>', 'Port to listen on (default: PORT or 3002)', parseInteger)
  .action(async (options: ServeOptions) => {
    try {
      const config = loadApiConfigFromEnv();
      const server = createApiServer({ ...config, port: options.port ?? config.port });
      await server.start();
    } catch (err) {
      console.error('[CLI] Failed to start server:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

program
  .command('simulate')
  .description('Run a sequence of calls for one session against an in-process controller')
  .requiredOption('--calls <n>', 'Number of calls', parseInteger)
  .requiredOption('--tokens <n>', 'Tokens per call', parseInteger)
  .option('--rpm <n>', 'Request limit per window', parseInteger, DEFAULT_LIMITS.rpmLimit)
  .option('--tpm <n>', 'Token limit per window', parseInteger, DEFAULT_LIMITS.tpmLimit)
  .option('--window <seconds>', 'Window length in seconds', parseInteger, DEFAULT_LIMITS.windowSeconds)
  .option('--interval <ms>', 'Virtual time between calls', parseInteger, 0)
  .action((options: SimulateOptions) => {
    try {
      const result = runSimulation({
        calls: options.calls,
        tokens: options.tokens,
        limits: createLimits({
          rpmLimit: options.rpm,
          tpmLimit: options.tpm,
          windowSeconds: options.window,
        }),
        intervalMs: options.interval,
      });
      for (const line of result.lines) {
        console.log(line);
      }
    } catch (err) {
      console.error('[CLI] Simulation failed:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

program
  .command('chat')
  .description('Send chat calls to a running server')
  .argument('<prompt>', 'Prompt text')
  .option('--url <url>', 'Server base URL', 'http://localhost:3002')
  .option('--tokens <n>', 'Tokens to charge per call', parseInteger, 100)
  .option('--session <id>', 'Session id (default: assigned by the server)')
  .option('--repeat <n>', 'Number of calls', parseInteger, 1)
  .action(async (prompt: string, options: ChatOptions) => {
    const client = new SessionGateClient({ baseUrl: options.url, sessionId: options.session });

    try {
      for (let i = 1; i <= options.repeat; i++) {
        const result = await client.chat(prompt, options.tokens);
        const { remainingRequests, remainingTokens, retryAfterSeconds } = result.rateLimit;
        const retry = retryAfterSeconds !== null ? ` retry-after=${retryAfterSeconds}s` : '';
        console.log(
          `#${i} ${result.status} session=${result.sessionId} remaining=${remainingRequests}/${remainingTokens}${retry}`
        );
        if (result.status !== 200) {
          console.log(`  ${JSON.stringify(result.body)}`);
        }
      }
    } catch (err) {
      console.error('[CLI] Request failed:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error('[CLI] Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
