/**
 * API Server with Session Admission Control
 *
 * Health and stats are public. Everything under /api runs inside a session
 * scope; the chat route is gated by the admission check before the model is
 * called.
 */

import express, { type Request, type Response } from 'express';
import cors from 'cors';
import path from 'node:path';
import http from 'node:http';
import { fileURLToPath } from 'node:url';
import {
  AdmissionController,
  AdmissionError,
  ERROR_CODE_TO_STATUS,
  type Clock,
  type Limits,
} from '@session-gate/core';
import { SessionAdmissionMiddleware, buildErrorResponse } from './middleware.js';
import { SimulatedModel, type ModelClient } from './model.js';
import { loadApiConfigFromEnv } from './config.js';

export interface ApiServerConfig {
  port: number;
  limits: Limits;
  corsOrigins?: string[];
  /** Injected time source (default: Date.now) */
  clock?: Clock;
  /** Delay of the simulated model in ms */
  modelLatencyMs?: number;
  /** Replaces the simulated model */
  model?: ModelClient;
}

export function createApiServer(config: ApiServerConfig) {
  const app = express();
  const controller = new AdmissionController({ limits: config.limits, clock: config.clock });
  const gate = new SessionAdmissionMiddleware(controller);
  const model = config.model ?? new SimulatedModel(config.modelLatencyMs);

  // Middleware
  app.use(cors({
    origin: config.corsOrigins ?? '*',
    exposedHeaders: [
      'X-Session-Id',
      'X-RateLimit-Limit-Requests',
      'X-RateLimit-Remaining-Requests',
      'X-RateLimit-Limit-Tokens',
      'X-RateLimit-Remaining-Tokens',
      'X-RateLimit-Reset',
      'Retry-After',
    ],
  }));
  app.use(express.json());

  // Health check (public)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'session-gate-api' });
  });

  // Stats (public)
  app.get('/stats', (_req, res) => {
    res.json({
      ...controller.stats(),
      limits: controller.limits,
      uptime: process.uptime(),
    });
  });

  // Session-scoped routes
  const sessionRouter = express.Router();
  sessionRouter.use(gate.sessionScope());

  // Chat endpoint (simulated model call)
  sessionRouter.post('/chat', gate.validateChat(), gate.admission(), async (req: Request, res: Response, next: express.NextFunction) => {
    const { prompt } = req.body;
    const tokens = req.admission?.tokens ?? 0;

    try {
      const completion = await model.complete({ prompt, tokens });
      res.json({
        response: completion.response,
        tokens: completion.tokens,
        sessionId: req.admission?.sessionId,
        timestamp: Date.now(),
      });
    } catch (err) {
      next(err);
    }
  });

  // Current window usage
  sessionRouter.get('/session', (_req: Request, res: Response) => {
    const sessionId = controller.scope.require();
    res.json({ sessionId, ...controller.usage(sessionId) });
  });

  // End the session
  sessionRouter.delete('/session', (_req: Request, res: Response) => {
    const sessionId = controller.scope.require();
    if (!controller.endSession(sessionId)) {
      res.status(404).json(buildErrorResponse('not_found', `Unknown session: ${sessionId}`));
      return;
    }
    console.log(`[API] Session ended: ${sessionId.slice(0, 8)}...`);
    res.status(204).end();
  });

  app.use('/api', sessionRouter);

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: express.NextFunction) => {
    console.error('[API] Error:', err.message);

    // Don't send response if headers already sent (prevents crash on streaming errors)
    if (res.headersSent) {
      return;
    }

    // Body parser failures carry a 4xx status
    if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
      res.status(err.status).json(buildErrorResponse('invalid_request', err.message));
      return;
    }

    if (err instanceof AdmissionError) {
      res.status(ERROR_CODE_TO_STATUS[err.code]).json(buildErrorResponse(err.code, err.message));
      return;
    }

    res.status(500).json(buildErrorResponse('server_error', err.message));
  });

  let httpServer: http.Server | null = null;

  return {
    app,
    controller,
    gate,
    start: () => {
      return new Promise<void>((resolve) => {
        httpServer = http.createServer(app);
        httpServer.listen(config.port, () => {
          const { rpmLimit, tpmLimit, windowSeconds } = controller.limits;
          console.log(`[API] Server running on port ${config.port}`);
          console.log(`[API] Limits: ${rpmLimit} requests and ${tpmLimit} tokens per ${windowSeconds}s per session`);
          resolve();
        });
      });
    },
    stop: () => {
      gate.destroy();
      return new Promise<void>((resolve, reject) => {
        if (!httpServer) {
          resolve();
          return;
        }
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        httpServer = null;
      });
    },
  };
}

export type ApiServer = ReturnType<typeof createApiServer>;

// Run as standalone server
const thisFile = fileURLToPath(import.meta.url);
const mainArg = process.argv[1] ? path.resolve(process.argv[1]) : '';
const isMain = thisFile === mainArg;
if (isMain) {
  let config: ApiServerConfig;
  try {
    config = loadApiConfigFromEnv();
  } catch (err) {
    console.error('[API] Error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  const server = createApiServer(config);
  server.start().catch((err: unknown) => {
    console.error('[API] Failed to start:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
