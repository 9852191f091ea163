/**
 * Environment configuration for the API server.
 */

import { loadLimitsFromEnv, parseIntegerEnv } from '@session-gate/core';
import type { ApiServerConfig } from './server.js';

export function loadApiConfigFromEnv(env: Record<string, string | undefined> = process.env): ApiServerConfig {
  const corsOrigins = env.CORS_ORIGINS?.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    port: parseIntegerEnv(env, 'PORT', 3002),
    limits: loadLimitsFromEnv(env),
    corsOrigins: corsOrigins && corsOrigins.length > 0 ? corsOrigins : undefined,
    modelLatencyMs: parseIntegerEnv(env, 'MODEL_LATENCY_MS', 0),
  };
}
