/**
 * @session-gate/api
 *
 * HTTP front for the admission controller with a simulated model endpoint.
 */

export { SessionAdmissionMiddleware, parseChatBody, buildErrorResponse, type ChatBodyResult } from './middleware.js';
export { createApiServer, type ApiServerConfig, type ApiServer } from './server.js';
export { loadApiConfigFromEnv } from './config.js';
export { SimulatedModel, type ModelClient, type CompletionRequest, type CompletionResult } from './model.js';
