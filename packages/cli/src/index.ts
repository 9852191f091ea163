/**
 * @session-gate/cli
 *
 * CLI for running and exercising the session gate.
 */

export { SessionGateClient, type ClientConfig, type ChatResult, type RateLimitInfo } from './client.js';
export { runSimulation, type SimulationOptions, type SimulationResult } from './simulate.js';
